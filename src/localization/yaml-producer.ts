import type { DiagnosticID, UnknownIdentifierRecord } from '../types.js';
import { createLogger } from '../utils/logger.js';
import type { IdentifierSpace } from './identifier-space.js';
import { LocalizationProducer, readCatalogFile, type ProducerOptions } from './producer.js';
import { parseStructuredList } from './structured-list.js';

/**
 * Producer backed by a structured-list (`.yaml`) catalog.
 *
 * Records naming identifiers outside the identifier space are retained and can be
 * listed through {@link unknownIdentifiers}.
 */
export class YAMLLocalizationProducer extends LocalizationProducer {
  private messages: readonly (string | undefined)[] = [];
  private unknownIds: readonly UnknownIdentifierRecord[] = [];

  constructor(
    private readonly filePath: string,
    space: IdentifierSpace,
    options: ProducerOptions = {}
  ) {
    super(space, createLogger('localization:yaml'), options, 'fallback');
  }

  protected initializeImpl(): boolean {
    const content = readCatalogFile(this.filePath, this.logger);
    if (content === undefined) return false;

    const result = parseStructuredList(content, this.space, this.filePath);
    this.messages = result.messages;
    this.unknownIds = result.unknownIds;
    return true;
  }

  protected getMessage(id: DiagnosticID): string {
    return this.messages[id] ?? '';
  }

  /** Records whose id is not in the identifier space, in file order. */
  unknownIdentifiers(): readonly UnknownIdentifierRecord[] {
    this.initializeIfNeeded();
    return this.unknownIds;
  }
}
