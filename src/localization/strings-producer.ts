import type { DiagnosticID } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { parseFlatText } from './flat-text.js';
import type { IdentifierSpace } from './identifier-space.js';
import { LocalizationProducer, readCatalogFile, type ProducerOptions } from './producer.js';

/**
 * Producer backed by a flat-text (`.strings`) catalog.
 *
 * Malformed input is fatal by default: the parse error escapes the first query.
 * Pass `onMalformed: 'fallback'` to serve default messages instead.
 */
export class StringsLocalizationProducer extends LocalizationProducer {
  private messages: readonly (string | undefined)[] = [];

  constructor(
    private readonly filePath: string,
    space: IdentifierSpace,
    options: ProducerOptions = {}
  ) {
    super(space, createLogger('localization:strings'), options, 'throw');
  }

  protected initializeImpl(): boolean {
    const content = readCatalogFile(this.filePath, this.logger);
    if (content === undefined) return false;

    this.messages = parseFlatText(content, this.space, this.filePath);
    return true;
  }

  protected getMessage(id: DiagnosticID): string {
    return this.messages[id] ?? '';
  }
}
