import type { DiagnosticID } from '../types.js';
import { createLogger } from '../utils/logger.js';
import { BinaryTableReader } from './binary-table.js';
import type { IdentifierSpace } from './identifier-space.js';
import { LocalizationProducer, type ProducerOptions } from './producer.js';

const decoder = new TextDecoder('utf-8');

/**
 * Producer backed by a binary table (`.db`) already held in memory.
 *
 * The buffer is borrowed for the producer's lifetime; message bytes are only
 * decoded when a lookup asks for them. A buffer that is not a well-formed table
 * fails initialization unless `onMalformed: 'throw'` is given.
 */
export class SerializedLocalizationProducer extends LocalizationProducer {
  private table: BinaryTableReader | null = null;

  constructor(
    private readonly buffer: Uint8Array,
    space: IdentifierSpace,
    options: ProducerOptions = {}
  ) {
    super(space, createLogger('localization:db'), options, 'fallback');
  }

  protected initializeImpl(): boolean {
    this.table = new BinaryTableReader(this.buffer);
    return true;
  }

  protected getMessage(id: DiagnosticID): string {
    const bytes = this.table?.find(id);
    return bytes ? decoder.decode(bytes) : '';
  }
}
