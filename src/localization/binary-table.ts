/**
 * @module localization/binary-table
 *
 * On-disk chained hash table mapping a diagnostic identifier (u32) to the UTF-8
 * bytes of its localized message. Everything is little-endian.
 *
 * ```
 * header  : u32 tableOffset
 * payload : bucket*                        // starts at byte 4
 * bucket  : u16 itemCount, item*
 * item    : u32 hash, u32 dataLength, u32 key, u8[dataLength]
 * padding : 0-3 zero bytes (table is 4-byte aligned)
 * table   : u32 bucketCount, u32 entryCount, u32 bucketOffset[bucketCount]
 * ```
 *
 * A bucket offset of 0 marks an empty bucket; any other value is an absolute byte
 * offset into the file. `bucketCount` is a power of two and an identifier lives in
 * bucket `hash(id) & (bucketCount - 1)`.
 */

import { closeSync, openSync, writeSync } from 'node:fs';
import { DiagnosticBuilder, DiagnosticCode, DiagnosticError, dummyPosition } from '../diagnostics/diagnostics.js';
import type { DiagnosticID } from '../types.js';
import { createLogger } from '../utils/logger.js';

const OFFSET_SIZE = 4;
const BUCKET_HEADER_SIZE = 2;
const ITEM_HEADER_SIZE = 12;
const TABLE_HEADER_SIZE = 8;
const MIN_BUCKETS = 16;
const MAX_U16 = 0xffff;
const MAX_U32 = 0xffffffff;

const encoder = new TextEncoder();

/** 32-bit finalizer mix; stable across writer and reader versions. */
export function hashIdentifier(key: number): number {
  let h = key >>> 0;
  h ^= h >>> 16;
  h = Math.imul(h, 0x85ebca6b);
  h ^= h >>> 13;
  h = Math.imul(h, 0xc2b2ae35);
  h ^= h >>> 16;
  return h >>> 0;
}

function nextPowerOf2(value: number): number {
  let result = 1;
  while (result <= value) result *= 2;
  return result;
}

function isU32(value: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= MAX_U32;
}

/**
 * Growable little-endian byte sink.
 */
class ByteSink {
  private bytes = new Uint8Array(256);
  private view = new DataView(this.bytes.buffer);
  private length = 0;

  get offset(): number {
    return this.length;
  }

  private reserve(extra: number): void {
    const needed = this.length + extra;
    if (needed <= this.bytes.length) return;
    let capacity = this.bytes.length * 2;
    while (capacity < needed) capacity *= 2;
    const grown = new Uint8Array(capacity);
    grown.set(this.bytes.subarray(0, this.length));
    this.bytes = grown;
    this.view = new DataView(grown.buffer);
  }

  writeU8(value: number): void {
    this.reserve(1);
    this.view.setUint8(this.length, value);
    this.length += 1;
  }

  writeU16(value: number): void {
    this.reserve(2);
    this.view.setUint16(this.length, value, true);
    this.length += 2;
  }

  writeU32(value: number): void {
    this.reserve(4);
    this.view.setUint32(this.length, value, true);
    this.length += 4;
  }

  writeBytes(data: Uint8Array): void {
    this.reserve(data.length);
    this.bytes.set(data, this.length);
    this.length += data.length;
  }

  patchU32(at: number, value: number): void {
    this.view.setUint32(at, value, true);
  }

  toUint8Array(): Uint8Array {
    return this.bytes.slice(0, this.length);
  }
}

interface PendingItem {
  readonly key: number;
  readonly hash: number;
  readonly data: Uint8Array;
}

/**
 * Collects translations and serializes them into the binary table format.
 *
 * ```typescript
 * const writer = new BinaryTableWriter();
 * writer.insert(0, 'Bonjour');
 * if (!writer.emit('fr.db')) { ... }
 * ```
 */
export class BinaryTableWriter {
  private readonly entries = new Map<DiagnosticID, Uint8Array>();
  private readonly logger = createLogger('binary-table');

  /** Adds or replaces the translation for `id`. */
  insert(id: DiagnosticID, translation: string): void {
    if (!isU32(id)) {
      throw new RangeError(`Diagnostic identifier must be an unsigned 32-bit integer, got ${id}`);
    }
    this.entries.set(id, encoder.encode(translation));
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Serializes the table into a fresh buffer. The first four bytes hold the
   * offset of the bucket table.
   */
  toBuffer(): Uint8Array {
    const sink = new ByteSink();
    sink.writeU32(0);
    const tableOffset = this.emitTable(sink);
    sink.patchU32(0, tableOffset);
    return sink.toUint8Array();
  }

  /**
   * Writes the table to `filePath`: a zero placeholder, the index, then the real
   * index offset written back over the placeholder.
   *
   * Callers name the file with a `.db` extension; this is not checked here.
   *
   * @returns false if the destination could not be opened or written
   */
  emit(filePath: string): boolean {
    const sink = new ByteSink();
    sink.writeU32(0);
    const tableOffset = this.emitTable(sink);
    const body = sink.toUint8Array();

    const header = new Uint8Array(OFFSET_SIZE);
    new DataView(header.buffer).setUint32(0, tableOffset, true);

    let fd: number | undefined;
    try {
      fd = openSync(filePath, 'w');
      writeSync(fd, body, 0, body.length, 0);
      writeSync(fd, header, 0, OFFSET_SIZE, 0);
      return true;
    } catch (err: unknown) {
      const error = err instanceof Error ? err : new Error(String(err));
      this.logger.error('Failed to write binary localization table', error, { file: filePath });
      return false;
    } finally {
      if (fd !== undefined) closeSync(fd);
    }
  }

  private emitTable(sink: ByteSink): number {
    const entryCount = this.entries.size;
    const bucketCount = Math.max(MIN_BUCKETS, nextPowerOf2(Math.floor((entryCount * 4) / 3)));
    const buckets: PendingItem[][] = Array.from({ length: bucketCount }, () => []);

    const keys = Array.from(this.entries.keys()).sort((a, b) => a - b);
    for (const key of keys) {
      const data = this.entries.get(key);
      if (!data) continue;
      const hash = hashIdentifier(key);
      buckets[hash & (bucketCount - 1)]?.push({ key, hash, data });
    }

    const bucketOffsets = buckets.map(items => {
      if (items.length === 0) return 0;
      if (items.length > MAX_U16) {
        throw new RangeError(`Too many entries in one bucket (${items.length})`);
      }
      const offset = sink.offset;
      sink.writeU16(items.length);
      for (const item of items) {
        sink.writeU32(item.hash);
        sink.writeU32(item.data.length);
        sink.writeU32(item.key);
        sink.writeBytes(item.data);
      }
      return offset;
    });

    while (sink.offset % OFFSET_SIZE !== 0) sink.writeU8(0);

    const tableOffset = sink.offset;
    sink.writeU32(bucketCount);
    sink.writeU32(entryCount);
    for (const offset of bucketOffsets) sink.writeU32(offset);
    return tableOffset;
  }
}

function malformed(message: string): DiagnosticError {
  return new DiagnosticError(
    DiagnosticBuilder.error(DiagnosticCode.LOC001_MalformedBinaryTable)
      .withMessage(`Malformed binary localization table: ${message}`)
      .withPosition(dummyPosition())
      .build()
  );
}

/**
 * Read-only view over a serialized table.
 *
 * The constructor checks the whole structure once (header, bucket array, every
 * bucket and item) so lookups never leave the buffer. Lookups return views into
 * the borrowed buffer; nothing is copied.
 */
export class BinaryTableReader {
  private readonly view: DataView;
  private readonly tableOffset: number;
  private readonly bucketCount: number;
  private readonly entryCount: number;

  /**
   * @throws DiagnosticError LOC001 when the buffer is not a well-formed table
   */
  constructor(private readonly buffer: Uint8Array) {
    this.view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);

    if (buffer.byteLength < OFFSET_SIZE) {
      throw malformed(`buffer is ${buffer.byteLength} bytes, shorter than the header`);
    }
    const tableOffset = this.view.getUint32(0, true);
    if (tableOffset < OFFSET_SIZE || tableOffset + TABLE_HEADER_SIZE > buffer.byteLength) {
      throw malformed(`table offset ${tableOffset} is outside the buffer`);
    }
    const bucketCount = this.view.getUint32(tableOffset, true);
    const entryCount = this.view.getUint32(tableOffset + 4, true);
    if (bucketCount === 0 || (bucketCount & (bucketCount - 1)) !== 0) {
      throw malformed(`bucket count ${bucketCount} is not a power of two`);
    }
    if (tableOffset + TABLE_HEADER_SIZE + bucketCount * OFFSET_SIZE > buffer.byteLength) {
      throw malformed('bucket array extends past the end of the buffer');
    }

    this.tableOffset = tableOffset;
    this.bucketCount = bucketCount;
    this.entryCount = entryCount;
    this.verifyBuckets();
  }

  /** Number of entries recorded in the table header. */
  get size(): number {
    return this.entryCount;
  }

  /**
   * Looks up the message bytes for `id`.
   *
   * @returns a view into the underlying buffer, or undefined when there is no
   * entry or the entry is empty
   */
  find(id: DiagnosticID): Uint8Array | undefined {
    if (!isU32(id)) return undefined;
    const hash = hashIdentifier(id);
    const bucketOffset = this.bucketOffset(hash & (this.bucketCount - 1));
    if (bucketOffset === 0) return undefined;

    const itemCount = this.view.getUint16(bucketOffset, true);
    let cursor = bucketOffset + BUCKET_HEADER_SIZE;
    for (let i = 0; i < itemCount; i++) {
      const itemHash = this.view.getUint32(cursor, true);
      const dataLength = this.view.getUint32(cursor + 4, true);
      const key = this.view.getUint32(cursor + 8, true);
      const dataStart = cursor + ITEM_HEADER_SIZE;
      if (itemHash === hash && key === id) {
        return dataLength === 0 ? undefined : this.buffer.subarray(dataStart, dataStart + dataLength);
      }
      cursor = dataStart + dataLength;
    }
    return undefined;
  }

  private bucketOffset(bucket: number): number {
    return this.view.getUint32(this.tableOffset + TABLE_HEADER_SIZE + bucket * OFFSET_SIZE, true);
  }

  private verifyBuckets(): void {
    let items = 0;
    for (let bucket = 0; bucket < this.bucketCount; bucket++) {
      const offset = this.bucketOffset(bucket);
      if (offset === 0) continue;
      if (offset < OFFSET_SIZE || offset + BUCKET_HEADER_SIZE > this.tableOffset) {
        throw malformed(`bucket ${bucket} offset ${offset} is outside the payload`);
      }
      const itemCount = this.view.getUint16(offset, true);
      let cursor = offset + BUCKET_HEADER_SIZE;
      for (let i = 0; i < itemCount; i++) {
        if (cursor + ITEM_HEADER_SIZE > this.tableOffset) {
          throw malformed(`bucket ${bucket} item ${i} header is truncated`);
        }
        const dataLength = this.view.getUint32(cursor + 4, true);
        cursor += ITEM_HEADER_SIZE + dataLength;
        if (cursor > this.tableOffset) {
          throw malformed(`bucket ${bucket} item ${i} data is truncated`);
        }
      }
      items += itemCount;
    }
    if (items !== this.entryCount) {
      throw malformed(`header records ${this.entryCount} entries but buckets hold ${items}`);
    }
  }
}
