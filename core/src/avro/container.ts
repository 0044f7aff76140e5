/**
 * Avro Object Container Files
 *
 * Reader and writer for the container format: magic bytes, a metadata map
 * carrying the writer schema and codec, a 16-byte sync marker, then blocks of
 * records each followed by the sync marker.
 *
 * @see https://avro.apache.org/docs/current/specification/#object-container-files
 */

import { randomBytes } from 'node:crypto';
import * as pako from 'pako';
import { DecodeError } from '../errors.js';
import { ByteReader } from './byte-reader.js';
import { AvroDecoder, compileDatumReader, type DatumReader } from './decoder.js';
import { AvroEncoder, compileDatumWriter } from './encoder.js';
import type { AvroCodec, AvroType } from './types.js';

const AVRO_MAGIC = new Uint8Array([0x4f, 0x62, 0x6a, 0x01]); // "Obj" + version 1
const AVRO_SYNC_SIZE = 16;
const SCHEMA_KEY = 'avro.schema';
const CODEC_KEY = 'avro.codec';

const textEncoder = new TextEncoder();
const textDecoder = new TextDecoder();

// ============================================================================
// Codecs
// ============================================================================

function isSupportedCodec(codec: string): codec is AvroCodec {
  return codec === 'null' || codec === 'deflate';
}

function decompressBlock(codec: AvroCodec, data: Uint8Array): Uint8Array {
  if (codec === 'null') {
    return data;
  }
  try {
    return pako.inflateRaw(data);
  } catch (error) {
    throw new DecodeError(`Failed to inflate deflate block: ${String(error)}`, 'CORRUPT_BLOCK');
  }
}

function compressBlock(codec: AvroCodec, data: Uint8Array): Uint8Array {
  return codec === 'null' ? data : pako.deflateRaw(data);
}

// ============================================================================
// Avro Object Container File Reader
// ============================================================================

/**
 * Streaming container file reader.
 *
 * @example
 * ```ts
 * const reader = await AvroFileReader.open(chunks);
 * console.log(reader.writerSchema);
 * for await (const record of reader.records()) {
 *   // ...
 * }
 * ```
 */
export class AvroFileReader {
  /** Writer schema document, as parsed from the header */
  readonly writerSchema: unknown;
  readonly codec: AvroCodec;
  /** All header metadata, including `avro.schema` and `avro.codec` */
  readonly metadata: ReadonlyMap<string, Uint8Array>;

  private readonly input: ByteReader;
  private readonly sync: Uint8Array;
  private readonly readDatum: DatumReader;
  private started = false;

  private constructor(
    input: ByteReader,
    header: { schema: unknown; codec: AvroCodec; metadata: Map<string, Uint8Array>; sync: Uint8Array }
  ) {
    this.input = input;
    this.writerSchema = header.schema;
    this.codec = header.codec;
    this.metadata = header.metadata;
    this.sync = header.sync;
    this.readDatum = compileDatumReader(header.schema);
  }

  /**
   * Read the header from a chunk sequence and return a reader positioned at
   * the first block.
   *
   * @throws DecodeError if the header is malformed or uses an unknown codec
   */
  static async open(chunks: AsyncIterator<Uint8Array>): Promise<AvroFileReader> {
    const input = new ByteReader(chunks);

    const magic = await input.readBytes(AVRO_MAGIC.length);
    if (!bytesEqual(magic, AVRO_MAGIC)) {
      throw new DecodeError('Not an Avro object container file (bad magic bytes)', 'INVALID_MAGIC');
    }

    const metadata = new Map<string, Uint8Array>();
    for (;;) {
      let count = await input.readLong();
      if (count === 0n) break;
      if (count < 0n) {
        count = -count;
        await input.readLong();
      }
      for (let i = 0n; i < count; i++) {
        const key = textDecoder.decode(await input.readBytes(await input.readCount('metadata key length')));
        const value = await input.readBytes(await input.readCount('metadata value length'));
        metadata.set(key, value.slice());
      }
    }

    const sync = (await input.readBytes(AVRO_SYNC_SIZE)).slice();

    const schemaBytes = metadata.get(SCHEMA_KEY);
    if (schemaBytes === undefined) {
      throw new DecodeError(`Container header has no ${SCHEMA_KEY} entry`, 'INVALID_SCHEMA');
    }
    let schema: unknown;
    try {
      schema = JSON.parse(textDecoder.decode(schemaBytes));
    } catch (error) {
      throw new DecodeError(
        `Failed to parse writer schema JSON: ${error instanceof Error ? error.message : 'Invalid JSON'}`,
        'INVALID_SCHEMA'
      );
    }

    const codecBytes = metadata.get(CODEC_KEY);
    const codec = codecBytes === undefined ? 'null' : textDecoder.decode(codecBytes);
    if (!isSupportedCodec(codec)) {
      throw new DecodeError(`Unsupported container codec "${codec}"`, 'UNSUPPORTED_CODEC');
    }

    return new AvroFileReader(input, { schema, codec, metadata, sync });
  }

  /**
   * Decode every remaining record, block by block.
   * Single-pass: a second call throws.
   */
  async *records(): AsyncGenerator<unknown, void, undefined> {
    if (this.started) {
      throw new DecodeError('Container records can only be iterated once', 'INVALID_DATA');
    }
    this.started = true;

    while (!(await this.input.atEnd())) {
      const count = await this.input.readCount('block record count');
      const size = await this.input.readCount('block size');
      const data = decompressBlock(this.codec, await this.input.readBytes(size));
      const marker = await this.input.readBytes(AVRO_SYNC_SIZE);
      if (!bytesEqual(marker, this.sync)) {
        throw new DecodeError(`Sync marker mismatch after block ending at offset ${this.input.position}`, 'SYNC_MISMATCH');
      }

      const decoder = new AvroDecoder(data);
      for (let i = 0; i < count; i++) {
        yield this.readDatum(decoder);
      }
      if (decoder.hasMore()) {
        throw new DecodeError(
          `Block declared ${count} records but ${data.length - decoder.position} bytes were left over`,
          'CORRUPT_BLOCK'
        );
      }
    }
  }

  [Symbol.asyncIterator](): AsyncGenerator<unknown, void, undefined> {
    return this.records();
  }
}

// ============================================================================
// Avro Object Container File Writer
// ============================================================================

/**
 * Options for {@link AvroFileWriter}.
 */
export interface AvroFileWriterOptions {
  /** Block compression (default 'null') */
  codec?: AvroCodec;
  /** Extra header metadata */
  metadata?: Map<string, string> | Record<string, string>;
}

/**
 * Avro Object Container File writer.
 * Collects blocks of records and renders the complete file with header and sync markers.
 */
export class AvroFileWriter {
  private readonly schema: AvroType;
  private readonly codec: AvroCodec;
  private readonly metadata: Map<string, string>;
  private readonly syncMarker: Uint8Array;
  private readonly writeDatum: (value: unknown, encoder: AvroEncoder) => void;
  private readonly blockEncoder = new AvroEncoder();
  private blocks: { count: number; data: Uint8Array }[] = [];

  constructor(schema: AvroType, options: AvroFileWriterOptions = {}) {
    this.schema = schema;
    this.codec = options.codec ?? 'null';
    this.metadata = options.metadata instanceof Map
      ? options.metadata
      : new Map(Object.entries(options.metadata ?? {}));
    this.writeDatum = compileDatumWriter(schema);

    // Generate random 16-byte sync marker
    this.syncMarker = new Uint8Array(randomBytes(AVRO_SYNC_SIZE));
  }

  /**
   * Encode records into one block.
   */
  addRecords(records: readonly unknown[]): void {
    this.blockEncoder.reset();
    for (const record of records) {
      this.writeDatum(record, this.blockEncoder);
    }
    this.addBlock(records.length, this.blockEncoder.toBuffer());
  }

  /**
   * Add a block of already-encoded records.
   */
  addBlock(count: number, data: Uint8Array): void {
    this.blocks.push({ count, data: compressBlock(this.codec, data) });
  }

  /**
   * Generate the complete Avro container file.
   */
  toBuffer(): Uint8Array {
    const encoder = new AvroEncoder();

    encoder.appendRaw(AVRO_MAGIC);

    const headerMeta = new Map<string, Uint8Array>();
    headerMeta.set(SCHEMA_KEY, textEncoder.encode(JSON.stringify(this.schema)));
    headerMeta.set(CODEC_KEY, textEncoder.encode(this.codec));
    for (const [key, value] of this.metadata) {
      headerMeta.set(key, textEncoder.encode(value));
    }
    encoder.writeMap(headerMeta, (value) => encoder.writeBytes(value));

    encoder.appendRaw(this.syncMarker);

    for (const block of this.blocks) {
      encoder.writeLong(block.count);
      encoder.writeLong(block.data.length);
      encoder.appendRaw(block.data);
      encoder.appendRaw(this.syncMarker);
    }

    return encoder.toBuffer();
  }
}

/**
 * Encode records into a complete container file in one call.
 *
 * @param blockSize - Records per block (default: all records in one block)
 */
export function encodeContainer(
  schema: AvroType,
  records: readonly unknown[],
  options: AvroFileWriterOptions & { blockSize?: number } = {}
): Uint8Array {
  const writer = new AvroFileWriter(schema, options);
  const blockSize = options.blockSize ?? Math.max(records.length, 1);
  for (let start = 0; start < records.length; start += blockSize) {
    writer.addRecords(records.slice(start, start + blockSize));
  }
  return writer.toBuffer();
}

function bytesEqual(a: Uint8Array, b: Uint8Array): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i++) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}
