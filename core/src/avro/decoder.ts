/**
 * Avro Binary Decoder
 *
 * Reads values from an in-memory block of Avro binary data, and compiles
 * schemas into datum readers that turn a block into plain JavaScript values.
 *
 * @see https://avro.apache.org/docs/current/specification/#binary-encoding
 */

import { DecodeError } from '../errors.js';
import { resolveSchema, type ResolvedSchema } from './resolve.js';
import { setField } from './types.js';

const textDecoder = new TextDecoder('utf-8', { fatal: true });

// ============================================================================
// Avro Binary Decoder
// ============================================================================

/**
 * Avro binary decoder over a single buffer.
 */
export class AvroDecoder {
  private readonly buffer: Uint8Array;
  private readonly view: DataView;
  private pos = 0;

  constructor(buffer: Uint8Array) {
    this.buffer = buffer;
    this.view = new DataView(buffer.buffer, buffer.byteOffset, buffer.byteLength);
  }

  readNull(): null {
    return null;
  }

  readBoolean(): boolean {
    const byte = this.readByte();
    if (byte > 1) {
      throw new DecodeError(`Invalid boolean byte ${byte} at offset ${this.pos - 1}`, 'INVALID_DATA');
    }
    return byte === 1;
  }

  /**
   * Read an int (32-bit signed) using variable-length zig-zag encoding.
   */
  readInt(): number {
    let result = 0;
    let shift = 0;
    for (;;) {
      const byte = this.readByte();
      result |= (byte & 0x7f) << shift;
      if ((byte & 0x80) === 0) break;
      shift += 7;
      if (shift > 28) {
        throw new DecodeError(`Varint too long for int at offset ${this.pos}`, 'INVALID_DATA');
      }
    }
    return (result >>> 1) ^ -(result & 1);
  }

  /**
   * Read a long (64-bit signed) using variable-length zig-zag encoding.
   */
  readLong(): bigint {
    let result = 0n;
    let shift = 0n;
    for (;;) {
      const byte = this.readByte();
      result |= BigInt(byte & 0x7f) << shift;
      if ((byte & 0x80) === 0) break;
      shift += 7n;
      if (shift > 63n) {
        throw new DecodeError(`Varint too long for long at offset ${this.pos}`, 'INVALID_DATA');
      }
    }
    return BigInt.asIntN(64, (result >> 1n) ^ -(result & 1n));
  }

  readFloat(): number {
    this.require(4);
    const value = this.view.getFloat32(this.pos, true);
    this.pos += 4;
    return value;
  }

  readDouble(): number {
    this.require(8);
    const value = this.view.getFloat64(this.pos, true);
    this.pos += 8;
    return value;
  }

  /**
   * Read bytes (length-prefixed). The result is a copy.
   */
  readBytes(): Uint8Array {
    return this.readFixed(this.readLength('bytes'));
  }

  /**
   * Read a string (UTF-8 encoded, length-prefixed).
   */
  readString(): string {
    const length = this.readLength('string');
    this.require(length);
    try {
      return textDecoder.decode(this.buffer.subarray(this.pos, this.pos + length));
    } catch {
      throw new DecodeError(`Invalid UTF-8 string at offset ${this.pos}`, 'INVALID_DATA');
    } finally {
      this.pos += length;
    }
  }

  readFixed(size: number): Uint8Array {
    this.require(size);
    const value = this.buffer.slice(this.pos, this.pos + size);
    this.pos += size;
    return value;
  }

  readEnum(): number {
    return this.readInt();
  }

  readUnionIndex(): number {
    return Number(this.readLong());
  }

  /**
   * Read an array encoded as a series of blocks.
   */
  readArray<T>(readElement: () => T): T[] {
    const result: T[] = [];
    this.readBlocks(() => result.push(readElement()));
    return result;
  }

  /**
   * Read a map encoded as a series of blocks.
   */
  readMap<V>(readValue: () => V): Map<string, V> {
    const result = new Map<string, V>();
    this.readBlocks(() => {
      const key = this.readString();
      result.set(key, readValue());
    });
    return result;
  }

  /**
   * Get current position in buffer.
   */
  get position(): number {
    return this.pos;
  }

  /**
   * Check if there are more bytes to read.
   */
  hasMore(): boolean {
    return this.pos < this.buffer.length;
  }

  // Private helpers

  private readBlocks(readItem: () => void): void {
    for (;;) {
      let count = this.readLong();
      if (count === 0n) return;
      if (count < 0n) {
        // Negative count: a byte size follows, which we don't need
        count = -count;
        this.readLong();
      }
      for (let i = 0n; i < count; i++) {
        readItem();
      }
    }
  }

  private readLength(what: string): number {
    const length = this.readLong();
    if (length < 0n || length > BigInt(this.buffer.length - this.pos)) {
      throw new DecodeError(`Invalid ${what} length ${length} at offset ${this.pos}`, 'INVALID_DATA');
    }
    return Number(length);
  }

  private readByte(): number {
    this.require(1);
    return this.buffer[this.pos++];
  }

  private require(n: number): void {
    if (this.pos + n > this.buffer.length) {
      throw new DecodeError(
        `Unexpected end of block: needed ${n} bytes at offset ${this.pos}, block has ${this.buffer.length}`,
        'UNEXPECTED_EOF'
      );
    }
  }
}

// ============================================================================
// Schema-driven Datum Reader
// ============================================================================

/** Reads one value of a fixed schema */
export type DatumReader = (decoder: AvroDecoder) => unknown;

/**
 * Compile a writer schema into a datum reader.
 *
 * Values come back as: `null`, `boolean`, `number` (int, float, double),
 * `bigint` (long), `Uint8Array` (bytes, fixed), `string` (string, enum
 * symbol), arrays, and plain objects for records and maps.
 *
 * @throws DecodeError('INVALID_SCHEMA') if the schema is malformed
 */
export function compileDatumReader(schema: unknown): DatumReader {
  const resolved = resolveSchema(schema);
  return (decoder) => readResolved(resolved, decoder);
}

function readResolved(schema: ResolvedSchema, decoder: AvroDecoder): unknown {
  switch (schema.kind) {
    case 'primitive':
      switch (schema.type) {
        case 'null':
          return decoder.readNull();
        case 'boolean':
          return decoder.readBoolean();
        case 'int':
          return decoder.readInt();
        case 'long':
          return decoder.readLong();
        case 'float':
          return decoder.readFloat();
        case 'double':
          return decoder.readDouble();
        case 'bytes':
          return decoder.readBytes();
        case 'string':
          return decoder.readString();
      }
      break;
    case 'record': {
      const record: Record<string, unknown> = {};
      for (const field of schema.fields) {
        setField(record, field.name, readResolved(field.schema, decoder));
      }
      return record;
    }
    case 'enum': {
      const index = decoder.readEnum();
      const symbol = schema.symbols[index];
      if (symbol === undefined) {
        throw new DecodeError(`Enum index ${index} out of range for ${schema.name}`, 'INVALID_DATA');
      }
      return symbol;
    }
    case 'array':
      return decoder.readArray(() => readResolved(schema.items, decoder));
    case 'map':
      return Object.fromEntries(decoder.readMap(() => readResolved(schema.values, decoder)));
    case 'fixed':
      return decoder.readFixed(schema.size);
    case 'union': {
      const index = decoder.readUnionIndex();
      const branch = schema.branches[index];
      if (branch === undefined) {
        throw new DecodeError(`Union index ${index} out of range`, 'INVALID_DATA');
      }
      return readResolved(branch, decoder);
    }
  }
  throw new DecodeError('Unreachable schema kind', 'INVALID_SCHEMA');
}
