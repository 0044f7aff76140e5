/**
 * Avro Binary Encoder
 *
 * Implements Avro binary encoding according to the Apache Avro specification.
 * Used by the sink to write container files and by tests to build fixtures.
 *
 * @see https://avro.apache.org/docs/current/specification/#binary-encoding
 */

import { EncodeError } from '../errors.js';
import { resolveSchema, type ResolvedSchema } from './resolve.js';
import { getField, isPlainObject } from './types.js';

const textEncoder = new TextEncoder();

// ============================================================================
// Avro Binary Encoder
// ============================================================================

/**
 * Avro binary encoder.
 * Appends encoded values to a growable byte buffer.
 */
export class AvroEncoder {
  private buffer = new Uint8Array(256);
  private length = 0;

  /**
   * Write a null value (no bytes written).
   */
  writeNull(): void {
    // Null is encoded as zero bytes
  }

  writeBoolean(value: boolean): void {
    this.writeByte(value ? 1 : 0);
  }

  /**
   * Write an int (32-bit signed) using variable-length zig-zag encoding.
   */
  writeInt(value: number): void {
    let n = ((value << 1) ^ (value >> 31)) >>> 0;
    while (n > 0x7f) {
      this.writeByte((n & 0x7f) | 0x80);
      n >>>= 7;
    }
    this.writeByte(n);
  }

  /**
   * Write a long (64-bit signed) using variable-length zig-zag encoding.
   */
  writeLong(value: number | bigint): void {
    const signed = BigInt.asIntN(64, typeof value === 'bigint' ? value : BigInt(value));
    let n = BigInt.asUintN(64, (signed << 1n) ^ (signed >> 63n));
    while (n > 0x7fn) {
      this.writeByte(Number(n & 0x7fn) | 0x80);
      n >>= 7n;
    }
    this.writeByte(Number(n));
  }

  /**
   * Write a float (32-bit IEEE 754, little-endian).
   */
  writeFloat(value: number): void {
    const view = new DataView(new ArrayBuffer(4));
    view.setFloat32(0, value, true);
    this.appendRaw(new Uint8Array(view.buffer));
  }

  /**
   * Write a double (64-bit IEEE 754, little-endian).
   */
  writeDouble(value: number): void {
    const view = new DataView(new ArrayBuffer(8));
    view.setFloat64(0, value, true);
    this.appendRaw(new Uint8Array(view.buffer));
  }

  /**
   * Write bytes (length-prefixed).
   */
  writeBytes(value: Uint8Array): void {
    this.writeLong(value.length);
    this.appendRaw(value);
  }

  /**
   * Write a string (UTF-8 encoded, length-prefixed).
   */
  writeString(value: string): void {
    this.writeBytes(textEncoder.encode(value));
  }

  /**
   * Write a fixed-length byte array.
   */
  writeFixed(value: Uint8Array, size: number): void {
    if (value.length !== size) {
      throw new EncodeError(`Fixed value must be exactly ${size} bytes, got ${value.length}`, '');
    }
    this.appendRaw(value);
  }

  /**
   * Write an enum value (as its ordinal index).
   */
  writeEnum(index: number): void {
    this.writeInt(index);
  }

  /**
   * Write the union branch index.
   */
  writeUnionIndex(index: number): void {
    this.writeLong(index);
  }

  /**
   * Write an array as a single block followed by the terminating zero block.
   */
  writeArray<T>(values: readonly T[], writeElement: (value: T) => void): void {
    if (values.length > 0) {
      this.writeLong(values.length);
      for (const value of values) {
        writeElement(value);
      }
    }
    this.writeLong(0);
  }

  /**
   * Write a map as a single block followed by the terminating zero block.
   */
  writeMap<V>(map: Map<string, V> | Record<string, V>, writeValue: (value: V) => void): void {
    const entries = map instanceof Map ? Array.from(map.entries()) : Object.entries(map);
    if (entries.length > 0) {
      this.writeLong(entries.length);
      for (const [key, value] of entries) {
        this.writeString(key);
        writeValue(value);
      }
    }
    this.writeLong(0);
  }

  /**
   * Append raw bytes to the buffer.
   */
  appendRaw(bytes: Uint8Array): void {
    this.reserve(bytes.length);
    this.buffer.set(bytes, this.length);
    this.length += bytes.length;
  }

  /**
   * Get a copy of the encoded bytes.
   */
  toBuffer(): Uint8Array {
    return this.buffer.slice(0, this.length);
  }

  /**
   * Get the current size of the encoded data.
   */
  get size(): number {
    return this.length;
  }

  /**
   * Drop everything written so far, keeping the allocation.
   */
  reset(): void {
    this.length = 0;
  }

  private writeByte(byte: number): void {
    this.reserve(1);
    this.buffer[this.length++] = byte;
  }

  private reserve(extra: number): void {
    if (this.length + extra <= this.buffer.length) return;
    let capacity = this.buffer.length * 2;
    while (capacity < this.length + extra) {
      capacity *= 2;
    }
    const next = new Uint8Array(capacity);
    next.set(this.buffer.subarray(0, this.length));
    this.buffer = next;
  }
}

// ============================================================================
// Schema-driven Datum Writer
// ============================================================================

/** Writes one value of a fixed schema */
export type DatumWriter = (value: unknown, encoder: AvroEncoder) => void;

/**
 * Compile a schema into a function that encodes values of that schema.
 *
 * Longs accept `bigint` or integral `number`; records accept plain objects
 * (missing fields are written as null); unions pick the first branch the
 * value fits.
 *
 * @throws DecodeError('INVALID_SCHEMA') if the schema is malformed
 */
export function compileDatumWriter(schema: unknown): DatumWriter {
  const resolved = resolveSchema(schema);
  return (value, encoder) => writeResolved(resolved, value, encoder, '$');
}

function writeResolved(schema: ResolvedSchema, value: unknown, encoder: AvroEncoder, path: string): void {
  switch (schema.kind) {
    case 'primitive':
      writePrimitive(schema.type, value, encoder, path);
      return;
    case 'record': {
      if (!isPlainObject(value)) {
        throw invalid(`record ${schema.name}`, value, path);
      }
      for (const field of schema.fields) {
        writeResolved(field.schema, getField(value, field.name) ?? null, encoder, `${path}.${field.name}`);
      }
      return;
    }
    case 'enum': {
      const index = typeof value === 'string' ? schema.symbols.indexOf(value) : -1;
      if (index < 0) {
        throw invalid(`one of [${schema.symbols.join(', ')}]`, value, path);
      }
      encoder.writeEnum(index);
      return;
    }
    case 'array': {
      if (!Array.isArray(value)) {
        throw invalid('array', value, path);
      }
      const items = schema.items;
      let i = 0;
      encoder.writeArray(value, (item) => writeResolved(items, item, encoder, `${path}[${i++}]`));
      return;
    }
    case 'map': {
      if (!isPlainObject(value) && !(value instanceof Map)) {
        throw invalid('map', value, path);
      }
      const values = schema.values;
      encoder.writeMap<unknown>(value, (item) => writeResolved(values, item, encoder, `${path}{}`));
      return;
    }
    case 'fixed': {
      if (!(value instanceof Uint8Array) || value.length !== schema.size) {
        throw invalid(`fixed(${schema.size})`, value, path);
      }
      encoder.writeFixed(value, schema.size);
      return;
    }
    case 'union': {
      const index = schema.branches.findIndex((branch) => fitsBranch(branch, value));
      if (index < 0) {
        throw invalid('a value matching one union branch', value, path);
      }
      encoder.writeUnionIndex(index);
      writeResolved(schema.branches[index], value, encoder, path);
      return;
    }
  }
}

function writePrimitive(type: string, value: unknown, encoder: AvroEncoder, path: string): void {
  switch (type) {
    case 'null':
      if (value !== null && value !== undefined) throw invalid('null', value, path);
      encoder.writeNull();
      return;
    case 'boolean':
      if (typeof value !== 'boolean') throw invalid('boolean', value, path);
      encoder.writeBoolean(value);
      return;
    case 'int':
      if (typeof value !== 'number' || !Number.isInteger(value)) throw invalid('int', value, path);
      encoder.writeInt(value);
      return;
    case 'long':
      if (typeof value === 'bigint' || (typeof value === 'number' && Number.isInteger(value))) {
        encoder.writeLong(value);
        return;
      }
      throw invalid('long', value, path);
    case 'float':
      if (typeof value !== 'number') throw invalid('float', value, path);
      encoder.writeFloat(value);
      return;
    case 'double':
      if (typeof value !== 'number') throw invalid('double', value, path);
      encoder.writeDouble(value);
      return;
    case 'bytes':
      if (!(value instanceof Uint8Array)) throw invalid('bytes', value, path);
      encoder.writeBytes(value);
      return;
    case 'string':
      if (typeof value !== 'string') throw invalid('string', value, path);
      encoder.writeString(value);
      return;
    default:
      throw invalid(type, value, path);
  }
}

/**
 * Shallow check used to pick a union branch.
 */
function fitsBranch(schema: ResolvedSchema, value: unknown): boolean {
  switch (schema.kind) {
    case 'primitive':
      switch (schema.type) {
        case 'null':
          return value === null || value === undefined;
        case 'boolean':
          return typeof value === 'boolean';
        case 'int':
          return typeof value === 'number' && Number.isInteger(value);
        case 'long':
          return typeof value === 'bigint' || (typeof value === 'number' && Number.isInteger(value));
        case 'float':
        case 'double':
          return typeof value === 'number';
        case 'bytes':
          return value instanceof Uint8Array;
        case 'string':
          return typeof value === 'string';
      }
      return false;
    case 'record':
      return isPlainObject(value);
    case 'enum':
      return typeof value === 'string' && schema.symbols.includes(value);
    case 'array':
      return Array.isArray(value);
    case 'map':
      return isPlainObject(value) || value instanceof Map;
    case 'fixed':
      return value instanceof Uint8Array && value.length === schema.size;
    case 'union':
      return false;
  }
}

function invalid(expected: string, value: unknown, path: string): EncodeError {
  let shown: string;
  if (typeof value === 'bigint') {
    shown = `${value}n`;
  } else if (value instanceof Uint8Array) {
    shown = 'bytes';
  } else if (Array.isArray(value)) {
    shown = 'array';
  } else if (typeof value === 'object' && value !== null) {
    shown = 'object';
  } else {
    shown = String(JSON.stringify(value));
  }
  return new EncodeError(`Cannot encode ${shown} at ${path}: expected ${expected}`, path);
}
