/**
 * Writing Frames as Avro
 *
 * Maps a column schema back to an Avro record schema and encodes frames as
 * object container files that {@link scanAvro} reads back with the same
 * schema.
 *
 * Every column except Null-typed ones is written as `["null", T]`.
 * Nanosecond datetimes have no Avro counterpart this writer will produce.
 */

import { writeFile } from 'node:fs/promises';
import type { Writable } from 'node:stream';
import { encodeContainer } from '../avro/container.js';
import type { AvroRecord, AvroRecordField, AvroType } from '../avro/types.js';
import { SINK_COMPONENT } from '../constants.js';
import { SchemaError, SourceError } from '../errors.js';
import type { Frame } from '../frame/frame.js';
import { createNoopLogger, withContext } from '../logging.js';
import { parseWriteOptions, type WriteOptions } from '../scan/options.js';
import { formatColumnType, type ColumnSchema, type ColumnType } from '../schema/types.js';

const AVRO_NAME = /^[A-Za-z_][A-Za-z0-9_]*$/;

export type AvroDestination = string | URL | Writable;

// ============================================================================
// Schema Mapping
// ============================================================================

/**
 * Build the Avro record schema a frame with `schema` is written with.
 *
 * @throws SchemaError('INVALID_FIELD_NAME') for a name Avro does not accept
 * @throws SchemaError('UNSUPPORTED_TYPE') for nanosecond datetimes
 *
 * @example
 * ```ts
 * toAvroSchema([{ name: 'id', type: 'int64' }]);
 * // { type: 'record', name: 'Record', fields: [{ name: 'id', type: ['null', 'long'], default: null }] }
 * ```
 */
export function toAvroSchema(schema: ColumnSchema, options: { recordName?: string } = {}): AvroRecord {
  const recordName = options.recordName ?? 'Record';
  assertAvroName(recordName, 'record');
  const names = new NameAllocator();
  names.claim(recordName);
  return {
    type: 'record',
    name: recordName,
    fields: toAvroFields(schema, recordName, names),
  };
}

function toAvroFields(schema: ColumnSchema, path: string, names: NameAllocator): AvroRecordField[] {
  return schema.map((field) => {
    assertAvroName(field.name, 'field');
    return {
      name: field.name,
      type: toAvroType(field.type, `${path}_${field.name}`, names),
      default: null,
    };
  });
}

function toAvroType(type: ColumnType, path: string, names: NameAllocator): AvroType {
  return type === 'null' ? 'null' : ['null', toAvroBaseType(type, path, names)];
}

function toAvroBaseType(type: Exclude<ColumnType, 'null'>, path: string, names: NameAllocator): AvroType {
  switch (type) {
    case 'boolean':
      return 'boolean';
    case 'int32':
      return 'int';
    case 'int64':
      return 'long';
    case 'float32':
      return 'float';
    case 'float64':
      return 'double';
    case 'binary':
      return 'bytes';
    case 'string':
      return 'string';
    case 'date':
      return { type: 'int', logicalType: 'date' };
  }

  switch (type.type) {
    case 'enum':
      return { type: 'enum', name: names.claim(path), symbols: [...type.categories] };
    case 'datetime': {
      if (type.timeUnit === 'ns') {
        throw new SchemaError(
          `Cannot write ${formatColumnType(type)}: nanosecond datetimes are not supported`,
          'UNSUPPORTED_TYPE',
          type
        );
      }
      const unit = type.timeUnit === 'ms' ? 'millis' : 'micros';
      return {
        type: 'long',
        logicalType: type.timeZone === null ? `local-timestamp-${unit}` : `timestamp-${unit}`,
      };
    }
    case 'list':
      return { type: 'array', items: toAvroType(type.inner, `${path}_item`, names) };
    case 'struct': {
      const name = names.claim(path);
      return { type: 'record', name, fields: toAvroFields(type.fields, name, names) };
    }
  }
}

function assertAvroName(name: string, what: 'record' | 'field'): void {
  if (!AVRO_NAME.test(name)) {
    throw new SchemaError(
      `Invalid Avro ${what} name "${name}": names must match [A-Za-z_][A-Za-z0-9_]*`,
      'INVALID_FIELD_NAME',
      name
    );
  }
}

/**
 * Hands out unique names for generated named types.
 */
class NameAllocator {
  private readonly used = new Set<string>();

  claim(base: string): string {
    let name = base;
    for (let n = 2; this.used.has(name); n++) {
      name = `${base}_${n}`;
    }
    this.used.add(name);
    return name;
  }
}

// ============================================================================
// Encoding
// ============================================================================

/**
 * Encode a frame as a complete Avro object container file.
 *
 * @throws ConfigError('INVALID_OPTION') for invalid options
 */
export function encodeAvro(frame: Frame, options: WriteOptions = {}): Uint8Array {
  const { codec, blockSize, recordName, metadata, logger } = parseWriteOptions(options);
  const schema = toAvroSchema(frame.schema, { recordName });
  const bytes = encodeContainer(schema, frame.toRecords(), { codec, metadata, blockSize });

  withContext(logger ?? createNoopLogger(), { component: SINK_COMPONENT }).debug('Encoded frame', {
    rows: frame.height,
    columns: frame.width,
    bytes: bytes.length,
    codec,
  });
  return bytes;
}

/**
 * Write a frame as an Avro container file to a path, file URL or writable
 * stream. Streams are written to but not ended.
 *
 * @throws SourceError('SOURCE_WRITE_FAILED') if the destination cannot be written
 */
export async function writeAvro(frame: Frame, dest: AvroDestination, options: WriteOptions = {}): Promise<void> {
  const bytes = encodeAvro(frame, options);
  const label = typeof dest === 'string' ? dest : dest instanceof URL ? dest.href : '<stream>';

  try {
    if (typeof dest === 'string' || dest instanceof URL) {
      await writeFile(dest, bytes);
    } else {
      await new Promise<void>((resolve, reject) => {
        dest.write(bytes, (error) => (error ? reject(error) : resolve()));
      });
    }
  } catch (error) {
    const cause = error instanceof Error ? error : new Error(String(error));
    throw new SourceError(`Failed to write ${label}: ${cause.message}`, 'SOURCE_WRITE_FAILED', { path: label, cause });
  }
}
