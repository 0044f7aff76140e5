/**
 * Avro Schema Types
 *
 * Typed views of Avro schema documents built by this package. Schemas read
 * from container files stay `unknown` until the translator or the datum
 * reader has inspected them.
 *
 * @see https://avro.apache.org/docs/current/specification/
 */

export type AvroPrimitive = 'null' | 'boolean' | 'int' | 'long' | 'float' | 'double' | 'bytes' | 'string';

export const AVRO_PRIMITIVES: readonly AvroPrimitive[] = [
  'null',
  'boolean',
  'int',
  'long',
  'float',
  'double',
  'bytes',
  'string',
];

/**
 * Primitive in object form, optionally annotated with a logical type.
 */
export interface AvroAnnotatedPrimitive {
  type: AvroPrimitive;
  logicalType?: string;
}

export interface AvroArray {
  type: 'array';
  items: AvroType;
}

export interface AvroMap {
  type: 'map';
  values: AvroType;
}

export interface AvroFixed {
  type: 'fixed';
  name: string;
  namespace?: string;
  size: number;
  logicalType?: string;
}

export interface AvroEnum {
  type: 'enum';
  name: string;
  namespace?: string;
  symbols: string[];
}

export interface AvroRecordField {
  name: string;
  type: AvroType;
  default?: unknown;
  doc?: string;
}

export interface AvroRecord {
  type: 'record';
  name: string;
  namespace?: string;
  doc?: string;
  fields: AvroRecordField[];
}

export type AvroUnion = AvroType[];

export type AvroType =
  | AvroPrimitive
  | AvroAnnotatedPrimitive
  | AvroArray
  | AvroMap
  | AvroFixed
  | AvroEnum
  | AvroRecord
  | AvroUnion;

/** Codecs the container reader and writer understand */
export type AvroCodec = 'null' | 'deflate';

/**
 * Check whether a value is an Avro primitive type name.
 */
export function isAvroPrimitive(value: unknown): value is AvroPrimitive {
  return typeof value === 'string' && AVRO_PRIMITIVES.some((primitive) => primitive === value);
}

/**
 * Check if a value is a non-null object (not an array).
 */
export function isPlainObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Read a record field. A `__proto__` field only counts when it is an own property.
 */
export function getField(record: Record<string, unknown>, name: string): unknown {
  if (name === '__proto__') {
    return Object.hasOwn(record, name) ? record[name] : undefined;
  }
  return record[name];
}

/**
 * Store a record field as an own enumerable property. Plain assignment to
 * `__proto__` would replace the prototype instead.
 */
export function setField<T>(record: { [name: string]: T }, name: string, value: T): void {
  Object.defineProperty(record, name, { value, enumerable: true, writable: true, configurable: true });
}
