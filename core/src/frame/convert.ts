/**
 * Column Value Conversion
 *
 * Checks decoded (or user-supplied) values against a column type and brings
 * them into the column's representation.
 */

import { ColumnError } from '../errors.js';
import { getField, isPlainObject, setField } from '../avro/types.js';
import { formatColumnType, type ColumnType, type TimeUnit } from '../schema/types.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A value held by a column.
 *
 * - `number`: Int32, Float32, Float64, Date (days since epoch)
 * - `bigint`: Int64, Datetime (count of the column's unit since epoch)
 * - `string`: String, Enum symbol
 */
export type ColumnValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | Uint8Array
  | ColumnValue[]
  | StructValue;

export interface StructValue {
  [field: string]: ColumnValue;
}

const INT32_MIN = -(2 ** 31);
const INT32_MAX = 2 ** 31 - 1;

const UNITS_PER_MILLISECOND: Record<TimeUnit, bigint> = {
  ms: 1n,
  us: 1000n,
  ns: 1000000n,
};

// ============================================================================
// Conversion
// ============================================================================

/**
 * Convert one value to the representation of `type`. `null` and `undefined`
 * become `null` for every type.
 *
 * Besides the exact representation this accepts integral numbers for
 * Int64 and Datetime columns, and `Date` objects for Datetime columns.
 *
 * @param path - Location of the value, used in error messages
 * @throws ColumnError('TYPE_MISMATCH') if the value does not fit the type
 */
export function convertValue(value: unknown, type: ColumnType, path: string): ColumnValue {
  if (value === null || value === undefined) {
    return null;
  }

  if (typeof type === 'string') {
    switch (type) {
      case 'null':
        break;
      case 'boolean':
        if (typeof value === 'boolean') return value;
        break;
      case 'int32':
        if (typeof value === 'number' && Number.isInteger(value) && value >= INT32_MIN && value <= INT32_MAX) {
          return value;
        }
        break;
      case 'date':
        if (typeof value === 'number' && Number.isInteger(value)) return value;
        break;
      case 'int64':
        if (typeof value === 'bigint') return BigInt.asIntN(64, value) === value ? value : mismatch(value, type, path);
        if (typeof value === 'number' && Number.isSafeInteger(value)) return BigInt(value);
        break;
      case 'float32':
      case 'float64':
        if (typeof value === 'number') return value;
        break;
      case 'binary':
        if (value instanceof Uint8Array) return value;
        break;
      case 'string':
        if (typeof value === 'string') return value;
        break;
    }
    return mismatch(value, type, path);
  }

  switch (type.type) {
    case 'enum':
      if (typeof value === 'string' && type.categories.includes(value)) return value;
      break;
    case 'datetime':
      if (typeof value === 'bigint') return value;
      if (typeof value === 'number' && Number.isSafeInteger(value)) return BigInt(value);
      if (value instanceof Date && !Number.isNaN(value.getTime())) {
        return BigInt(value.getTime()) * UNITS_PER_MILLISECOND[type.timeUnit];
      }
      break;
    case 'list':
      if (Array.isArray(value)) {
        const inner = type.inner;
        return value.map((item: unknown, i) => convertValue(item, inner, `${path}[${i}]`));
      }
      break;
    case 'struct':
      if (isPlainObject(value) && !(value instanceof Uint8Array) && !(value instanceof Date)) {
        const struct: StructValue = {};
        for (const field of type.fields) {
          const converted = convertValue(getField(value, field.name), field.type, `${path}.${field.name}`);
          setField(struct, field.name, converted);
        }
        return struct;
      }
      break;
  }
  return mismatch(value, type, path);
}

/**
 * Narrow a column value to a struct value.
 */
export function isStructValue(value: ColumnValue): value is StructValue {
  return typeof value === 'object' && value !== null && !Array.isArray(value) && !(value instanceof Uint8Array);
}

function mismatch(value: unknown, type: ColumnType, path: string): never {
  throw new ColumnError(
    `Value ${describeValue(value)} at ${path} does not fit column type ${formatColumnType(type)}`,
    'TYPE_MISMATCH',
    path.split(/[.[]/, 1)[0]
  );
}

/**
 * Short rendering of a value for messages.
 */
export function describeValue(value: unknown): string {
  if (typeof value === 'bigint') return `${value}n`;
  if (typeof value === 'string') return JSON.stringify(value);
  if (value instanceof Uint8Array) return `<${value.length} bytes>`;
  if (value instanceof Date) return value.toISOString();
  if (Array.isArray(value)) return `[${value.length} items]`;
  if (typeof value === 'object' && value !== null) return 'object';
  return String(value);
}
