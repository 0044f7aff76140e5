/**
 * Avro → Column Schema Translation
 *
 * Maps an Avro schema document onto column types. Translation is total over
 * the supported subset and fails loudly on anything else; it never guesses.
 *
 * Each node is first parsed into a tagged {@link AvroNode}, then dispatched
 * through ordered guards:
 *
 * 1. recognised logical types (timestamps, date)
 * 2. unrecognised logical types on int/long/bytes/string (fatal unless
 *    `convertLogicalTypes` is set, in which case the physical type is used)
 * 3. primitives
 * 4. enums
 * 5. arrays
 * 6. records
 * 7. everything else is unsupported
 *
 * @see https://avro.apache.org/docs/current/specification/#logical-types
 */

import { SchemaError } from '../errors.js';
import { isAvroPrimitive, isPlainObject, type AvroPrimitive } from '../avro/types.js';
import type { ColumnSchema, ColumnType, SchemaField } from './types.js';

// ============================================================================
// Types
// ============================================================================

export interface TranslateOptions {
  /**
   * Read int/long/bytes/string values carrying an unrecognised logical type
   * as their physical type instead of failing.
   */
  convertLogicalTypes?: boolean;
  /**
   * Wrap a non-record top-level schema into a one-field record with this name.
   */
  singleColName?: string;
}

export interface TranslatedSchema {
  schema: ColumnSchema;
  /** True if the top-level value was wrapped into a one-field record */
  singleton: boolean;
}

/**
 * Parsed shape of one (already unwrapped) schema node.
 * Bare primitive names and `{ "type": <primitive> }` parse to the same variant.
 */
export type AvroNode =
  | { kind: 'primitive'; primitive: AvroPrimitive; logicalType?: string }
  | { kind: 'enum'; symbols: string[] }
  | { kind: 'array'; items: unknown }
  | { kind: 'record'; fields: unknown[] }
  | { kind: 'unsupported' };

// ============================================================================
// Recognised Logical Types
// ============================================================================

const LOGICAL_TYPES: Readonly<Record<string, { physical: AvroPrimitive; type: ColumnType }>> = {
  'timestamp-millis': { physical: 'long', type: { type: 'datetime', timeUnit: 'ms', timeZone: 'UTC' } },
  'timestamp-micros': { physical: 'long', type: { type: 'datetime', timeUnit: 'us', timeZone: 'UTC' } },
  'timestamp-nanos': { physical: 'long', type: { type: 'datetime', timeUnit: 'ns', timeZone: 'UTC' } },
  'local-timestamp-millis': { physical: 'long', type: { type: 'datetime', timeUnit: 'ms', timeZone: null } },
  'local-timestamp-micros': { physical: 'long', type: { type: 'datetime', timeUnit: 'us', timeZone: null } },
  'local-timestamp-nanos': { physical: 'long', type: { type: 'datetime', timeUnit: 'ns', timeZone: null } },
  date: { physical: 'int', type: 'date' },
};

/** Physical types whose unrecognised logical types may fall back */
const FALLBACK_PHYSICAL_TYPES: ReadonlySet<AvroPrimitive> = new Set(['int', 'long', 'bytes', 'string']);

const PRIMITIVE_TYPES: Readonly<Record<AvroPrimitive, ColumnType>> = {
  null: 'null',
  boolean: 'boolean',
  int: 'int32',
  long: 'int64',
  float: 'float32',
  double: 'float64',
  bytes: 'binary',
  string: 'string',
};

// ============================================================================
// Parsing
// ============================================================================

/**
 * Collapse `["null", T]`, `[T, "null"]` and `[T]` to `T`. One level only.
 */
export function unwrapNullable(node: unknown): unknown {
  if (Array.isArray(node)) {
    if (node.length === 2 && node[0] === 'null') return node[1];
    if (node.length === 2 && node[1] === 'null') return node[0];
    if (node.length === 1) return node[0];
  }
  return node;
}

/**
 * Parse a schema node into its tagged shape.
 */
export function parseAvroNode(node: unknown): AvroNode {
  if (isAvroPrimitive(node)) {
    return { kind: 'primitive', primitive: node };
  }
  if (!isPlainObject(node)) {
    return { kind: 'unsupported' };
  }

  const { type } = node;
  if (isAvroPrimitive(type)) {
    return typeof node.logicalType === 'string'
      ? { kind: 'primitive', primitive: type, logicalType: node.logicalType }
      : { kind: 'primitive', primitive: type };
  }
  if (type === 'enum' && Array.isArray(node.symbols) && node.symbols.every((s): s is string => typeof s === 'string')) {
    return { kind: 'enum', symbols: node.symbols };
  }
  if (type === 'array' && 'items' in node) {
    return { kind: 'array', items: node.items };
  }
  if (type === 'record' && Array.isArray(node.fields)) {
    return { kind: 'record', fields: node.fields };
  }
  return { kind: 'unsupported' };
}

// ============================================================================
// Translation
// ============================================================================

/**
 * Translate one Avro schema node into a column type.
 *
 * @throws SchemaError('UNSUPPORTED_LOGICAL_TYPE') for an unrecognised logical
 *   type on int/long/bytes/string without `convertLogicalTypes`
 * @throws SchemaError('UNSUPPORTED_TYPE') for maps, non-null unions, fixed
 *   and anything else outside the supported subset
 * @throws SchemaError('INVALID_FIELD_DEFINITION') for a record field without
 *   a string name or a type
 *
 * @example
 * ```ts
 * translateType(['null', { type: 'long', logicalType: 'timestamp-micros' }]);
 * // { type: 'datetime', timeUnit: 'us', timeZone: 'UTC' }
 * ```
 */
export function translateType(node: unknown, options: TranslateOptions = {}): ColumnType {
  const unwrapped = unwrapNullable(node);
  const parsed = parseAvroNode(unwrapped);

  switch (parsed.kind) {
    case 'primitive': {
      const { primitive, logicalType } = parsed;
      if (logicalType !== undefined) {
        const recognised = LOGICAL_TYPES[logicalType];
        if (recognised !== undefined && recognised.physical === primitive) {
          return recognised.type;
        }
        if (FALLBACK_PHYSICAL_TYPES.has(primitive) && !options.convertLogicalTypes) {
          throw new SchemaError(
            `Unsupported logical type "${logicalType}" on ${primitive} without logical type conversion: ${describe(unwrapped)}`,
            'UNSUPPORTED_LOGICAL_TYPE',
            unwrapped
          );
        }
      }
      return PRIMITIVE_TYPES[primitive];
    }
    case 'enum':
      return { type: 'enum', categories: parsed.symbols };
    case 'array':
      return { type: 'list', inner: translateType(parsed.items, options) };
    case 'record':
      return { type: 'struct', fields: translateFields(parsed.fields, options) };
    case 'unsupported':
      throw new SchemaError(`Unsupported Avro type: ${describe(unwrapped)}`, 'UNSUPPORTED_TYPE', unwrapped);
  }
}

/**
 * Translate a writer schema document into a column schema.
 *
 * A top-level record becomes one column per field. Any other top-level
 * schema is wrapped into a single column named `options.singleColName`.
 *
 * @throws SchemaError('TOP_LEVEL_NOT_RECORD') for a non-record schema
 *   without `singleColName`
 */
export function translateSchema(document: unknown, options: TranslateOptions = {}): TranslatedSchema {
  const parsed = parseAvroNode(document);
  if (parsed.kind === 'record' && isPlainObject(document) && document.type === 'record') {
    return { schema: translateFields(parsed.fields, options), singleton: false };
  }
  if (options.singleColName !== undefined) {
    return {
      schema: [{ name: options.singleColName, type: translateType(document, options) }],
      singleton: true,
    };
  }
  throw new SchemaError(
    `Top-level schema must be a record schema: ${describe(document)}`,
    'TOP_LEVEL_NOT_RECORD',
    document
  );
}

function translateFields(fields: readonly unknown[], options: TranslateOptions): SchemaField[] {
  return fields.map((field) => {
    if (!isPlainObject(field) || typeof field.name !== 'string' || !('type' in field)) {
      throw new SchemaError(
        `Invalid field definition: ${describe(field)}`,
        'INVALID_FIELD_DEFINITION',
        field
      );
    }
    return { name: field.name, type: translateType(field.type, options) };
  });
}

function describe(node: unknown): string {
  try {
    return JSON.stringify(node) ?? String(node);
  } catch {
    return String(node);
  }
}
