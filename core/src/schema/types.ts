/**
 * Column Types
 *
 * The closed set of types a column can have, and ordered column schemas.
 * Every column is nullable; there is no nullability flag.
 */

// ============================================================================
// Types
// ============================================================================

export type TimeUnit = 'ms' | 'us' | 'ns';

export type PrimitiveColumnType =
  | 'null'
  | 'boolean'
  | 'int32'
  | 'int64'
  | 'float32'
  | 'float64'
  | 'binary'
  | 'string'
  | 'date';

export interface EnumColumnType {
  type: 'enum';
  /** Symbols in declaration order */
  categories: readonly string[];
}

export interface DatetimeColumnType {
  type: 'datetime';
  timeUnit: TimeUnit;
  /** 'UTC' for instants, null for local (wall clock) timestamps */
  timeZone: 'UTC' | null;
}

export interface ListColumnType {
  type: 'list';
  inner: ColumnType;
}

export interface StructColumnType {
  type: 'struct';
  fields: readonly SchemaField[];
}

export type ColumnType =
  | PrimitiveColumnType
  | EnumColumnType
  | DatetimeColumnType
  | ListColumnType
  | StructColumnType;

export interface SchemaField {
  readonly name: string;
  readonly type: ColumnType;
}

/**
 * Ordered (name, type) pairs. Order is significant.
 */
export type ColumnSchema = readonly SchemaField[];

// ============================================================================
// Constructors
// ============================================================================

export const ColumnTypes = {
  enum(categories: readonly string[]): EnumColumnType {
    return { type: 'enum', categories: [...categories] };
  },
  datetime(timeUnit: TimeUnit, timeZone: 'UTC' | null = null): DatetimeColumnType {
    return { type: 'datetime', timeUnit, timeZone };
  },
  list(inner: ColumnType): ListColumnType {
    return { type: 'list', inner };
  },
  struct(fields: readonly SchemaField[]): StructColumnType {
    return { type: 'struct', fields: [...fields] };
  },
};

// ============================================================================
// Equality
// ============================================================================

/**
 * Structural equality of two column types.
 */
export function columnTypesEqual(a: ColumnType, b: ColumnType): boolean {
  if (typeof a === 'string' || typeof b === 'string') {
    return a === b;
  }
  switch (a.type) {
    case 'enum':
      return b.type === 'enum'
        && a.categories.length === b.categories.length
        && a.categories.every((symbol, i) => symbol === b.categories[i]);
    case 'datetime':
      return b.type === 'datetime' && a.timeUnit === b.timeUnit && a.timeZone === b.timeZone;
    case 'list':
      return b.type === 'list' && columnTypesEqual(a.inner, b.inner);
    case 'struct':
      return b.type === 'struct' && schemasEqual(a.fields, b.fields);
  }
}

/**
 * Two schemas are equal iff they have the same ordered sequence of (name, type) pairs.
 */
export function schemasEqual(a: ColumnSchema, b: ColumnSchema): boolean {
  return a.length === b.length
    && a.every((field, i) => field.name === b[i].name && columnTypesEqual(field.type, b[i].type));
}

// ============================================================================
// Formatting
// ============================================================================

const PRIMITIVE_NAMES: Record<PrimitiveColumnType, string> = {
  null: 'Null',
  boolean: 'Boolean',
  int32: 'Int32',
  int64: 'Int64',
  float32: 'Float32',
  float64: 'Float64',
  binary: 'Binary',
  string: 'String',
  date: 'Date',
};

/**
 * Render a type for messages, e.g. `List(Datetime(us, UTC))`.
 */
export function formatColumnType(type: ColumnType): string {
  if (typeof type === 'string') {
    return PRIMITIVE_NAMES[type];
  }
  switch (type.type) {
    case 'enum':
      return `Enum([${type.categories.map((c) => JSON.stringify(c)).join(', ')}])`;
    case 'datetime':
      return `Datetime(${type.timeUnit}${type.timeZone === null ? '' : `, ${type.timeZone}`})`;
    case 'list':
      return `List(${formatColumnType(type.inner)})`;
    case 'struct':
      return `Struct{${type.fields.map((f) => `${f.name}: ${formatColumnType(f.type)}`).join(', ')}}`;
  }
}

/**
 * Render a schema for messages, e.g. `{id: Int64, name: String}`.
 */
export function formatSchema(schema: ColumnSchema): string {
  return `{${schema.map((f) => `${f.name}: ${formatColumnType(f.type)}`).join(', ')}}`;
}
