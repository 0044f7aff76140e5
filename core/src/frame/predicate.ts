/**
 * Row Predicates
 *
 * MongoDB-style filter documents evaluated against frame rows.
 *
 * @example
 * ```ts
 * const filter: Filter = {
 *   $or: [{ status: 'active' }, { 'address.city': { $in: ['Lyon', 'Nantes'] } }],
 *   score: { $gte: 10 },
 * };
 * frame.filter(filter);
 * ```
 */

import { ColumnError, ValidationError } from '../errors.js';
import { isPlainObject } from '../avro/types.js';
import { isStructValue, type ColumnValue, type StructValue } from './convert.js';

// ============================================================================
// Types
// ============================================================================

/**
 * Operators applicable to a single field.
 */
export interface FieldOperators {
  $eq?: ColumnValue;
  $ne?: ColumnValue;
  $gt?: ColumnValue;
  $gte?: ColumnValue;
  $lt?: ColumnValue;
  $lte?: ColumnValue;
  $in?: readonly ColumnValue[];
  $nin?: readonly ColumnValue[];
  /** Matches non-null values when true, null values when false */
  $exists?: boolean;
  $regex?: string | RegExp;
}

/**
 * Condition on a field: a literal (implicit `$eq`) or an operator object.
 */
export type FieldCondition = ColumnValue | FieldOperators;

/**
 * Filter document. Keys are column names, or dotted paths into struct
 * columns, plus the logical operators.
 */
export interface Filter {
  $and?: readonly Filter[];
  $or?: readonly Filter[];
  $nor?: readonly Filter[];
  $not?: Filter;
  [path: string]: FieldCondition | readonly Filter[] | Filter | undefined;
}

// ============================================================================
// Constants
// ============================================================================

const COMPARISON_OPERATORS = new Set([
  '$eq',
  '$ne',
  '$gt',
  '$gte',
  '$lt',
  '$lte',
  '$in',
  '$nin',
  '$exists',
  '$regex',
]);

const LIST_OPERATORS = new Set(['$and', '$or', '$nor']);

export function isComparisonOperator(key: string): boolean {
  return COMPARISON_OPERATORS.has(key);
}

export function isLogicalOperator(key: string): boolean {
  return LIST_OPERATORS.has(key) || key === '$not';
}

/**
 * An object is an operator condition if it is non-empty and every key starts with `$`.
 */
function isOperatorObject(value: unknown): value is FieldOperators {
  if (!isPlainObject(value) || value instanceof Uint8Array || value instanceof RegExp) {
    return false;
  }
  const keys = Object.keys(value);
  return keys.length > 0 && keys.every((key) => key.startsWith('$'));
}

// ============================================================================
// Value Comparison
// ============================================================================

/**
 * Order two values. Numbers and bigints compare with each other; strings,
 * booleans and byte arrays compare within their kind.
 *
 * @returns negative, zero or positive, or undefined if the values are not comparable
 */
export function compareValues(a: unknown, b: unknown): number | undefined {
  if (typeof a === 'bigint' && typeof b === 'number') {
    return Number.isInteger(b) ? orderBigInts(a, BigInt(b)) : orderNumbers(Number(a), b);
  }
  if (typeof a === 'number' && typeof b === 'bigint') {
    return Number.isInteger(a) ? orderBigInts(BigInt(a), b) : orderNumbers(a, Number(b));
  }
  if (typeof a === 'number' && typeof b === 'number') {
    return orderNumbers(a, b);
  }
  if (typeof a === 'bigint' && typeof b === 'bigint') {
    return orderBigInts(a, b);
  }
  if (typeof a === 'boolean' && typeof b === 'boolean') {
    return Number(a) - Number(b);
  }
  if (typeof a === 'string' && typeof b === 'string') {
    return a < b ? -1 : a > b ? 1 : 0;
  }
  if (a instanceof Uint8Array && b instanceof Uint8Array) {
    const length = Math.min(a.length, b.length);
    for (let i = 0; i < length; i++) {
      if (a[i] !== b[i]) return a[i] - b[i];
    }
    return a.length - b.length;
  }
  return undefined;
}

function orderNumbers(a: number, b: number): number | undefined {
  // NaN is unordered
  if (Number.isNaN(a) || Number.isNaN(b)) return undefined;
  return a < b ? -1 : a > b ? 1 : 0;
}

function orderBigInts(a: bigint, b: bigint): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Deep equality of two values, with numbers equal to bigints of the same value.
 */
export function valuesEqual(a: unknown, b: unknown): boolean {
  if (a === null || a === undefined || b === null || b === undefined) {
    return (a ?? null) === (b ?? null);
  }
  if (Array.isArray(a) || Array.isArray(b)) {
    return Array.isArray(a) && Array.isArray(b)
      && a.length === b.length
      && a.every((item: unknown, i) => valuesEqual(item, b[i]));
  }
  const compared = compareValues(a, b);
  if (compared !== undefined) {
    return compared === 0;
  }
  if (isPlainObject(a) && isPlainObject(b)) {
    const keys = Object.keys(a);
    return keys.length === Object.keys(b).length
      && keys.every((key) => Object.hasOwn(b, key) && valuesEqual(a[key], b[key]));
  }
  return false;
}

// ============================================================================
// Validation
// ============================================================================

/**
 * Top-level columns a filter reads. A key that names a column exactly is
 * taken as is; otherwise its first dotted segment is the column.
 */
export function predicateColumns(filter: Filter, columns: readonly string[]): string[] {
  const found = new Set<string>();
  const visit = (node: Filter): void => {
    const entries: [string, unknown][] = Object.entries(node);
    for (const [key, condition] of entries) {
      if (LIST_OPERATORS.has(key)) {
        asFilters(condition).forEach(visit);
      } else if (key === '$not') {
        if (isFilter(condition)) visit(condition);
      } else {
        found.add(columns.includes(key) ? key : key.split('.', 1)[0]);
      }
    }
  };
  visit(filter);
  return [...found];
}

/**
 * Check that a filter is well formed and reads only existing columns.
 *
 * @throws ValidationError('INVALID_FILTER') for unknown operators or bad operands
 * @throws ColumnError('COLUMN_NOT_FOUND') for a path whose column does not exist
 */
export function validateFilter(filter: unknown, columns: readonly string[]): asserts filter is Filter {
  if (!isFilter(filter)) {
    throw new ValidationError('Filter must be an object', 'INVALID_FILTER');
  }

  const entries: [string, unknown][] = Object.entries(filter);
  for (const [key, condition] of entries) {
    if (condition === undefined) continue;

    if (LIST_OPERATORS.has(key)) {
      if (!Array.isArray(condition)) {
        throw new ValidationError(`${key} requires an array of filters`, 'INVALID_FILTER', key);
      }
      condition.forEach((sub: unknown) => validateFilter(sub, columns));
      continue;
    }
    if (key === '$not') {
      validateFilter(condition, columns);
      continue;
    }
    if (key.startsWith('$')) {
      throw new ValidationError(`Unknown logical operator ${key}`, 'INVALID_FILTER', key);
    }

    const column = columns.includes(key) ? key : key.split('.', 1)[0];
    if (!columns.includes(column)) {
      throw new ColumnError(`Filter references unknown column "${column}"`, 'COLUMN_NOT_FOUND', column);
    }
    if (isOperatorObject(condition)) {
      validateOperators(key, condition);
    }
  }
}

function validateOperators(path: string, operators: FieldOperators): void {
  const entries: [string, unknown][] = Object.entries(operators);
  for (const [op, operand] of entries) {
    if (!isComparisonOperator(op)) {
      throw new ValidationError(`Unknown operator ${op} on "${path}"`, 'INVALID_FILTER', path);
    }
    if ((op === '$in' || op === '$nin') && !Array.isArray(operand)) {
      throw new ValidationError(`${op} on "${path}" requires an array`, 'INVALID_FILTER', path);
    }
    if (op === '$exists' && typeof operand !== 'boolean') {
      throw new ValidationError(`$exists on "${path}" requires a boolean`, 'INVALID_FILTER', path);
    }
    if (op === '$regex') {
      if (typeof operand === 'string') {
        try {
          new RegExp(operand);
        } catch {
          throw new ValidationError(`Invalid $regex pattern on "${path}"`, 'INVALID_FILTER', path);
        }
      } else if (!(operand instanceof RegExp)) {
        throw new ValidationError(`$regex on "${path}" requires a string or RegExp`, 'INVALID_FILTER', path);
      }
    }
  }
}

function isFilter(value: unknown): value is Filter {
  return isPlainObject(value) && !(value instanceof Uint8Array) && !(value instanceof RegExp);
}

// ============================================================================
// Evaluation
// ============================================================================

/**
 * Resolve a (possibly dotted) path against a row. Missing struct members and
 * paths through null resolve to null.
 */
export function resolvePath(row: StructValue, path: string): ColumnValue {
  if (Object.hasOwn(row, path)) {
    return row[path];
  }
  const [column, ...rest] = path.split('.');
  let value: ColumnValue = Object.hasOwn(row, column) ? row[column] : null;
  for (const segment of rest) {
    if (!isStructValue(value) || !Object.hasOwn(value, segment)) {
      return null;
    }
    value = value[segment];
  }
  return value;
}

/**
 * Evaluate a filter against one row. Fields in one document are ANDed.
 * Range operators never match null.
 */
export function evaluateFilter(filter: Filter, row: StructValue): boolean {
  const entries: [string, unknown][] = Object.entries(filter);
  for (const [key, condition] of entries) {
    if (condition === undefined) continue;

    switch (key) {
      case '$and':
        if (!asFilters(condition).every((sub) => evaluateFilter(sub, row))) return false;
        continue;
      case '$or':
        if (!asFilters(condition).some((sub) => evaluateFilter(sub, row))) return false;
        continue;
      case '$nor':
        if (asFilters(condition).some((sub) => evaluateFilter(sub, row))) return false;
        continue;
      case '$not':
        if (isFilter(condition) && evaluateFilter(condition, row)) return false;
        continue;
    }

    const value = resolvePath(row, key);
    if (isOperatorObject(condition)) {
      if (!matchesOperators(value, condition)) return false;
    } else if (!valuesEqual(value, condition)) {
      return false;
    }
  }
  return true;
}

function asFilters(condition: unknown): readonly Filter[] {
  return Array.isArray(condition) ? condition.filter(isFilter) : [];
}

function matchesOperators(value: ColumnValue, operators: FieldOperators): boolean {
  const entries: [string, unknown][] = Object.entries(operators);
  for (const [op, operand] of entries) {
    switch (op) {
      case '$eq':
        if (!valuesEqual(value, operand)) return false;
        break;
      case '$ne':
        if (valuesEqual(value, operand)) return false;
        break;
      case '$gt':
      case '$gte':
      case '$lt':
      case '$lte': {
        if (value === null || operand === null || operand === undefined) return false;
        const compared = compareValues(value, operand);
        if (compared === undefined) return false;
        if (op === '$gt' && !(compared > 0)) return false;
        if (op === '$gte' && !(compared >= 0)) return false;
        if (op === '$lt' && !(compared < 0)) return false;
        if (op === '$lte' && !(compared <= 0)) return false;
        break;
      }
      case '$in':
        if (!Array.isArray(operand) || !operand.some((candidate: unknown) => valuesEqual(value, candidate))) {
          return false;
        }
        break;
      case '$nin':
        if (Array.isArray(operand) && operand.some((candidate: unknown) => valuesEqual(value, candidate))) {
          return false;
        }
        break;
      case '$exists':
        if ((value !== null) !== operand) return false;
        break;
      case '$regex': {
        if (typeof value !== 'string') return false;
        const pattern = operand instanceof RegExp ? operand : new RegExp(String(operand));
        pattern.lastIndex = 0;
        if (!pattern.test(value)) return false;
        break;
      }
      default:
        throw new ValidationError(`Unknown operator ${op}`, 'INVALID_FILTER');
    }
  }
  return true;
}
