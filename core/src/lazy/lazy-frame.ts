/**
 * LazyFrame
 *
 * An immutable query plan over an IO source. `collect()` pushes the leading
 * projection, predicate and limit into the source request and applies the
 * remaining steps to the concatenated batches.
 *
 * Pushdown rules, in plan order:
 * - `select` is pushed while nothing has stayed behind and no predicate or
 *   limit has been pushed
 * - `filter` is pushed while nothing has stayed behind and no limit has been
 *   pushed; several pushed filters are combined with `$and`
 * - `limit` is pushed while every step left behind is `withRowIndex`
 * - `withRowIndex` always stays behind
 */

import { ColumnError, ConfigError } from '../errors.js';
import { Frame } from '../frame/frame.js';
import type { Filter } from '../frame/predicate.js';
import { formatSchema, type ColumnSchema, type SchemaField } from '../schema/types.js';
import type { BatchRequest, IoSource } from './io-source.js';

// ============================================================================
// Plan
// ============================================================================

/** A column reference: a name, or an ordinal (negative counts from the end) */
export type ColumnRef = string | number;

export type PlanStep =
  | { kind: 'select'; columns: readonly ColumnRef[] }
  | { kind: 'filter'; predicate: Filter }
  | { kind: 'limit'; n: number }
  | { kind: 'withRowIndex'; name: string; offset: number };

/**
 * A plan split into the request handed to the source and the steps applied afterwards.
 */
export interface PhysicalPlan {
  request: BatchRequest;
  /** Steps applied to the collected frame, with column references resolved to names */
  residual: PlanStep[];
}

// ============================================================================
// LazyFrame
// ============================================================================

export class LazyFrame {
  constructor(
    private readonly source: IoSource,
    private readonly steps: readonly PlanStep[] = []
  ) {}

  /**
   * Keep the given columns, in order.
   */
  select(columns: readonly ColumnRef[]): LazyFrame {
    return this.with({ kind: 'select', columns: [...columns] });
  }

  filter(predicate: Filter): LazyFrame {
    return this.with({ kind: 'filter', predicate });
  }

  /**
   * Keep at most `n` rows.
   *
   * @throws ConfigError if `n` is not a non-negative integer
   */
  limit(n: number): LazyFrame {
    if (!Number.isInteger(n) || n < 0) {
      throw new ConfigError(`limit must be a non-negative integer, got ${n}`, [
        { path: 'n', message: 'Expected a non-negative integer' },
      ]);
    }
    return this.with({ kind: 'limit', n });
  }

  head(n: number = 5): LazyFrame {
    return this.limit(n);
  }

  /**
   * Prepend an Int64 row counter starting at `offset`.
   */
  withRowIndex(name: string, offset: number = 0): LazyFrame {
    if (!Number.isInteger(offset) || offset < 0) {
      throw new ConfigError(`Row index offset must be a non-negative integer, got ${offset}`, [
        { path: 'offset', message: 'Expected a non-negative integer' },
      ]);
    }
    return this.with({ kind: 'withRowIndex', name, offset });
  }

  /**
   * Schema of the plan's result. Resolves the source schema on first use.
   */
  async schema(): Promise<ColumnSchema> {
    let schema = await this.source.schema();
    for (const step of this.steps) {
      schema = stepSchema(schema, step);
    }
    return schema;
  }

  /**
   * Split the plan into the pushed-down request and the residual steps.
   */
  async explain(): Promise<PhysicalPlan> {
    let schema = await this.source.schema();
    const request: BatchRequest = {};
    const residual: PlanStep[] = [];

    for (const step of this.steps) {
      switch (step.kind) {
        case 'select': {
          const columns = resolveColumns(schema, step.columns);
          if (residual.length === 0 && request.predicate === undefined && request.nRows === undefined) {
            request.columns = columns;
          } else {
            residual.push({ kind: 'select', columns });
          }
          break;
        }
        case 'filter':
          if (residual.length === 0 && request.nRows === undefined) {
            request.predicate = request.predicate === undefined
              ? step.predicate
              : { $and: [request.predicate, step.predicate] };
          } else {
            residual.push(step);
          }
          break;
        case 'limit':
          if (residual.every((pending) => pending.kind === 'withRowIndex')) {
            request.nRows = Math.min(request.nRows ?? step.n, step.n);
          } else {
            residual.push(step);
          }
          break;
        case 'withRowIndex':
          residual.push(step);
          break;
      }
      schema = stepSchema(schema, step);
    }

    return { request, residual };
  }

  /**
   * Run the plan and materialise the result.
   */
  async collect(): Promise<Frame> {
    const { request, residual } = await this.explain();

    const batches: Frame[] = [];
    for await (const batch of this.source.batches(request)) {
      batches.push(batch);
    }

    let schema = await this.source.schema();
    if (request.columns !== undefined) {
      schema = projectSchema(schema, request.columns);
    }
    let frame = Frame.concat(batches, schema);

    for (const step of residual) {
      frame = applyStep(frame, step);
    }
    return frame;
  }

  /**
   * Release anything the source holds for a scan that never ran.
   */
  async close(): Promise<void> {
    await this.source.release?.();
  }

  private with(step: PlanStep): LazyFrame {
    return new LazyFrame(this.source, [...this.steps, step]);
  }
}

// ============================================================================
// Helpers
// ============================================================================

function resolveColumns(schema: ColumnSchema, refs: readonly ColumnRef[]): string[] {
  return refs.map((ref) => {
    if (typeof ref === 'string') {
      return ref;
    }
    const index = ref < 0 ? schema.length + ref : ref;
    if (!Number.isInteger(ref) || index < 0 || index >= schema.length) {
      throw new ColumnError(
        `Column ordinal ${ref} out of bounds for ${schema.length} columns`,
        'OUT_OF_BOUNDS'
      );
    }
    return schema[index].name;
  });
}

function projectSchema(schema: ColumnSchema, names: readonly string[]): SchemaField[] {
  return names.map((name) => {
    const field = schema.find((candidate) => candidate.name === name);
    if (field === undefined) {
      throw new ColumnError(`Column "${name}" not found in ${formatSchema(schema)}`, 'COLUMN_NOT_FOUND', name);
    }
    return field;
  });
}

function stepSchema(schema: ColumnSchema, step: PlanStep): ColumnSchema {
  switch (step.kind) {
    case 'select':
      return projectSchema(schema, resolveColumns(schema, step.columns));
    case 'withRowIndex':
      return [{ name: step.name, type: 'int64' }, ...schema];
    case 'filter':
    case 'limit':
      return schema;
  }
}

function applyStep(frame: Frame, step: PlanStep): Frame {
  switch (step.kind) {
    case 'select':
      return frame.select(resolveColumns(frame.schema, step.columns));
    case 'filter':
      return frame.filter(step.predicate);
    case 'limit':
      return frame.head(step.n);
    case 'withRowIndex':
      return frame.withRowIndex(step.name, step.offset);
  }
}
