/**
 * IO Source Registration
 *
 * Contract between a batch producer and {@link LazyFrame}. A source reports
 * its schema once and then produces frames for a pushed-down request.
 */

import type { Frame } from '../frame/frame.js';
import type { Filter } from '../frame/predicate.js';
import type { ColumnSchema } from '../schema/types.js';
import { LazyFrame } from './lazy-frame.js';

// ============================================================================
// Types
// ============================================================================

/**
 * What a consumer asks of a source. Applied per batch in the order
 * projection, predicate, limit.
 */
export interface BatchRequest {
  /** Columns to keep, in order (all when absent) */
  columns?: readonly string[];
  /** Row predicate, evaluated after projection */
  predicate?: Filter;
  /** Maximum total rows over all batches */
  nRows?: number;
  /** Maximum rows per batch */
  batchSize?: number;
}

export interface IoSource {
  schema(): Promise<ColumnSchema>;
  batches(request: BatchRequest): AsyncIterable<Frame>;
  /** Drop resources held for a scan that never ran */
  release?(): Promise<void>;
}

// ============================================================================
// Registration
// ============================================================================

/**
 * Source wrapper that calls the schema callback at most once.
 */
export class RegisteredSource implements IoSource {
  private schemaPromise?: Promise<ColumnSchema>;

  constructor(private readonly source: IoSource) {}

  schema(): Promise<ColumnSchema> {
    this.schemaPromise ??= this.source.schema();
    return this.schemaPromise;
  }

  batches(request: BatchRequest): AsyncIterable<Frame> {
    return this.source.batches(request);
  }

  async release(): Promise<void> {
    await this.source.release?.();
  }
}

/**
 * Register a source and get a lazy frame over it. No work happens until the
 * frame's schema or contents are requested.
 *
 * @example
 * ```ts
 * const lf = registerIoSource({
 *   schema: async () => [{ name: 'n', type: 'int32' }],
 *   async *batches() {
 *     yield Frame.fromRecords([{ n: 1 }, { n: 2 }], [{ name: 'n', type: 'int32' }]);
 *   },
 * });
 * const frame = await lf.filter({ n: 2 }).collect();
 * ```
 */
export function registerIoSource(source: IoSource): LazyFrame {
  return new LazyFrame(new RegisteredSource(source));
}
