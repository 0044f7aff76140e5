/**
 * Scanning and Reading Avro Files
 *
 * @example
 * ```ts
 * import { scanAvro, readAvro } from '@avro-columnar/core';
 *
 * // Lazy: nothing is opened until the plan runs
 * const recent = await scanAvro('events/*.avro', { batchSize: 10_000 })
 *   .filter({ ts: { $gte: 1_700_000_000_000_000n } })
 *   .select(['id', 'ts'])
 *   .collect();
 *
 * // Eager
 * const frame = await readAvro(['a.avro', 'b.avro'], { columns: [0, -1], nRows: 100 });
 * ```
 */

import type { Frame } from '../frame/frame.js';
import type { LazyFrame } from '../lazy/lazy-frame.js';
import { registerIoSource } from '../lazy/io-source.js';
import { parseReadOptions, parseScanOptions, type ReadOptions, type ScanOptions } from './options.js';
import { AvroScanContext } from './scan-context.js';
import type { AvroSources } from './sources.js';

/**
 * Lazily scan Avro container files.
 *
 * Options are validated immediately; no source is opened until the frame's
 * schema or contents are requested. All sources must translate to the same
 * schema as the first one.
 *
 * @throws ConfigError('INVALID_OPTION') for invalid options
 */
export function scanAvro(sources: AvroSources, options: ScanOptions = {}): LazyFrame {
  return registerIoSource(new AvroScanContext(sources, parseScanOptions(options)));
}

/**
 * Read Avro container files into a frame.
 *
 * Applied in order: column selection, row index, row limit. The row index
 * counts the rows of the result, starting at `rowIndexOffset`.
 *
 * @throws ConfigError('INVALID_OPTION') for invalid options
 */
export async function readAvro(sources: AvroSources, options: ReadOptions = {}): Promise<Frame> {
  const { columns, nRows, rowIndexName, rowIndexOffset, rechunk, ...scanOptions } = parseReadOptions(options);

  let lazy = scanAvro(sources, scanOptions);
  try {
    if (columns !== undefined) {
      lazy = lazy.select(columns);
    }
    if (rowIndexName !== undefined) {
      lazy = lazy.withRowIndex(rowIndexName, rowIndexOffset);
    }
    if (nRows !== undefined) {
      lazy = lazy.limit(nRows);
    }
    const frame = await lazy.collect();
    return rechunk ? frame.rechunk() : frame;
  } finally {
    await lazy.close();
  }
}
