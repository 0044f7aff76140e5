/**
 * Option Parsing
 *
 * zod schemas for scan, read, batch-request and write options. Parsing
 * applies defaults and turns every rejected option into one
 * {@link ConfigError} before any I/O happens.
 */

import { z } from 'zod';
import { isPlainObject, type AvroCodec } from '../avro/types.js';
import { DEFAULT_BATCH_SIZE, DEFAULT_BLOCK_SIZE } from '../constants.js';
import { ConfigError, type ConfigIssue } from '../errors.js';
import type { Filter } from '../frame/predicate.js';
import type { BatchRequest } from '../lazy/io-source.js';
import type { ColumnRef } from '../lazy/lazy-frame.js';
import type { Logger } from '../logging.js';

// ============================================================================
// Public Option Types
// ============================================================================

export interface ScanOptions {
  /**
   * Read values whose logical type is not recognised as their physical type
   * instead of failing (default: false)
   */
  convertLogicalTypes?: boolean;
  /** Maximum rows per batch (default: 32768) */
  batchSize?: number;
  /** Expand glob patterns in path sources (default: true) */
  glob?: boolean;
  /** Column name used when the top-level schema is not a record */
  singleColName?: string;
  /** Structured logger (default: discard) */
  logger?: Logger;
}

export interface ReadOptions extends ScanOptions {
  /** Columns to read, by name or ordinal (negative ordinals count from the end) */
  columns?: readonly ColumnRef[];
  /** Maximum number of rows to read */
  nRows?: number;
  /** Prepend a row index column with this name */
  rowIndexName?: string;
  /** First value of the row index (default: 0) */
  rowIndexOffset?: number;
  /** Merge the result into a single chunk per column (default: false) */
  rechunk?: boolean;
}

export interface WriteOptions {
  /** Block compression (default: 'null') */
  codec?: AvroCodec;
  /** Rows per container block (default: 1000) */
  blockSize?: number;
  /** Name of the top-level record (default: 'Record') */
  recordName?: string;
  /** Extra container header metadata */
  metadata?: Record<string, string>;
  logger?: Logger;
}

// ============================================================================
// Schemas
// ============================================================================

const LOGGER_METHODS = ['debug', 'info', 'warn', 'error'] as const;

function isLogger(value: unknown): value is Logger {
  return isPlainObject(value) && LOGGER_METHODS.every((method) => typeof value[method] === 'function');
}

const positiveInt = z.number().int().positive();
const nonNegativeInt = z.number().int().nonnegative();

export const ScanOptionsSchema = z
  .object({
    convertLogicalTypes: z.boolean().default(false),
    batchSize: positiveInt.default(DEFAULT_BATCH_SIZE),
    glob: z.boolean().default(true),
    singleColName: z.string().min(1).optional(),
    logger: z.custom<Logger>(isLogger, { message: 'Expected a logger with debug, info, warn and error methods' }).optional(),
  })
  .strict();

export const ReadOptionsSchema = ScanOptionsSchema.extend({
  columns: z.array(z.union([z.string(), z.number().int()])).optional(),
  nRows: nonNegativeInt.optional(),
  rowIndexName: z.string().min(1).optional(),
  rowIndexOffset: nonNegativeInt.default(0),
  rechunk: z.boolean().default(false),
}).strict();

export const BatchRequestSchema = z
  .object({
    columns: z.array(z.string()).optional(),
    predicate: z.custom<Filter>((value) => isPlainObject(value), { message: 'Expected a filter document' }).optional(),
    nRows: nonNegativeInt.optional(),
    batchSize: positiveInt.optional(),
  })
  .strict();

export const WriteOptionsSchema = z
  .object({
    codec: z.enum(['null', 'deflate']).default('null'),
    blockSize: positiveInt.default(DEFAULT_BLOCK_SIZE),
    recordName: z.string().min(1).default('Record'),
    metadata: z.record(z.string(), z.string()).default({}),
    logger: z.custom<Logger>(isLogger, { message: 'Expected a logger with debug, info, warn and error methods' }).optional(),
  })
  .strict();

export type ResolvedScanOptions = z.output<typeof ScanOptionsSchema>;
export type ResolvedReadOptions = z.output<typeof ReadOptionsSchema>;
export type ResolvedBatchRequest = z.output<typeof BatchRequestSchema>;
export type ResolvedWriteOptions = z.output<typeof WriteOptionsSchema>;

// ============================================================================
// Parsing
// ============================================================================

function parseWith<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, input: unknown, what: string): T {
  const result = schema.safeParse(input ?? {});
  if (result.success) {
    return result.data;
  }
  const issues: ConfigIssue[] = result.error.issues.map((issue) => ({
    path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
    message: issue.message,
  }));
  throw new ConfigError(
    `Invalid ${what}: ${issues.map((issue) => `${issue.path}: ${issue.message}`).join('; ')}`,
    issues
  );
}

/**
 * @throws ConfigError('INVALID_OPTION')
 */
export function parseScanOptions(options?: ScanOptions): ResolvedScanOptions {
  return parseWith(ScanOptionsSchema, options, 'scan options');
}

/**
 * @throws ConfigError('INVALID_OPTION')
 */
export function parseReadOptions(options?: ReadOptions): ResolvedReadOptions {
  return parseWith(ReadOptionsSchema, options, 'read options');
}

/**
 * @throws ConfigError('INVALID_OPTION')
 */
export function parseBatchRequest(request?: BatchRequest): ResolvedBatchRequest {
  return parseWith(BatchRequestSchema, request, 'batch request');
}

/**
 * @throws ConfigError('INVALID_OPTION')
 */
export function parseWriteOptions(options?: WriteOptions): ResolvedWriteOptions {
  return parseWith(WriteOptionsSchema, options, 'write options');
}
