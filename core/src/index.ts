/**
 * @avro-columnar/core
 *
 * Avro object container files as typed, columnar frames.
 * Translates Avro writer schemas into column schemas and streams records in
 * batches through a lazy plan with projection, predicate and limit pushdown.
 *
 * @example
 * ```ts
 * import { scanAvro, readAvro, writeAvro } from '@avro-columnar/core';
 *
 * // Lazy scan over several files with one shared schema
 * const lf = scanAvro('data/part-*.avro', { batchSize: 4096 });
 * console.log(await lf.schema());
 * const active = await lf.filter({ status: 'active' }).select(['id', 'status']).collect();
 *
 * // Eager read
 * const frame = await readAvro('data/part-0.avro', { nRows: 10, rowIndexName: 'row' });
 *
 * // Write back
 * await writeAvro(frame, 'out.avro', { codec: 'deflate' });
 * ```
 *
 * @see https://avro.apache.org/docs/current/specification/
 */

// ============================================================================
// Scanning and Reading
// ============================================================================

export { scanAvro, readAvro } from './scan/scan.js';
export { AvroScanContext } from './scan/scan-context.js';
export { openSources, normalizeSources, expandPath, expandUser } from './scan/sources.js';
export type { AvroSource, AvroSources, OpenedSource, OpenSourcesOptions } from './scan/sources.js';
export { chunkAsync } from './scan/batching.js';
export {
  ScanOptionsSchema,
  ReadOptionsSchema,
  BatchRequestSchema,
  WriteOptionsSchema,
  parseScanOptions,
  parseReadOptions,
  parseBatchRequest,
  parseWriteOptions,
} from './scan/options.js';
export type {
  ScanOptions,
  ReadOptions,
  WriteOptions,
  ResolvedScanOptions,
  ResolvedReadOptions,
  ResolvedBatchRequest,
  ResolvedWriteOptions,
} from './scan/options.js';

// ============================================================================
// Writing
// ============================================================================

export { toAvroSchema, encodeAvro, writeAvro } from './sink/write.js';
export type { AvroDestination } from './sink/write.js';

// ============================================================================
// Schema Translation
// ============================================================================

export { translateType, translateSchema, unwrapNullable, parseAvroNode } from './schema/translate.js';
export type { TranslateOptions, TranslatedSchema, AvroNode } from './schema/translate.js';
export {
  ColumnTypes,
  columnTypesEqual,
  schemasEqual,
  formatColumnType,
  formatSchema,
} from './schema/types.js';
export type {
  TimeUnit,
  PrimitiveColumnType,
  EnumColumnType,
  DatetimeColumnType,
  ListColumnType,
  StructColumnType,
  ColumnType,
  SchemaField,
  ColumnSchema,
} from './schema/types.js';

// ============================================================================
// Frames and Lazy Plans
// ============================================================================

export { Frame } from './frame/frame.js';
export { Series } from './frame/series.js';
export type { Chunk } from './frame/series.js';
export { convertValue, describeValue, isStructValue } from './frame/convert.js';
export type { ColumnValue, StructValue } from './frame/convert.js';
export {
  evaluateFilter,
  validateFilter,
  predicateColumns,
  resolvePath,
  compareValues,
  valuesEqual,
  isComparisonOperator,
  isLogicalOperator,
} from './frame/predicate.js';
export type { Filter, FieldCondition, FieldOperators } from './frame/predicate.js';
export { LazyFrame } from './lazy/lazy-frame.js';
export type { ColumnRef, PlanStep, PhysicalPlan } from './lazy/lazy-frame.js';
export { registerIoSource, RegisteredSource } from './lazy/io-source.js';
export type { BatchRequest, IoSource } from './lazy/io-source.js';

// ============================================================================
// Avro Binary Format
// ============================================================================

export { AvroEncoder, compileDatumWriter } from './avro/encoder.js';
export type { DatumWriter } from './avro/encoder.js';
export { AvroDecoder, compileDatumReader } from './avro/decoder.js';
export type { DatumReader } from './avro/decoder.js';
export { AvroFileReader, AvroFileWriter, encodeContainer } from './avro/container.js';
export type { AvroFileWriterOptions } from './avro/container.js';
export { resolveSchema } from './avro/resolve.js';
export type { ResolvedSchema } from './avro/resolve.js';
export { ByteReader } from './avro/byte-reader.js';
export { AVRO_PRIMITIVES, isAvroPrimitive } from './avro/types.js';
export type {
  AvroPrimitive,
  AvroAnnotatedPrimitive,
  AvroArray,
  AvroMap,
  AvroFixed,
  AvroEnum,
  AvroRecordField,
  AvroRecord,
  AvroUnion,
  AvroType,
  AvroCodec,
} from './avro/types.js';

// ============================================================================
// Errors
// ============================================================================

export {
  AvroColumnarError,
  SchemaError,
  SchemaMismatchError,
  SourceError,
  DecodeError,
  EncodeError,
  ConfigError,
  ColumnError,
  ValidationError,
  isAvroColumnarError,
  isSchemaError,
  isSchemaMismatchError,
  isSourceError,
  isDecodeError,
  isConfigError,
  isColumnError,
  wrapError,
} from './errors.js';
export type {
  SchemaErrorCode,
  SourceErrorCode,
  DecodeErrorCode,
  ConfigIssue,
  ColumnErrorCode,
  ValidationErrorCode,
} from './errors.js';

// ============================================================================
// Logging and Defaults
// ============================================================================

export {
  createLogger,
  createConsoleLogger,
  createNoopLogger,
  createTestLogger,
  withContext,
  formatLogEntry,
  isLevelEnabled,
} from './logging.js';
export type {
  Logger,
  LogLevel,
  LogEntry,
  LogContext,
  LogContextValue,
  LoggerConfig,
  ConsoleLoggerConfig,
  TestLogger,
} from './logging.js';
export {
  DEFAULT_BATCH_SIZE,
  DEFAULT_BLOCK_SIZE,
  READ_CHUNK_SIZE,
  SCAN_COMPONENT,
  SINK_COMPONENT,
} from './constants.js';
