/**
 * Shared defaults.
 */

/** Rows per batch produced by a scan unless overridden */
export const DEFAULT_BATCH_SIZE = 32768;

/** Bytes requested per read from an opened file */
export const READ_CHUNK_SIZE = 64 * 1024;

/** Rows per container block written by the sink */
export const DEFAULT_BLOCK_SIZE = 1000;

/** Component name attached to scan log entries */
export const SCAN_COMPONENT = 'avro-scan';

/** Component name attached to write log entries */
export const SINK_COMPONENT = 'avro-sink';
