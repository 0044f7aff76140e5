/**
 * Error Classes
 *
 * Centralized error definitions for the Avro columnar reader.
 * All custom errors extend the base AvroColumnarError class for consistent error handling.
 *
 * @example
 * ```ts
 * import { scanAvro, SchemaError } from '@avro-columnar/core';
 *
 * try {
 *   await scanAvro('data/*.avro').schema();
 * } catch (error) {
 *   if (error instanceof SchemaError) {
 *     console.log(`Schema error (${error.code}): ${error.message}`);
 *   }
 * }
 * ```
 */

import type { ColumnSchema } from './schema/types.js';

// ============================================================================
// Base Error
// ============================================================================

/**
 * Base error class for all errors raised by this package.
 * Provides a consistent structure with error codes for programmatic handling.
 */
export class AvroColumnarError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  constructor(message: string, code: string = 'AVRO_COLUMNAR_ERROR') {
    super(message);
    this.name = 'AvroColumnarError';
    this.code = code;

    // Maintain proper prototype chain for instanceof checks
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

// ============================================================================
// Schema Errors
// ============================================================================

/**
 * Error codes for schema translation.
 */
export type SchemaErrorCode =
  | 'UNSUPPORTED_TYPE'
  | 'UNSUPPORTED_LOGICAL_TYPE'
  | 'TOP_LEVEL_NOT_RECORD'
  | 'INVALID_FIELD_DEFINITION'
  | 'INVALID_FIELD_NAME';

/**
 * Error thrown when an Avro schema cannot be mapped to a column schema (or back).
 */
export class SchemaError extends AvroColumnarError {
  /** Specific schema error code */
  readonly code: SchemaErrorCode;
  /** The schema fragment that could not be translated */
  readonly fragment: unknown;

  constructor(message: string, code: SchemaErrorCode, fragment?: unknown) {
    super(message, code);
    this.name = 'SchemaError';
    this.code = code;
    this.fragment = fragment;
  }
}

/**
 * Error thrown when a later source of a multi-source scan translates to a
 * different schema than the first one.
 */
export class SchemaMismatchError extends AvroColumnarError {
  /** Position of the offending source in the opened sequence (0-based) */
  readonly sourceIndex: number;
  /** Schema committed from the first source */
  readonly expected: ColumnSchema;
  /** Schema translated from the offending source */
  readonly actual: ColumnSchema;
  /** Raw writer schema of the offending source */
  readonly writerSchema: unknown;

  constructor(
    message: string,
    options: { sourceIndex: number; expected: ColumnSchema; actual: ColumnSchema; writerSchema: unknown }
  ) {
    super(message, 'SCHEMA_MISMATCH');
    this.name = 'SchemaMismatchError';
    this.sourceIndex = options.sourceIndex;
    this.expected = options.expected;
    this.actual = options.actual;
    this.writerSchema = options.writerSchema;
  }
}

// ============================================================================
// Source Errors
// ============================================================================

/**
 * Error codes for source operations.
 */
export type SourceErrorCode =
  | 'EMPTY_SOURCES'
  | 'SOURCE_OPEN_FAILED'
  | 'SOURCE_READ_FAILED'
  | 'SOURCE_WRITE_FAILED';

/**
 * Error thrown while opening, reading or writing byte sources.
 */
export class SourceError extends AvroColumnarError {
  /** Specific source error code */
  readonly code: SourceErrorCode;
  /** Path that caused the error (if applicable) */
  readonly path?: string;
  /** Original error from the file system */
  readonly cause?: Error;

  constructor(message: string, code: SourceErrorCode, options?: { path?: string; cause?: Error }) {
    super(message, code);
    this.name = 'SourceError';
    this.code = code;
    this.path = options?.path;
    this.cause = options?.cause;
  }
}

// ============================================================================
// Decode Errors
// ============================================================================

/**
 * Error codes for Avro container decoding.
 */
export type DecodeErrorCode =
  | 'INVALID_MAGIC'
  | 'INVALID_SCHEMA'
  | 'UNSUPPORTED_CODEC'
  | 'UNEXPECTED_EOF'
  | 'SYNC_MISMATCH'
  | 'CORRUPT_BLOCK'
  | 'INVALID_DATA';

/**
 * Error thrown when Avro bytes cannot be decoded.
 */
export class DecodeError extends AvroColumnarError {
  /** Specific decode error code */
  readonly code: DecodeErrorCode;

  constructor(message: string, code: DecodeErrorCode) {
    super(message, code);
    this.name = 'DecodeError';
    this.code = code;
  }
}

/**
 * Error thrown when a value does not fit the Avro schema it is written with.
 */
export class EncodeError extends AvroColumnarError {
  readonly code: 'INVALID_VALUE';
  /** Path of the offending value inside the datum */
  readonly path: string;

  constructor(message: string, path: string) {
    super(message, 'INVALID_VALUE');
    this.name = 'EncodeError';
    this.code = 'INVALID_VALUE';
    this.path = path;
  }
}

// ============================================================================
// Configuration Errors
// ============================================================================

/**
 * A single rejected option.
 */
export interface ConfigIssue {
  /** Dotted path of the option */
  readonly path: string;
  /** Why it was rejected */
  readonly message: string;
}

/**
 * Error thrown when scan, read, batch or write options are invalid.
 * Raised before any I/O takes place.
 */
export class ConfigError extends AvroColumnarError {
  readonly code: 'INVALID_OPTION';
  /** Every rejected option */
  readonly issues: readonly ConfigIssue[];

  constructor(message: string, issues: readonly ConfigIssue[] = []) {
    super(message, 'INVALID_OPTION');
    this.name = 'ConfigError';
    this.code = 'INVALID_OPTION';
    this.issues = issues;
  }
}

// ============================================================================
// Column Errors
// ============================================================================

/**
 * Error codes for frame and column operations.
 */
export type ColumnErrorCode =
  | 'COLUMN_NOT_FOUND'
  | 'DUPLICATE_COLUMN'
  | 'TYPE_MISMATCH'
  | 'LENGTH_MISMATCH'
  | 'OUT_OF_BOUNDS';

/**
 * Error thrown by frame operations (building, projecting, slicing).
 */
export class ColumnError extends AvroColumnarError {
  /** Specific column error code */
  readonly code: ColumnErrorCode;
  /** Column involved (if applicable) */
  readonly column?: string;

  constructor(message: string, code: ColumnErrorCode, column?: string) {
    super(message, code);
    this.name = 'ColumnError';
    this.code = code;
    this.column = column;
  }
}

// ============================================================================
// Validation Errors
// ============================================================================

/**
 * Error codes for validation operations.
 */
export type ValidationErrorCode = 'INVALID_FILTER';

/**
 * Error thrown when a row predicate is malformed.
 */
export class ValidationError extends AvroColumnarError {
  /** Specific validation error code */
  readonly code: ValidationErrorCode;
  /** Filter key that failed validation (if applicable) */
  readonly field?: string;

  constructor(message: string, code: ValidationErrorCode, field?: string) {
    super(message, code);
    this.name = 'ValidationError';
    this.code = code;
    this.field = field;
  }
}

// ============================================================================
// Utility Functions
// ============================================================================

/**
 * Type guard to check if an error was raised by this package.
 */
export function isAvroColumnarError(error: unknown): error is AvroColumnarError {
  return error instanceof AvroColumnarError;
}

/**
 * Type guard to check if an error is a SchemaError.
 */
export function isSchemaError(error: unknown): error is SchemaError {
  return error instanceof SchemaError;
}

/**
 * Type guard to check if an error is a SchemaMismatchError.
 */
export function isSchemaMismatchError(error: unknown): error is SchemaMismatchError {
  return error instanceof SchemaMismatchError;
}

/**
 * Type guard to check if an error is a SourceError.
 */
export function isSourceError(error: unknown): error is SourceError {
  return error instanceof SourceError;
}

/**
 * Type guard to check if an error is a DecodeError.
 */
export function isDecodeError(error: unknown): error is DecodeError {
  return error instanceof DecodeError;
}

/**
 * Type guard to check if an error is a ConfigError.
 */
export function isConfigError(error: unknown): error is ConfigError {
  return error instanceof ConfigError;
}

/**
 * Type guard to check if an error is a ColumnError.
 */
export function isColumnError(error: unknown): error is ColumnError {
  return error instanceof ColumnError;
}

/**
 * Wrap an unknown error in an AvroColumnarError if it isn't already one.
 */
export function wrapError(error: unknown, defaultMessage: string = 'Unknown error'): AvroColumnarError {
  if (error instanceof AvroColumnarError) {
    return error;
  }
  if (error instanceof Error) {
    const wrapped = new AvroColumnarError(error.message, 'WRAPPED_ERROR');
    wrapped.stack = error.stack;
    return wrapped;
  }
  return new AvroColumnarError(String(error) || defaultMessage, 'UNKNOWN_ERROR');
}
