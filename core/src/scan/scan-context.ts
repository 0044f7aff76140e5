/**
 * Avro Scan Context
 *
 * Owns the state of one scan: the committed schema and the reader sequence
 * opened while resolving it. The first batch request takes over that
 * sequence; later requests open the sources again.
 */

import { AvroFileReader } from '../avro/container.js';
import { SCAN_COMPONENT } from '../constants.js';
import { SchemaMismatchError, SourceError } from '../errors.js';
import { Frame } from '../frame/frame.js';
import type { BatchRequest, IoSource } from '../lazy/io-source.js';
import { createNoopLogger, withContext, type Logger } from '../logging.js';
import { translateSchema, type TranslateOptions } from '../schema/translate.js';
import { formatSchema, schemasEqual, type ColumnSchema } from '../schema/types.js';
import { chunkAsync } from './batching.js';
import { parseBatchRequest, type ResolvedScanOptions } from './options.js';
import { openSources, type AvroSources, type OpenedSource } from './sources.js';

// ============================================================================
// Types
// ============================================================================

interface CommittedSchema {
  schema: ColumnSchema;
  singleton: boolean;
}

/**
 * Reader sequence whose first container header has been read.
 */
interface OpenedReaders extends CommittedSchema {
  /** Writer schema of the first source */
  writerSchema: unknown;
  /** Records of every source in order, singleton-wrapped when needed */
  records: AsyncGenerator<unknown, void, undefined>;
  /** Stop reading and close whatever is open */
  dispose(): Promise<void>;
}

// ============================================================================
// Scan Context
// ============================================================================

export class AvroScanContext implements IoSource {
  private committed?: CommittedSchema;
  private retained?: OpenedReaders;
  private readonly logger: Logger;
  private readonly translateOptions: TranslateOptions;

  constructor(
    private readonly sources: AvroSources,
    private readonly options: ResolvedScanOptions
  ) {
    this.logger = withContext(options.logger ?? createNoopLogger(), { component: SCAN_COMPONENT });
    this.translateOptions = {
      convertLogicalTypes: options.convertLogicalTypes,
      singleColName: options.singleColName,
    };
  }

  /**
   * Translate the first source's writer schema. Memoised; the opened reader
   * sequence is kept for the first batch request.
   *
   * @throws SourceError('EMPTY_SOURCES') if there is no source
   * @throws SchemaError if the writer schema cannot be translated
   */
  async resolveSchema(): Promise<ColumnSchema> {
    if (this.committed !== undefined) {
      return this.committed.schema;
    }
    const opened = await this.openReaders();
    this.committed = { schema: opened.schema, singleton: opened.singleton };
    this.retained = opened;
    this.logger.info(`Resolved schema ${formatSchema(opened.schema)}`, {
      columns: opened.schema.length,
      singleton: opened.singleton,
    });
    return opened.schema;
  }

  schema(): Promise<ColumnSchema> {
    return this.resolveSchema();
  }

  /**
   * Produce frames of at most `batchSize` rows. Each batch is projected,
   * then filtered, then trimmed to what is left of `nRows`.
   *
   * @throws ConfigError if the request is invalid (before any I/O)
   * @throws SchemaMismatchError if a later source has a different schema
   */
  async *batches(request: BatchRequest = {}): AsyncGenerator<Frame, void, undefined> {
    const { columns, predicate, nRows, batchSize = this.options.batchSize } = parseBatchRequest(request);

    const opened = await this.takeReaders();
    try {
      let remaining = nRows;
      for await (const records of chunkAsync(opened.records, batchSize)) {
        let frame = Frame.fromRecords(records, opened.schema);
        if (columns !== undefined) {
          frame = frame.select(columns);
        }
        if (predicate !== undefined) {
          frame = frame.filter(predicate);
        }
        if (remaining !== undefined) {
          frame = frame.head(remaining);
          remaining -= frame.height;
        }

        this.logger.debug('Produced batch', { rows: frame.height, batchSize });
        yield frame;

        if (remaining === 0) {
          break;
        }
      }
    } finally {
      await opened.dispose();
    }
  }

  /**
   * Close a retained reader sequence that no batch request has taken.
   */
  async release(): Promise<void> {
    const retained = this.retained;
    this.retained = undefined;
    await retained?.dispose();
  }

  // ==========================================================================
  // Reader Sequence
  // ==========================================================================

  /**
   * Move the retained sequence out, or open the sources again. A re-opened
   * sequence must still match the committed schema.
   */
  private async takeReaders(): Promise<OpenedReaders> {
    const retained = this.retained;
    if (retained !== undefined) {
      this.retained = undefined;
      return retained;
    }

    if (this.committed !== undefined) {
      this.logger.warn('Re-opening sources for another scan');
    }
    const opened = await this.openReaders();

    if (this.committed === undefined) {
      this.committed = { schema: opened.schema, singleton: opened.singleton };
      return opened;
    }
    if (!this.matchesCommitted(opened)) {
      await opened.dispose();
      throw this.mismatch(0, opened, opened.writerSchema);
    }
    return opened;
  }

  private async openReaders(): Promise<OpenedReaders> {
    const sources = openSources(this.sources, { glob: this.options.glob });
    try {
      const first = await sources.next();
      if (first.done) {
        throw new SourceError('No sources to scan: the source list was empty or matched no files', 'EMPTY_SOURCES');
      }
      const reader = await this.openReader(first.value);
      const { schema, singleton } = translateSchema(reader.writerSchema, this.translateOptions);

      const records = this.records(reader, sources, { schema, singleton });
      return {
        schema,
        singleton,
        writerSchema: reader.writerSchema,
        records,
        dispose: async () => {
          await records.return();
          await sources.return();
        },
      };
    } catch (error) {
      await sources.return();
      throw error;
    }
  }

  private async openReader(source: OpenedSource): Promise<AvroFileReader> {
    this.logger.debug('Opening source', { source: source.label, sourceIndex: source.index });
    return AvroFileReader.open(source.chunks);
  }

  private async *records(
    first: AvroFileReader,
    sources: AsyncGenerator<OpenedSource, void, undefined>,
    expected: CommittedSchema
  ): AsyncGenerator<unknown, void, undefined> {
    try {
      yield* this.wrap(first.records(), expected.singleton);

      for (let next = await sources.next(); !next.done; next = await sources.next()) {
        const reader = await this.openReader(next.value);
        const actual = translateSchema(reader.writerSchema, this.translateOptions);
        if (!schemasEqual(actual.schema, expected.schema) || actual.singleton !== expected.singleton) {
          throw this.mismatch(next.value.index, actual, reader.writerSchema, expected);
        }
        yield* this.wrap(reader.records(), expected.singleton);
      }
    } finally {
      await sources.return();
    }
  }

  private async *wrap(
    records: AsyncGenerator<unknown, void, undefined>,
    singleton: boolean
  ): AsyncGenerator<unknown, void, undefined> {
    if (!singleton) {
      yield* records;
      return;
    }
    const name = this.options.singleColName ?? '';
    for await (const record of records) {
      yield { [name]: record };
    }
  }

  private matchesCommitted(opened: CommittedSchema): boolean {
    return this.committed !== undefined
      && schemasEqual(opened.schema, this.committed.schema)
      && opened.singleton === this.committed.singleton;
  }

  private mismatch(
    sourceIndex: number,
    actual: CommittedSchema,
    writerSchema: unknown,
    expected: CommittedSchema | undefined = this.committed
  ): SchemaMismatchError {
    const expectedSchema = expected?.schema ?? [];
    const error = new SchemaMismatchError(
      `Schema of source ${sourceIndex} does not match schema of source 0: ` +
        `${formatSchema(actual.schema)} != ${formatSchema(expectedSchema)}`,
      { sourceIndex, expected: expectedSchema, actual: actual.schema, writerSchema }
    );
    this.logger.error('Source schema mismatch', error, { sourceIndex, errorCode: error.code });
    return error;
  }
}
