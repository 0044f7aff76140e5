/**
 * Frame
 *
 * An ordered collection of equal-length, uniquely named series. Frames are
 * immutable: every operation returns a new frame sharing unchanged chunks.
 *
 * @example
 * ```ts
 * const frame = Frame.fromRecords(
 *   [{ id: 1n, name: 'a' }, { id: 2n, name: 'b' }],
 *   [{ name: 'id', type: 'int64' }, { name: 'name', type: 'string' }]
 * );
 * frame.filter({ id: { $gt: 1 } }).toRecords(); // [{ id: 2n, name: 'b' }]
 * ```
 */

import { ColumnError } from '../errors.js';
import { getField, isPlainObject, setField } from '../avro/types.js';
import { formatSchema, schemasEqual, type ColumnSchema } from '../schema/types.js';
import { convertValue, describeValue, type ColumnValue, type StructValue } from './convert.js';
import { evaluateFilter, validateFilter, type Filter } from './predicate.js';
import { Series } from './series.js';

export class Frame {
  readonly columns: readonly Series[];
  readonly height: number;

  private constructor(columns: readonly Series[], height: number) {
    this.columns = columns;
    this.height = height;
  }

  // ==========================================================================
  // Construction
  // ==========================================================================

  /**
   * Assemble a frame from series.
   *
   * @throws ColumnError('DUPLICATE_COLUMN') if two series share a name
   * @throws ColumnError('LENGTH_MISMATCH') if lengths differ
   */
  static fromColumns(columns: readonly Series[]): Frame {
    assertUniqueNames(columns.map((column) => column.name));
    const height = columns.length > 0 ? columns[0].length : 0;
    for (const column of columns) {
      if (column.length !== height) {
        throw new ColumnError(
          `Column "${column.name}" has length ${column.length}, expected ${height}`,
          'LENGTH_MISMATCH',
          column.name
        );
      }
    }
    return new Frame(columns, height);
  }

  /**
   * Build a single-chunk frame from row objects. Missing fields are null.
   *
   * @throws ColumnError('TYPE_MISMATCH') if a record is not an object or a value does not fit its column
   * @throws ColumnError('DUPLICATE_COLUMN') if the schema repeats a name
   */
  static fromRecords(records: readonly unknown[], schema: ColumnSchema): Frame {
    assertUniqueNames(schema.map((field) => field.name));
    const values: ColumnValue[][] = schema.map(() => new Array<ColumnValue>(records.length));

    records.forEach((record, row) => {
      if (!isPlainObject(record) || record instanceof Uint8Array) {
        throw new ColumnError(`Row ${row} is not a record: ${describeValue(record)}`, 'TYPE_MISMATCH');
      }
      schema.forEach((field, col) => {
        values[col][row] = convertValue(getField(record, field.name), field.type, `${field.name}[${row}]`);
      });
    });

    return new Frame(
      schema.map((field, col) => new Series(field.name, field.type, [values[col]])),
      records.length
    );
  }

  static empty(schema: ColumnSchema): Frame {
    return Frame.fromRecords([], schema);
  }

  /**
   * Stack frames vertically, keeping their chunks.
   *
   * @param schema - Schema of the result when `frames` is empty
   * @throws ColumnError('TYPE_MISMATCH') if the frames' schemas differ
   */
  static concat(frames: readonly Frame[], schema?: ColumnSchema): Frame {
    if (frames.length === 0) {
      return Frame.empty(schema ?? []);
    }
    const [first, ...rest] = frames;
    const expected = first.schema;
    for (const frame of rest) {
      if (!schemasEqual(frame.schema, expected)) {
        throw new ColumnError(
          `Cannot concat frame ${formatSchema(frame.schema)} onto ${formatSchema(expected)}`,
          'TYPE_MISMATCH'
        );
      }
    }
    const columns = first.columns.map((column, i) => rest.reduce((acc, frame) => acc.append(frame.columns[i]), column));
    return new Frame(
      columns,
      frames.reduce((total, frame) => total + frame.height, 0)
    );
  }

  // ==========================================================================
  // Shape
  // ==========================================================================

  get schema(): ColumnSchema {
    return this.columns.map((column) => ({ name: column.name, type: column.type }));
  }

  get width(): number {
    return this.columns.length;
  }

  get names(): string[] {
    return this.columns.map((column) => column.name);
  }

  /**
   * Largest chunk count over all columns.
   */
  nChunks(): number {
    return this.columns.reduce((max, column) => Math.max(max, column.nChunks), 0);
  }

  /**
   * @throws ColumnError('COLUMN_NOT_FOUND')
   */
  getColumn(name: string): Series {
    const column = this.columns.find((candidate) => candidate.name === name);
    if (column === undefined) {
      throw new ColumnError(`Column "${name}" not found in ${formatSchema(this.schema)}`, 'COLUMN_NOT_FOUND', name);
    }
    return column;
  }

  // ==========================================================================
  // Operations
  // ==========================================================================

  /**
   * Keep the named columns, in the given order.
   *
   * @throws ColumnError('COLUMN_NOT_FOUND') for an unknown name
   * @throws ColumnError('DUPLICATE_COLUMN') if a name is requested twice
   */
  select(names: readonly string[]): Frame {
    assertUniqueNames(names);
    return new Frame(names.map((name) => this.getColumn(name)), this.height);
  }

  /**
   * Keep rows matching `predicate`.
   */
  filter(predicate: Filter): Frame {
    validateFilter(predicate, this.names);
    const mask = this.toRecords().map((row) => evaluateFilter(predicate, row));
    const height = mask.reduce((count, keep) => (keep ? count + 1 : count), 0);
    return new Frame(this.columns.map((column) => column.filter(mask)), height);
  }

  head(n: number): Frame {
    return this.slice(0, n);
  }

  /**
   * Rows `[offset, offset + length)`. A negative offset counts from the end.
   */
  slice(offset: number, length: number = this.height): Frame {
    const start = offset < 0 ? Math.max(0, this.height + offset) : Math.min(offset, this.height);
    const end = Math.min(this.height, start + Math.max(0, length));
    return new Frame(this.columns.map((column) => column.slice(start, end - start)), end - start);
  }

  /**
   * Prepend an Int64 column counting rows from `offset`.
   *
   * @throws ColumnError('DUPLICATE_COLUMN') if `name` already exists
   */
  withRowIndex(name: string, offset: number = 0): Frame {
    assertUniqueNames([name, ...this.names]);
    const base = BigInt(offset);
    const index: ColumnValue[] = Array.from({ length: this.height }, (_, i) => base + BigInt(i));
    return new Frame([new Series(name, 'int64', [index]), ...this.columns], this.height);
  }

  rechunk(): Frame {
    return new Frame(this.columns.map((column) => column.rechunk()), this.height);
  }

  // ==========================================================================
  // Rows
  // ==========================================================================

  /**
   * @throws ColumnError('OUT_OF_BOUNDS')
   */
  row(index: number): StructValue {
    if (!Number.isInteger(index) || index < 0 || index >= this.height) {
      throw new ColumnError(`Row ${index} out of bounds for frame of height ${this.height}`, 'OUT_OF_BOUNDS');
    }
    const row: StructValue = {};
    for (const column of this.columns) {
      setField(row, column.name, column.get(index));
    }
    return row;
  }

  toRecords(): StructValue[] {
    const arrays = this.columns.map((column) => column.toArray());
    return Array.from({ length: this.height }, (_, i) => {
      const row: StructValue = {};
      this.columns.forEach((column, col) => {
        setField(row, column.name, arrays[col][i]);
      });
      return row;
    });
  }
}

function assertUniqueNames(names: readonly string[]): void {
  const seen = new Set<string>();
  for (const name of names) {
    if (seen.has(name)) {
      throw new ColumnError(`Duplicate column name "${name}"`, 'DUPLICATE_COLUMN', name);
    }
    seen.add(name);
  }
}
