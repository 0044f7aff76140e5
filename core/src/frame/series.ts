/**
 * Series
 *
 * A named, typed column stored as one or more chunks. Every operation returns
 * a new series; chunks are never mutated once built.
 */

import { ColumnError } from '../errors.js';
import { columnTypesEqual, formatColumnType, type ColumnType } from '../schema/types.js';
import { convertValue, type ColumnValue } from './convert.js';

export type Chunk = readonly ColumnValue[];

export class Series {
  readonly name: string;
  readonly type: ColumnType;
  readonly chunks: readonly Chunk[];
  readonly length: number;

  /**
   * Wrap already-converted chunks. Use {@link Series.from} for raw values.
   */
  constructor(name: string, type: ColumnType, chunks: readonly Chunk[] = []) {
    this.name = name;
    this.type = type;
    this.chunks = chunks.filter((chunk) => chunk.length > 0);
    this.length = this.chunks.reduce((total, chunk) => total + chunk.length, 0);
  }

  /**
   * Build a single-chunk series, converting every value to `type`.
   *
   * @throws ColumnError('TYPE_MISMATCH') if a value does not fit
   */
  static from(name: string, type: ColumnType, values: readonly unknown[]): Series {
    return new Series(name, type, [values.map((value, i) => convertValue(value, type, `${name}[${i}]`))]);
  }

  get nChunks(): number {
    return this.chunks.length;
  }

  get(index: number): ColumnValue {
    if (!Number.isInteger(index) || index < 0 || index >= this.length) {
      throw new ColumnError(`Index ${index} out of bounds for series "${this.name}" of length ${this.length}`, 'OUT_OF_BOUNDS', this.name);
    }
    let remaining = index;
    for (const chunk of this.chunks) {
      if (remaining < chunk.length) {
        return chunk[remaining];
      }
      remaining -= chunk.length;
    }
    throw new ColumnError(`Index ${index} out of bounds for series "${this.name}"`, 'OUT_OF_BOUNDS', this.name);
  }

  toArray(): ColumnValue[] {
    const values: ColumnValue[] = [];
    for (const chunk of this.chunks) {
      for (const value of chunk) {
        values.push(value);
      }
    }
    return values;
  }

  rename(name: string): Series {
    return new Series(name, this.type, this.chunks);
  }

  /**
   * Merge all chunks into one.
   */
  rechunk(): Series {
    return this.chunks.length <= 1 ? this : new Series(this.name, this.type, [this.toArray()]);
  }

  /**
   * Rows `[offset, offset + length)`, clamped to the series. Chunk
   * boundaries inside the range are kept.
   */
  slice(offset: number, length: number = this.length): Series {
    const start = Math.max(0, Math.min(offset, this.length));
    const end = Math.max(start, Math.min(start + Math.max(0, length), this.length));
    const chunks: Chunk[] = [];
    let chunkStart = 0;
    for (const chunk of this.chunks) {
      const chunkEnd = chunkStart + chunk.length;
      if (chunkEnd > start && chunkStart < end) {
        chunks.push(chunk.slice(Math.max(0, start - chunkStart), Math.min(chunk.length, end - chunkStart)));
      }
      chunkStart = chunkEnd;
    }
    return new Series(this.name, this.type, chunks);
  }

  /**
   * Keep rows where `mask` is true. The result has a single chunk.
   */
  filter(mask: readonly boolean[]): Series {
    if (mask.length !== this.length) {
      throw new ColumnError(
        `Mask of length ${mask.length} does not match series "${this.name}" of length ${this.length}`,
        'LENGTH_MISMATCH',
        this.name
      );
    }
    return new Series(this.name, this.type, [this.toArray().filter((_, i) => mask[i])]);
  }

  /**
   * Concatenate chunks of another series of the same type.
   */
  append(other: Series): Series {
    if (!columnTypesEqual(this.type, other.type)) {
      throw new ColumnError(
        `Cannot append ${formatColumnType(other.type)} to ${formatColumnType(this.type)} series "${this.name}"`,
        'TYPE_MISMATCH',
        this.name
      );
    }
    return new Series(this.name, this.type, [...this.chunks, ...other.chunks]);
  }
}
