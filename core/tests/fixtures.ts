/**
 * Shared test fixtures: Avro schemas, generated records and temp directories.
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { encodeContainer, type AvroFileWriterOptions } from '../src/avro/container.js';
import type { AvroRecord, AvroType } from '../src/avro/types.js';

export const PERSON_SCHEMA: AvroRecord = {
  type: 'record',
  name: 'Person',
  fields: [
    { name: 'id', type: 'long' },
    { name: 'name', type: ['null', 'string'] },
  ],
};

export const OTHER_PERSON_SCHEMA: AvroRecord = {
  type: 'record',
  name: 'Person',
  fields: [
    { name: 'id', type: 'long' },
    { name: 'name', type: 'string' },
    { name: 'email', type: ['null', 'string'] },
  ],
};

export interface Person {
  id: bigint;
  name: string | null;
}

/**
 * `count` people with ids `start`, `start + 1`, ... and every fifth name null.
 */
export function people(start: number, count: number): Person[] {
  return Array.from({ length: count }, (_, i) => {
    const id = start + i;
    return { id: BigInt(id), name: id % 5 === 4 ? null : `person-${id}` };
  });
}

export function personContainer(start: number, count: number, options: AvroFileWriterOptions & { blockSize?: number } = {}): Uint8Array {
  return encodeContainer(PERSON_SCHEMA, people(start, count), options);
}

export async function writeContainer(
  path: string,
  schema: AvroType,
  records: readonly unknown[],
  options: AvroFileWriterOptions & { blockSize?: number } = {}
): Promise<void> {
  await writeFile(path, encodeContainer(schema, records, options));
}

/**
 * Run `fn` with a fresh temp directory, removed afterwards.
 */
export async function withTempDir<T>(fn: (dir: string) => Promise<T>): Promise<T> {
  const dir = await mkdtemp(join(tmpdir(), 'avro-columnar-test-'));
  try {
    return await fn(dir);
  } finally {
    await rm(dir, { recursive: true, force: true });
  }
}

/**
 * Split bytes into an async stream of `size`-byte chunks.
 */
export async function* chunked(bytes: Uint8Array, size: number): AsyncGenerator<Uint8Array, void, undefined> {
  for (let offset = 0; offset < bytes.length; offset += size) {
    yield bytes.subarray(offset, offset + size);
  }
}

/**
 * Drain an async iterable into an array.
 */
export async function collectAll<T>(items: AsyncIterable<T>): Promise<T[]> {
  const out: T[] = [];
  for await (const item of items) {
    out.push(item);
  }
  return out;
}

/**
 * The value `fn` throws, or undefined.
 */
export function thrown(fn: () => unknown): unknown {
  try {
    fn();
  } catch (error) {
    return error;
  }
  return undefined;
}
