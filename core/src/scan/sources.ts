/**
 * Source Opening
 *
 * Turns the user's sources into a lazy sequence of byte streams. Paths are
 * expanded (home directory, glob) entry by entry as the sequence advances;
 * each file is opened only when reached and closed as soon as the consumer
 * moves past it or stops.
 */

import { open, type FileHandle } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { fileURLToPath } from 'node:url';
import fg from 'fast-glob';
import { READ_CHUNK_SIZE } from '../constants.js';
import { SourceError } from '../errors.js';

// ============================================================================
// Types
// ============================================================================

/**
 * A path (string or file URL), an in-memory container file, or an already
 * open byte stream such as a Node.js `Readable`.
 */
export type AvroSource = string | URL | Uint8Array | AsyncIterable<Uint8Array>;

export type AvroSources = AvroSource | readonly AvroSource[];

export interface OpenedSource {
  /** Position in the opened sequence (0-based) */
  index: number;
  /** File path, or a placeholder for in-memory sources */
  label: string;
  chunks: AsyncIterator<Uint8Array>;
}

export interface OpenSourcesOptions {
  /** Expand path entries as glob patterns, sorted lexicographically */
  glob: boolean;
}

// ============================================================================
// Path Handling
// ============================================================================

function isSourceList(sources: AvroSources): sources is readonly AvroSource[] {
  return Array.isArray(sources);
}

/**
 * A single source becomes a one-item list.
 */
export function normalizeSources(sources: AvroSources): readonly AvroSource[] {
  return isSourceList(sources) ? sources : [sources];
}

/**
 * Expand a leading `~` to the home directory.
 */
export function expandUser(path: string): string {
  if (path === '~') {
    return homedir();
  }
  if (path.startsWith('~/')) {
    return join(homedir(), path.slice(2));
  }
  return path;
}

function toPath(source: string | URL): string {
  if (typeof source === 'string') {
    return expandUser(source);
  }
  if (source.protocol !== 'file:') {
    throw new SourceError(`Unsupported URL protocol "${source.protocol}" for ${source.href}`, 'SOURCE_OPEN_FAILED', {
      path: source.href,
    });
  }
  return fileURLToPath(source);
}

/**
 * Files a path entry stands for. With `glob` the entry is a pattern and may
 * match nothing.
 */
export async function expandPath(path: string, glob: boolean): Promise<string[]> {
  if (!glob) {
    return [path];
  }
  const matches = await fg(path, { onlyFiles: true });
  return matches.sort(compareCodePoints);
}

/**
 * Order strings by Unicode code point. The default sort compares UTF-16 code
 * units, which puts astral characters before U+E000..U+FFFF.
 */
export function compareCodePoints(a: string, b: string): number {
  const left = Array.from(a, (char) => char.codePointAt(0) ?? 0);
  const right = Array.from(b, (char) => char.codePointAt(0) ?? 0);
  const shared = Math.min(left.length, right.length);
  for (let i = 0; i < shared; i++) {
    if (left[i] !== right[i]) {
      return left[i] - right[i];
    }
  }
  return left.length - right.length;
}

// ============================================================================
// Opening
// ============================================================================

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

async function openFile(path: string): Promise<FileHandle> {
  try {
    return await open(path, 'r');
  } catch (error) {
    throw new SourceError(`Failed to open ${path}: ${toError(error).message}`, 'SOURCE_OPEN_FAILED', {
      path,
      cause: toError(error),
    });
  }
}

async function* readChunks(handle: FileHandle, path: string): AsyncGenerator<Uint8Array, void, undefined> {
  for (;;) {
    const buffer = new Uint8Array(READ_CHUNK_SIZE);
    let bytesRead: number;
    try {
      ({ bytesRead } = await handle.read(buffer, 0, READ_CHUNK_SIZE, null));
    } catch (error) {
      throw new SourceError(`Failed to read ${path}: ${toError(error).message}`, 'SOURCE_READ_FAILED', {
        path,
        cause: toError(error),
      });
    }
    if (bytesRead === 0) {
      return;
    }
    yield buffer.subarray(0, bytesRead);
  }
}

async function* singleChunk(bytes: Uint8Array): AsyncGenerator<Uint8Array, void, undefined> {
  yield bytes;
}

/**
 * Open sources one at a time, in order.
 *
 * A file handle stays open while its entry is current: advancing the
 * generator, or ending it with `return()`, closes it. Streams passed in by
 * the caller are read through but never closed.
 *
 * @throws SourceError('SOURCE_OPEN_FAILED') if a file cannot be opened
 */
export async function* openSources(
  sources: AvroSources,
  options: OpenSourcesOptions
): AsyncGenerator<OpenedSource, void, undefined> {
  let index = 0;

  for (const source of normalizeSources(sources)) {
    if (typeof source === 'string' || source instanceof URL) {
      const paths = typeof source === 'string'
        ? await expandPath(toPath(source), options.glob)
        : [toPath(source)];

      for (const path of paths) {
        const handle = await openFile(path);
        try {
          yield { index: index++, label: path, chunks: readChunks(handle, path) };
        } finally {
          await handle.close();
        }
      }
    } else if (source instanceof Uint8Array) {
      yield { index: index++, label: '<bytes>', chunks: singleChunk(source) };
    } else {
      yield { index: index++, label: '<stream>', chunks: source[Symbol.asyncIterator]() };
    }
  }
}
