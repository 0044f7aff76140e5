import { beforeEach, describe, it, expect, vi } from 'vitest';
import { mkdir, writeFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { pathToFileURL } from 'node:url';
import { SourceError } from '../src/errors.js';
import { scanAvro } from '../src/scan/scan.js';
import {
  compareCodePoints,
  expandPath,
  expandUser,
  normalizeSources,
  openSources,
  type OpenedSource,
} from '../src/scan/sources.js';
import { PERSON_SCHEMA, people, withTempDir, writeContainer } from './fixtures.js';

const handles = vi.hoisted(() => {
  const state: { opened: string[]; closed: string[] } = { opened: [], closed: [] };
  return state;
});

vi.mock('node:fs/promises', async (importOriginal) => {
  const actual = await importOriginal<typeof import('node:fs/promises')>();
  return {
    ...actual,
    open: async (...args: Parameters<typeof actual.open>) => {
      const handle = await actual.open(...args);
      const path = String(args[0]);
      const close = handle.close.bind(handle);
      handles.opened.push(path);
      handle.close = async () => {
        handles.closed.push(path);
        await close();
      };
      return handle;
    },
  };
});

beforeEach(() => {
  handles.opened.length = 0;
  handles.closed.length = 0;
});

async function labels(opened: AsyncIterable<OpenedSource>): Promise<string[]> {
  const out: string[] = [];
  for await (const source of opened) {
    out.push(`${source.index}:${source.label}`);
  }
  return out;
}

describe('path handling', () => {
  it('should expand a leading tilde only', () => {
    expect(expandUser('~')).toBe(homedir());
    expect(expandUser('~/data/x.avro')).toBe(join(homedir(), 'data/x.avro'));
    expect(expandUser('data/~x.avro')).toBe('data/~x.avro');
  });

  it('should wrap a single source in a list', () => {
    const bytes = new Uint8Array([1]);
    expect(normalizeSources('a.avro')).toEqual(['a.avro']);
    expect(normalizeSources([bytes, 'b.avro'])).toEqual([bytes, 'b.avro']);
  });

  it('should expand glob patterns to sorted files', async () => {
    await withTempDir(async (dir) => {
      await writeFile(join(dir, 'b.avro'), '');
      await writeFile(join(dir, 'a.avro'), '');
      await writeFile(join(dir, 'c.txt'), '');
      await mkdir(join(dir, 'd.avro'));

      expect(await expandPath(join(dir, '*.avro'), true)).toEqual([join(dir, 'a.avro'), join(dir, 'b.avro')]);
      expect(await expandPath(join(dir, 'none-*.avro'), true)).toEqual([]);
    });
  });

  it('should sort matches by code point', async () => {
    expect(['\u{1F600}', '\uFF5E', 'a'].sort(compareCodePoints)).toEqual(['a', '\uFF5E', '\u{1F600}']);
    expect(compareCodePoints('ab', 'a')).toBeGreaterThan(0);
    expect(compareCodePoints('a', 'a')).toBe(0);

    await withTempDir(async (dir) => {
      await writeFile(join(dir, '\u{1F600}.avro'), '');
      await writeFile(join(dir, '\uFF5E.avro'), '');
      expect(await expandPath(join(dir, '*.avro'), true)).toEqual([
        join(dir, '\uFF5E.avro'),
        join(dir, '\u{1F600}.avro'),
      ]);
    });
  });

  it('should take the path literally without glob', async () => {
    expect(await expandPath('/data/part-*.avro', false)).toEqual(['/data/part-*.avro']);
  });
});

describe('openSources', () => {
  it('should number sources across expanded patterns and in-memory inputs', async () => {
    await withTempDir(async (dir) => {
      await writeFile(join(dir, 'p1.avro'), 'x');
      await writeFile(join(dir, 'p0.avro'), 'x');
      async function* stream(): AsyncGenerator<Uint8Array> {
        yield new Uint8Array([1]);
      }

      const opened = openSources([new Uint8Array([1]), join(dir, 'p*.avro'), stream()], { glob: true });
      expect(await labels(opened)).toEqual([
        '0:<bytes>',
        `1:${join(dir, 'p0.avro')}`,
        `2:${join(dir, 'p1.avro')}`,
        '3:<stream>',
      ]);
      expect(handles.closed).toEqual(handles.opened);
    });
  });

  it('should open each file only when reached and close it when the consumer stops', async () => {
    await withTempDir(async (dir) => {
      await writeFile(join(dir, 'a.avro'), 'x');
      await writeFile(join(dir, 'b.avro'), 'x');

      for await (const source of openSources(join(dir, '*.avro'), { glob: true })) {
        expect(source.label).toBe(join(dir, 'a.avro'));
        break;
      }
      expect(handles.opened).toEqual([join(dir, 'a.avro')]);
      expect(handles.closed).toEqual([join(dir, 'a.avro')]);
    });
  });

  it('should read files in chunks', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, 'data.bin');
      await writeFile(path, new Uint8Array(70 * 1024).fill(7));

      const sizes: number[] = [];
      for await (const source of openSources(path, { glob: false })) {
        for (let chunk = await source.chunks.next(); !chunk.done; chunk = await source.chunks.next()) {
          sizes.push(chunk.value.length);
        }
      }
      expect(sizes).toEqual([64 * 1024, 6 * 1024]);
    });
  });

  it('should accept file URLs', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, 'u.avro');
      await writeFile(path, 'x');
      expect(await labels(openSources(pathToFileURL(path), { glob: true }))).toEqual([`0:${path}`]);
    });
  });

  it('should reject URLs that are not files', async () => {
    const opened = openSources(new URL('https://example.com/data.avro'), { glob: true });
    await expect(labels(opened)).rejects.toMatchObject({
      code: 'SOURCE_OPEN_FAILED',
      message: 'Unsupported URL protocol "https:" for https://example.com/data.avro',
    });
  });

  it('should report files that cannot be opened', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, 'missing.avro');
      const error = await labels(openSources(path, { glob: false })).catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(SourceError);
      expect(error).toMatchObject({ code: 'SOURCE_OPEN_FAILED', path });
    });
  });

  it('should not close streams it was given', async () => {
    let returned = false;
    const stream: AsyncIterable<Uint8Array> = {
      [Symbol.asyncIterator]: () => ({
        next: async () => ({ done: false, value: new Uint8Array([1]) }),
        return: async () => {
          returned = true;
          return { done: true, value: undefined };
        },
      }),
    };
    for await (const source of openSources([stream, stream], { glob: true })) {
      await source.chunks.next();
    }
    expect(returned).toBe(false);
  });
});

describe('scan file handles', () => {
  it('should close the file kept open for the schema when the frame is closed', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, 'people.avro');
      await writeContainer(path, PERSON_SCHEMA, people(0, 3));

      const lf = scanAvro(path);
      await lf.schema();
      expect(handles.opened).toEqual([path]);
      expect(handles.closed).toEqual([]);

      await lf.close();
      expect(handles.closed).toEqual([path]);
    });
  });

  it('should close every file after a scan, including one stopped by a limit', async () => {
    await withTempDir(async (dir) => {
      await writeContainer(join(dir, 'a.avro'), PERSON_SCHEMA, people(0, 4));
      await writeContainer(join(dir, 'b.avro'), PERSON_SCHEMA, people(4, 4));

      const frame = await scanAvro(join(dir, '*.avro'), { batchSize: 2 }).limit(3).collect();
      expect(frame.height).toBe(3);
      expect(handles.opened).toEqual([join(dir, 'a.avro')]);
      expect(handles.closed).toEqual([join(dir, 'a.avro')]);
    });
  });

  it('should close open files when a later source fails', async () => {
    await withTempDir(async (dir) => {
      await writeContainer(join(dir, 'a.avro'), PERSON_SCHEMA, people(0, 2));
      await writeFile(join(dir, 'b.avro'), 'not avro');

      await expect(scanAvro(join(dir, '*.avro')).collect()).rejects.toMatchObject({ code: 'INVALID_MAGIC' });
      expect(handles.closed).toEqual(handles.opened);
      expect(handles.opened).toHaveLength(2);
    });
  });
});
