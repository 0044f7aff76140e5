import { describe, it, expect } from 'vitest';
import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { Writable } from 'node:stream';
import { AvroFileReader } from '../src/avro/container.js';
import { ConfigError, SchemaError, SourceError } from '../src/errors.js';
import { Frame } from '../src/frame/frame.js';
import { createTestLogger } from '../src/logging.js';
import { readAvro } from '../src/scan/scan.js';
import { ColumnTypes, type ColumnSchema } from '../src/schema/types.js';
import { encodeAvro, toAvroSchema, writeAvro } from '../src/sink/write.js';
import { chunked, thrown, withTempDir } from './fixtures.js';

const SCHEMA: ColumnSchema = [
  { name: 'small', type: 'int32' },
  { name: 'big', type: 'int64' },
  { name: 'ratio', type: 'float32' },
  { name: 'score', type: 'float64' },
  { name: 'flag', type: 'boolean' },
  { name: 'label', type: 'string' },
  { name: 'blob', type: 'binary' },
  { name: 'day', type: 'date' },
  { name: 'at', type: ColumnTypes.datetime('us', 'UTC') },
  { name: 'local_at', type: ColumnTypes.datetime('ms') },
  { name: 'grade', type: ColumnTypes.enum(['A', 'B']) },
  { name: 'counts', type: ColumnTypes.list('int64') },
  {
    name: 'point',
    type: ColumnTypes.struct([
      { name: 'x', type: 'float64' },
      { name: 'tag', type: 'string' },
    ]),
  },
  { name: 'nothing', type: 'null' },
];

const RECORDS = [
  {
    small: -7,
    big: 9007199254740993n,
    ratio: 1.5,
    score: 0.1,
    flag: true,
    label: 'first',
    blob: new Uint8Array([0, 255]),
    day: 19000,
    at: 1700000000000000n,
    local_at: 1700000000000n,
    grade: 'B',
    counts: [1n, null, 3n],
    point: { x: 2.5, tag: null },
    nothing: null,
  },
  {
    small: null,
    big: null,
    ratio: null,
    score: null,
    flag: null,
    label: null,
    blob: null,
    day: null,
    at: null,
    local_at: null,
    grade: null,
    counts: [],
    point: null,
    nothing: null,
  },
];

describe('toAvroSchema', () => {
  it('should make every column nullable except Null columns', () => {
    expect(toAvroSchema(SCHEMA)).toEqual({
      type: 'record',
      name: 'Record',
      fields: [
        { name: 'small', type: ['null', 'int'], default: null },
        { name: 'big', type: ['null', 'long'], default: null },
        { name: 'ratio', type: ['null', 'float'], default: null },
        { name: 'score', type: ['null', 'double'], default: null },
        { name: 'flag', type: ['null', 'boolean'], default: null },
        { name: 'label', type: ['null', 'string'], default: null },
        { name: 'blob', type: ['null', 'bytes'], default: null },
        { name: 'day', type: ['null', { type: 'int', logicalType: 'date' }], default: null },
        { name: 'at', type: ['null', { type: 'long', logicalType: 'timestamp-micros' }], default: null },
        { name: 'local_at', type: ['null', { type: 'long', logicalType: 'local-timestamp-millis' }], default: null },
        { name: 'grade', type: ['null', { type: 'enum', name: 'Record_grade', symbols: ['A', 'B'] }], default: null },
        { name: 'counts', type: ['null', { type: 'array', items: ['null', 'long'] }], default: null },
        {
          name: 'point',
          type: [
            'null',
            {
              type: 'record',
              name: 'Record_point',
              fields: [
                { name: 'x', type: ['null', 'double'], default: null },
                { name: 'tag', type: ['null', 'string'], default: null },
              ],
            },
          ],
          default: null,
        },
        { name: 'nothing', type: 'null', default: null },
      ],
    });
  });

  it('should give generated types unique names', () => {
    const schema: ColumnSchema = [
      { name: 'a', type: ColumnTypes.struct([{ name: 'b', type: ColumnTypes.enum(['X']) }]) },
      { name: 'a_b', type: ColumnTypes.enum(['Y']) },
    ];
    const avro = toAvroSchema(schema, { recordName: 'Row' });
    expect(JSON.stringify(avro)).toBe(
      '{"type":"record","name":"Row","fields":[' +
        '{"name":"a","type":["null",{"type":"record","name":"Row_a","fields":[' +
        '{"name":"b","type":["null",{"type":"enum","name":"Row_a_b","symbols":["X"]}],"default":null}]}],"default":null},' +
        '{"name":"a_b","type":["null",{"type":"enum","name":"Row_a_b_2","symbols":["Y"]}],"default":null}]}'
    );
  });

  it('should reject names Avro does not accept', () => {
    const error = thrown(() => toAvroSchema([{ name: 'my-col', type: 'int32' }]));
    expect(error).toBeInstanceOf(SchemaError);
    expect(error).toMatchObject({
      code: 'INVALID_FIELD_NAME',
      message: 'Invalid Avro field name "my-col": names must match [A-Za-z_][A-Za-z0-9_]*',
    });
    expect(() => toAvroSchema([], { recordName: '1st' })).toThrow('Invalid Avro record name "1st"');
  });

  it('should reject nanosecond datetimes', () => {
    expect(thrown(() => toAvroSchema([{ name: 't', type: ColumnTypes.datetime('ns', 'UTC') }]))).toMatchObject({
      code: 'UNSUPPORTED_TYPE',
      message: 'Cannot write Datetime(ns, UTC): nanosecond datetimes are not supported',
    });
  });
});

describe('encodeAvro', () => {
  const frame = Frame.fromRecords(RECORDS, SCHEMA);

  it('should read back the same schema and values', async () => {
    const read = await readAvro(encodeAvro(frame));
    expect(read.schema).toEqual(SCHEMA);
    expect(read.toRecords()).toEqual(RECORDS);
  });

  it('should compress blocks and write header metadata', async () => {
    const bytes = encodeAvro(frame, { codec: 'deflate', blockSize: 1, metadata: { 'created.by': 'tests' } });
    const reader = await AvroFileReader.open(chunked(bytes, 100));
    expect(reader.codec).toBe('deflate');
    expect(new TextDecoder().decode(reader.metadata.get('created.by'))).toBe('tests');
    expect((await readAvro(bytes)).toRecords()).toEqual(RECORDS);
  });

  it('should log what it encoded', () => {
    const logger = createTestLogger();
    encodeAvro(frame, { logger });
    const [entry] = logger.getLogs();
    expect(entry.message).toBe('Encoded frame');
    expect(entry.context).toMatchObject({ component: 'avro-sink', rows: 2, columns: 14, codec: 'null' });
  });

  it('should reject invalid options', () => {
    const error = thrown(() => encodeAvro(frame, { blockSize: 0 }));
    expect(error).toBeInstanceOf(ConfigError);
    expect(error).toMatchObject({ issues: [{ path: 'blockSize', message: 'Number must be greater than 0' }] });
  });
});

describe('writeAvro', () => {
  const frame = Frame.fromRecords([{ id: 1n }, { id: 2n }], [{ name: 'id', type: 'int64' }]);

  it('should write to a path', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, 'out.avro');
      await writeAvro(frame, path);
      expect((await readAvro(path)).toRecords()).toEqual([{ id: 1n }, { id: 2n }]);
      expect((await readFile(path)).subarray(0, 4)).toEqual(Buffer.from('Obj\x01', 'latin1'));
    });
  });

  it('should write to a stream without ending it', async () => {
    const chunks: Buffer[] = [];
    const stream = new Writable({
      write(chunk: Buffer, _encoding, callback) {
        chunks.push(chunk);
        callback();
      },
    });

    await writeAvro(frame, stream);
    expect(stream.writableEnded).toBe(false);
    expect((await readAvro(Buffer.concat(chunks))).toRecords()).toEqual([{ id: 1n }, { id: 2n }]);
  });

  it('should report destinations that cannot be written', async () => {
    await withTempDir(async (dir) => {
      const path = join(dir, 'missing', 'out.avro');
      const error = await writeAvro(frame, path).catch((caught: unknown) => caught);
      expect(error).toBeInstanceOf(SourceError);
      expect(error).toMatchObject({ code: 'SOURCE_WRITE_FAILED', path });
    });
  });
});
