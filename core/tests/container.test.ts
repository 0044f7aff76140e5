import { describe, it, expect } from 'vitest';
import { AvroFileReader, AvroFileWriter, encodeContainer } from '../src/avro/container.js';
import { DecodeError } from '../src/errors.js';
import { PERSON_SCHEMA, chunked, collectAll, people, personContainer } from './fixtures.js';

async function readAll(bytes: Uint8Array, chunkSize = 1024): Promise<unknown[]> {
  const reader = await AvroFileReader.open(chunked(bytes, chunkSize));
  return collectAll(reader.records());
}

describe('Avro container files', () => {
  describe('round trips', () => {
    it('should read back records written in several blocks', async () => {
      const bytes = personContainer(0, 25, { blockSize: 10 });
      expect(await readAll(bytes)).toEqual(people(0, 25));
    });

    it('should read back deflate-compressed blocks', async () => {
      const records = people(100, 40);
      const bytes = encodeContainer(PERSON_SCHEMA, records, { codec: 'deflate', blockSize: 16 });
      const reader = await AvroFileReader.open(chunked(bytes, 64));

      expect(reader.codec).toBe('deflate');
      expect(await collectAll(reader.records())).toEqual(records);
    });

    it('should read input delivered one byte at a time', async () => {
      expect(await readAll(personContainer(0, 6, { blockSize: 4 }), 1)).toEqual(people(0, 6));
    });

    it('should read a container without blocks', async () => {
      const bytes = new AvroFileWriter(PERSON_SCHEMA).toBuffer();
      expect(await readAll(bytes)).toEqual([]);
    });
  });

  describe('header', () => {
    it('should expose the writer schema and metadata', async () => {
      const bytes = personContainer(0, 1, { metadata: { 'created.by': 'tests' } });
      const reader = await AvroFileReader.open(chunked(bytes, 7));

      expect(reader.writerSchema).toEqual(PERSON_SCHEMA);
      expect(reader.codec).toBe('null');
      expect(new TextDecoder().decode(reader.metadata.get('created.by'))).toBe('tests');
    });

    it('should reject input without the magic bytes', async () => {
      const bytes = personContainer(0, 1);
      bytes[0] = 0x00;
      await expect(AvroFileReader.open(chunked(bytes, 1024))).rejects.toMatchObject({ code: 'INVALID_MAGIC' });
    });

    it('should reject codecs it cannot decompress', async () => {
      const bytes = personContainer(0, 1, { metadata: { 'avro.codec': 'snappy' } });
      await expect(AvroFileReader.open(chunked(bytes, 1024))).rejects.toThrow('Unsupported container codec "snappy"');
    });

    it('should reject empty input', async () => {
      await expect(AvroFileReader.open(chunked(new Uint8Array(0), 1))).rejects.toMatchObject({
        code: 'UNEXPECTED_EOF',
      });
    });
  });

  describe('corruption', () => {
    it('should detect a damaged sync marker', async () => {
      const bytes = personContainer(0, 3);
      bytes[bytes.length - 1] ^= 0xff;
      await expect(readAll(bytes)).rejects.toMatchObject({ code: 'SYNC_MISMATCH' });
    });

    it('should detect a truncated block', async () => {
      const bytes = personContainer(0, 3);
      await expect(readAll(bytes.subarray(0, bytes.length - 5))).rejects.toBeInstanceOf(DecodeError);
      await expect(readAll(bytes.subarray(0, bytes.length - 5))).rejects.toMatchObject({ code: 'UNEXPECTED_EOF' });
    });

    it('should detect a block with bytes left over', async () => {
      const writer = new AvroFileWriter(PERSON_SCHEMA);
      // one record (id 1, name null) followed by two stray bytes
      writer.addBlock(1, new Uint8Array([0x02, 0x00, 0x04, 0x00]));
      await expect(readAll(writer.toBuffer())).rejects.toThrow('Block declared 1 records but 2 bytes were left over');
    });
  });

  it('should only iterate records once', async () => {
    const reader = await AvroFileReader.open(chunked(personContainer(0, 2), 1024));
    await collectAll(reader.records());
    await expect(collectAll(reader.records())).rejects.toThrow('Container records can only be iterated once');
  });
});
