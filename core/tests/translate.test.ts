import { describe, it, expect } from 'vitest';
import * as fc from 'fast-check';
import { SchemaError } from '../src/errors.js';
import { parseAvroNode, translateSchema, translateType, unwrapNullable } from '../src/schema/translate.js';
import { ColumnTypes, schemasEqual, type ColumnSchema, type ColumnType, type PrimitiveColumnType } from '../src/schema/types.js';
import { toAvroSchema } from '../src/sink/write.js';
import { thrown } from './fixtures.js';

describe('translateType', () => {
  describe('primitives', () => {
    it.each([
      ['null', 'null'],
      ['boolean', 'boolean'],
      ['int', 'int32'],
      ['long', 'int64'],
      ['float', 'float32'],
      ['double', 'float64'],
      ['bytes', 'binary'],
      ['string', 'string'],
    ])('should map %s to %s', (avro, column) => {
      expect(translateType(avro)).toBe(column);
      expect(translateType({ type: avro })).toBe(column);
    });

    it('should ignore logical types on float and double', () => {
      expect(translateType({ type: 'double', logicalType: 'made-up' })).toBe('float64');
    });
  });

  describe('optionality', () => {
    it('should unwrap nullable unions in either order', () => {
      const variants = [['null', 'long'], ['long', 'null'], ['long'], 'long'];
      expect(variants.map((node) => translateType(node))).toEqual(['int64', 'int64', 'int64', 'int64']);
    });

    it('should unwrap one level only', () => {
      expect(unwrapNullable(['null', ['null', 'int']])).toEqual(['null', 'int']);
      expect(() => translateType(['null', ['null', 'int']])).toThrow(SchemaError);
    });

    it('should reject unions with more than one non-null branch', () => {
      const error = thrown(() => translateType(['null', 'long', 'string']));
      expect(error).toBeInstanceOf(SchemaError);
      expect(error).toMatchObject({
        code: 'UNSUPPORTED_TYPE',
        message: 'Unsupported Avro type: ["null","long","string"]',
        fragment: ['null', 'long', 'string'],
      });
    });
  });

  describe('logical types', () => {
    it.each([
      ['timestamp-millis', ColumnTypes.datetime('ms', 'UTC')],
      ['timestamp-micros', ColumnTypes.datetime('us', 'UTC')],
      ['timestamp-nanos', ColumnTypes.datetime('ns', 'UTC')],
      ['local-timestamp-millis', ColumnTypes.datetime('ms')],
      ['local-timestamp-micros', ColumnTypes.datetime('us')],
      ['local-timestamp-nanos', ColumnTypes.datetime('ns')],
    ])('should map long %s to a datetime', (logicalType, expected) => {
      expect(translateType({ type: 'long', logicalType })).toEqual(expected);
    });

    it('should map int date to date', () => {
      expect(translateType(['null', { type: 'int', logicalType: 'date' }])).toBe('date');
    });

    it('should reject unrecognised logical types unless conversion is enabled', () => {
      const decimal = { type: 'bytes', logicalType: 'decimal', precision: 10, scale: 2 };
      expect(thrown(() => translateType(decimal))).toMatchObject({ code: 'UNSUPPORTED_LOGICAL_TYPE' });
      expect(translateType(decimal, { convertLogicalTypes: true })).toBe('binary');

      const uuid = { type: 'string', logicalType: 'uuid' };
      expect(() => translateType(uuid)).toThrow('Unsupported logical type "uuid" on string');
      expect(translateType(uuid, { convertLogicalTypes: true })).toBe('string');
    });

    it('should treat a recognised logical type on the wrong physical type as unrecognised', () => {
      const node = { type: 'long', logicalType: 'date' };
      expect(thrown(() => translateType(node))).toMatchObject({ code: 'UNSUPPORTED_LOGICAL_TYPE' });
      expect(translateType(node, { convertLogicalTypes: true })).toBe('int64');
    });
  });

  describe('complex types', () => {
    it('should keep enum symbols in declaration order', () => {
      expect(translateType({ type: 'enum', name: 'Suit', symbols: ['SPADES', 'HEARTS', 'CLUBS'] })).toEqual({
        type: 'enum',
        categories: ['SPADES', 'HEARTS', 'CLUBS'],
      });
    });

    it('should translate nested arrays and records', () => {
      const node = {
        type: 'array',
        items: [
          'null',
          {
            type: 'record',
            name: 'Point',
            fields: [
              { name: 'x', type: 'double' },
              { name: 'tags', type: { type: 'array', items: 'string' } },
            ],
          },
        ],
      };
      expect(translateType(node)).toEqual(
        ColumnTypes.list(
          ColumnTypes.struct([
            { name: 'x', type: 'float64' },
            { name: 'tags', type: ColumnTypes.list('string') },
          ])
        )
      );
    });

    it.each([
      [{ type: 'map', values: 'int' }, 'Unsupported Avro type: {"type":"map","values":"int"}'],
      [{ type: 'fixed', name: 'Hash', size: 16 }, 'Unsupported Avro type: {"type":"fixed","name":"Hash","size":16}'],
      ['Person', 'Unsupported Avro type: "Person"'],
      [42, 'Unsupported Avro type: 42'],
    ])('should reject %j', (node, message) => {
      expect(() => translateType(node)).toThrow(message);
    });
  });

  it('should parse object and bare primitives to the same node', () => {
    expect(parseAvroNode('int')).toEqual(parseAvroNode({ type: 'int' }));
    expect(parseAvroNode({ type: 'int', logicalType: 'date' })).toEqual({
      kind: 'primitive',
      primitive: 'int',
      logicalType: 'date',
    });
  });
});

describe('translateSchema', () => {
  it('should translate a top-level record field by field', () => {
    const document = {
      type: 'record',
      name: 'Reading',
      fields: [
        { name: 'sensor', type: 'string' },
        { name: 'at', type: { type: 'long', logicalType: 'timestamp-micros' } },
        { name: 'value', type: ['null', 'double'] },
      ],
    };
    expect(translateSchema(document)).toEqual({
      schema: [
        { name: 'sensor', type: 'string' },
        { name: 'at', type: ColumnTypes.datetime('us', 'UTC') },
        { name: 'value', type: 'float64' },
      ],
      singleton: false,
    });
  });

  it('should keep duplicate field names', () => {
    const document = {
      type: 'record',
      name: 'Twice',
      fields: [
        { name: 'a', type: 'int' },
        { name: 'a', type: 'string' },
      ],
    };
    expect(translateSchema(document).schema.map((field) => field.name)).toEqual(['a', 'a']);
  });

  it('should wrap non-record schemas when a column name is given', () => {
    expect(translateSchema('long', { singleColName: 'value' })).toEqual({
      schema: [{ name: 'value', type: 'int64' }],
      singleton: true,
    });
    expect(translateSchema(['null', { type: 'array', items: 'int' }], { singleColName: 'xs' })).toEqual({
      schema: [{ name: 'xs', type: ColumnTypes.list('int32') }],
      singleton: true,
    });
  });

  it('should reject non-record schemas without a column name', () => {
    const error = thrown(() => translateSchema({ type: 'array', items: 'int' }));
    expect(error).toBeInstanceOf(SchemaError);
    expect(error).toMatchObject({
      code: 'TOP_LEVEL_NOT_RECORD',
      message: 'Top-level schema must be a record schema: {"type":"array","items":"int"}',
    });
  });

  it('should reject fields without a name or type', () => {
    const document = { type: 'record', name: 'Broken', fields: [{ name: 'ok', type: 'int' }, { type: 'int' }] };
    expect(thrown(() => translateSchema(document))).toMatchObject({
      code: 'INVALID_FIELD_DEFINITION',
      message: 'Invalid field definition: {"type":"int"}',
    });
  });
});

describe('writer schemas', () => {
  const leaf: fc.Arbitrary<ColumnType> = fc.oneof(
    fc.constantFrom<PrimitiveColumnType>(
      'null',
      'boolean',
      'int32',
      'int64',
      'float32',
      'float64',
      'binary',
      'string',
      'date'
    ),
    fc.record({
      unit: fc.constantFrom<'ms' | 'us'>('ms', 'us'),
      zone: fc.constantFrom<'UTC' | null>('UTC', null),
    }).map(({ unit, zone }) => ColumnTypes.datetime(unit, zone)),
    fc.uniqueArray(fc.stringMatching(/^[A-Z][A-Z0-9]{0,3}$/), { minLength: 1, maxLength: 4 }).map((symbols) =>
      ColumnTypes.enum(symbols)
    )
  );

  const fieldName = fc.stringMatching(/^[a-z][a-z0-9_]{0,5}$/);

  const fields = (type: fc.Arbitrary<ColumnType>): fc.Arbitrary<ColumnSchema> =>
    fc
      .uniqueArray(fc.tuple(fieldName, type), { minLength: 1, maxLength: 4, selector: ([name]) => name })
      .map((pairs) => pairs.map(([name, fieldType]) => ({ name, type: fieldType })));

  const columnType: fc.Memo<ColumnType> = fc.memo((depth) =>
    depth <= 1
      ? leaf
      : fc.oneof(
          leaf,
          columnType(depth - 1).map((inner) => ColumnTypes.list(inner)),
          fields(columnType(depth - 1)).map((structFields) => ColumnTypes.struct(structFields))
        )
  );

  it('should translate the schemas frames are written with back to the same columns', () => {
    fc.assert(
      fc.property(fields(columnType(3)), (schema) => {
        const translated = translateSchema(toAvroSchema(schema));
        expect(translated.singleton).toBe(false);
        expect(schemasEqual(translated.schema, schema)).toBe(true);
      })
    );
  });

  it('should be deterministic', () => {
    fc.assert(
      fc.property(fields(columnType(2)), (schema) => {
        const avro = toAvroSchema(schema);
        expect(translateSchema(avro)).toEqual(translateSchema(avro));
      })
    );
  });
});
