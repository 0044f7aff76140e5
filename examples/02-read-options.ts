/**
 * Example 02: Eager Reads from Memory and Streams
 *
 * Encodes a frame in memory and reads it back with `readAvro`, using column
 * ordinals, a row index and a row limit. Then reads the same bytes from a
 * Node.js stream, and a non-record schema with `singleColName`.
 *
 * Run with: npx tsx examples/02-read-options.ts
 */

import { Readable } from 'node:stream';
import {
  Frame,
  encodeAvro,
  encodeContainer,
  readAvro,
  formatSchema,
} from '../core/src/index.js';

async function main() {
  console.log('='.repeat(60));
  console.log('Example 02: Eager Reads from Memory and Streams');
  console.log('='.repeat(60));
  console.log();

  const frame = Frame.fromRecords(
    [
      { name: 'ada', score: 91.5, joined: 19000 },
      { name: 'grace', score: 78.25, joined: 19010 },
      { name: 'linus', score: null, joined: 19020 },
    ],
    [
      { name: 'name', type: 'string' },
      { name: 'score', type: 'float64' },
      { name: 'joined', type: 'date' },
    ]
  );
  const bytes = encodeAvro(frame);
  console.log(`1. Encoded ${frame.height} rows into ${bytes.length} bytes`);

  const head = await readAvro(bytes, { columns: [0, -1], rowIndexName: 'row', nRows: 2 });
  console.log(`2. ${formatSchema(head.schema)}`);
  for (const row of head.toRecords()) {
    console.log(`   - ${JSON.stringify(row, (_, v: unknown) => (typeof v === 'bigint' ? v.toString() : v))}`);
  }

  const streamed = await readAvro(Readable.from([bytes.subarray(0, 10), bytes.subarray(10)]));
  console.log(`3. Read ${streamed.height} rows from a stream`);

  const longs = encodeContainer('long', [1n, 2n, 3n]);
  const single = await readAvro(longs, { singleColName: 'value' });
  console.log(`4. Non-record schema read as ${formatSchema(single.schema)}`);

  console.log();
  console.log('='.repeat(60));
  console.log('Reads complete!');
  console.log('='.repeat(60));
}

main().catch(console.error);
