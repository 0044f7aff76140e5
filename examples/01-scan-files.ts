/**
 * Example 01: Scanning a Directory of Avro Files
 *
 * Writes three part files to a temporary directory, then scans them lazily:
 * - resolving the shared schema
 * - filtering and projecting with pushdown
 * - logging scan progress
 *
 * Run with: npx tsx examples/01-scan-files.ts
 */

import { mkdtemp, rm } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import {
  Frame,
  scanAvro,
  writeAvro,
  createConsoleLogger,
  formatSchema,
  type ColumnSchema,
} from '../core/src/index.js';

const schema: ColumnSchema = [
  { name: 'id', type: 'int64' },
  { name: 'status', type: { type: 'enum', categories: ['active', 'paused', 'closed'] } },
  { name: 'created', type: { type: 'datetime', timeUnit: 'us', timeZone: 'UTC' } },
  { name: 'tags', type: { type: 'list', inner: 'string' } },
];

const STATUSES = ['active', 'paused', 'closed'];

function makePart(part: number, rows: number): Frame {
  const records = Array.from({ length: rows }, (_, i) => {
    const id = part * 100 + i;
    return {
      id: BigInt(id),
      status: STATUSES[id % STATUSES.length],
      created: new Date(Date.UTC(2024, 0, 1 + i)),
      tags: i % 2 === 0 ? ['even'] : null,
    };
  });
  return Frame.fromRecords(records, schema);
}

async function main() {
  console.log('='.repeat(60));
  console.log('Example 01: Scanning a Directory of Avro Files');
  console.log('='.repeat(60));
  console.log();

  const dir = await mkdtemp(join(tmpdir(), 'avro-columnar-example-'));
  try {
    // Step 1: Write part files
    for (let part = 0; part < 3; part++) {
      await writeAvro(makePart(part, 5), join(dir, `part-${part}.avro`), { codec: 'deflate' });
    }
    console.log(`1. Wrote 3 part files to ${dir}`);

    // Step 2: Resolve the schema without reading rows
    const logger = createConsoleLogger({ format: 'pretty', minLevel: 'info' });
    const lf = scanAvro(join(dir, 'part-*.avro'), { batchSize: 4, logger });
    console.log(`2. Schema: ${formatSchema(await lf.schema())}`);

    // Step 3: Filter and project
    const active = await lf.filter({ status: 'active' }).select(['id', 'created']).collect();
    console.log(`3. Active rows: ${active.height}`);
    for (const row of active.toRecords()) {
      console.log(`   - id=${row.id} created=${row.created}`);
    }
  } finally {
    await rm(dir, { recursive: true, force: true });
  }

  console.log();
  console.log('='.repeat(60));
  console.log('Scan complete!');
  console.log('='.repeat(60));
}

main().catch(console.error);
