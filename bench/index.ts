/**
 * Performance benchmarks for substream.
 *
 * Measures open + full read of windows through both strategies: a
 * materialized copy of a memory-backed resource and an independent handle
 * reopened on a local file.
 *
 * Run: npm run bench
 */

import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { createConsola } from 'consola';
import { ResourceTable } from '../src/registry.js';
import { SubStream } from '../src/substream.js';

const quiet = createConsola({ level: 1 });

// ─── Helpers ────────────────────────────────────────────────────────────────

async function bench(name: string, bytesPerOp: number, fn: () => Promise<void>, iterations: number): Promise<void> {
  // Warmup
  for (let i = 0; i < Math.min(iterations, 20); i++) await fn();

  const start = performance.now();
  for (let i = 0; i < iterations; i++) await fn();
  const elapsed = performance.now() - start;

  const opsPerSec = (iterations / elapsed) * 1000;
  const mbPerSec = (bytesPerOp * iterations) / (elapsed / 1000) / (1024 * 1024);

  console.log(
    `  ${name.padEnd(40)} ${fmt(opsPerSec, 0).padStart(10)} ops/s  ${fmt(mbPerSec, 1).padStart(10)} MiB/s`,
  );
}

function fmt(n: number, decimals: number): string {
  return n.toLocaleString('en-US', { maximumFractionDigits: decimals });
}

async function readWindow(table: ResourceTable, id: string, offset: number, length: number): Promise<void> {
  const stream = new SubStream({ registry: table, logger: quiet });
  if (!await stream.open(table.identifierFor(id, offset, length))) {
    throw stream.lastError ?? new Error('open failed');
  }
  const result = await stream.readToEnd();
  await stream.close();
  if (!result.ok) throw result.error;
}

// ─── Main ───────────────────────────────────────────────────────────────────

async function main(): Promise<void> {
  const size = 16 * 1024 * 1024;
  const content = new Uint8Array(size);
  for (let i = 0; i < size; i++) content[i] = (i * 31) & 0xff;

  const dir = await mkdtemp(join(tmpdir(), 'substream-bench-'));
  const path = join(dir, 'content.bin');
  await writeFile(path, content);

  const table = new ResourceTable();
  const memoryId = table.registerBytes(content);
  const fileId = await table.registerFile(path);

  try {
    for (const length of [4 * 1024, 256 * 1024, 4 * 1024 * 1024]) {
      console.log(`\nWindow of ${fmt(length / 1024, 0)} KiB at offset 1 MiB`);
      const iterations = Math.max(10, Math.floor((64 * 1024 * 1024) / length));
      await bench('copy (memory-backed)', length, () => readWindow(table, memoryId, 1 << 20, length), iterations);
      await bench('reopen (file-backed)', length, () => readWindow(table, fileId, 1 << 20, length), iterations);
    }
  } finally {
    await table.get(fileId)?.handle.close();
    await rm(dir, { recursive: true, force: true });
  }
}

main().catch((e: unknown) => {
  console.error(e);
  process.exitCode = 1;
});
