import { describe, it, expect, afterEach, afterAll, vi } from 'vitest';
import { SubStream } from '../src/substream.js';
import { ResourceTable } from '../src/registry.js';
import { MemoryHandle } from '../src/handles/memory.js';
import { ParseError, StateError } from '../src/errors.js';
import { Whence } from '../src/types.js';
import type { ReadHandle } from '../src/handles/handle.js';
import { pseudoRandomBytes, sequence } from './helpers/bytes.js';
import { tempFiles } from './helpers/files.js';
import { captureLogger, silentLogger } from './helpers/logger.js';
import { ProbeHandle } from './helpers/probe-handle.js';
import { fakeFetcher } from './helpers/s3-store.js';

const files = tempFiles();
const streams: SubStream[] = [];

type Backing = 'memory' | 'file';

const BACKINGS: Array<[Backing, 'copy' | 'reopen']> = [
  ['memory', 'copy'],
  ['file', 'reopen'],
];

const registered: ReadHandle[] = [];

async function registerFile(table: ResourceTable, bytes: Uint8Array): Promise<string> {
  const id = await table.registerFile(await files.write(bytes));
  const entry = table.get(id);
  if (entry) registered.push(entry.handle);
  return id;
}

/** Register `bytes` under the given backing and return its id. */
async function register(table: ResourceTable, backing: Backing, bytes: Uint8Array): Promise<string> {
  return backing === 'memory' ? table.registerBytes(bytes) : registerFile(table, bytes);
}

function stream(table: ResourceTable): SubStream {
  const s = new SubStream({ registry: table, logger: silentLogger });
  streams.push(s);
  return s;
}

async function data(s: SubStream, count: number): Promise<Uint8Array> {
  const result = await s.read(count);
  if (result.kind !== 'data') throw new Error(`expected data, got ${result.kind}`);
  return result.bytes;
}

afterEach(async () => {
  await Promise.all(streams.splice(0).map(s => s.close()));
  await Promise.all(registered.splice(0).map(h => h.close()));
});

afterAll(async () => {
  await files.cleanup();
});

// ─── Behaviour shared by both strategies ──────────────────────────────────

describe.each(BACKINGS)('SubStream over a %s resource', (backing, strategy) => {
  const CONTENT = pseudoRandomBytes(200, 7);
  const OFFSET = 37;
  const LENGTH = 50;
  const EXPECTED = CONTENT.slice(OFFSET, OFFSET + LENGTH);

  async function openWindow(): Promise<{ s: SubStream; table: ResourceTable; id: string }> {
    const table = new ResourceTable();
    const id = await register(table, backing, CONTENT);
    const s = stream(table);
    expect(await s.open(table.identifierFor(id, OFFSET, LENGTH))).toBe(true);
    return { s, table, id };
  }

  it(`should serve the window through the ${strategy} strategy`, async () => {
    const { s } = await openWindow();
    expect(s.state).toBe('open');
    expect(s.strategy).toBe(strategy);
  });

  it('should read exactly the windowed bytes', async () => {
    const { s } = await openWindow();
    expect(await data(s, LENGTH)).toEqual(EXPECTED);
  });

  it('should clamp reads to the end of the window', async () => {
    const { s } = await openWindow();
    expect(await data(s, 1000)).toEqual(EXPECTED);
    expect(await s.read(1)).toEqual({ kind: 'eof' });
  });

  it('should report eof only once every byte has been read', async () => {
    const { s } = await openWindow();
    expect(s.eof()).toBe(false);
    await data(s, LENGTH - 1);
    expect(s.eof()).toBe(false);
    expect(s.tell()).toBe(LENGTH - 1);
    await data(s, 1);
    expect(s.eof()).toBe(true);
    expect(s.tell()).toBeUndefined();
  });

  it('should keep stat().size at the window length', async () => {
    const { s } = await openWindow();
    expect(s.stat()).toEqual({ size: LENGTH });
    await data(s, 10);
    expect(s.stat()).toEqual({ size: LENGTH });
    s.seek(-1, Whence.End);
    expect(s.stat()).toEqual({ size: LENGTH });
    await s.readToEnd();
    expect(s.stat()).toEqual({ size: LENGTH });
  });

  it('should seek within the window and reject its end', async () => {
    const { s } = await openWindow();
    expect(s.seek(0, Whence.Set)).toBe(true);
    expect(s.tell()).toBe(0);
    expect(s.seek(LENGTH - 1, Whence.Set)).toBe(true);
    expect(s.tell()).toBe(LENGTH - 1);
    expect(s.seek(LENGTH, Whence.Set)).toBe(false);
    expect(s.tell()).toBe(LENGTH - 1);
    expect(s.seek(-1, Whence.Set)).toBe(false);
    expect(s.tell()).toBe(LENGTH - 1);
  });

  it('should read from the sought position', async () => {
    const { s } = await openWindow();
    expect(s.seek(-5, Whence.End)).toBe(true);
    expect(await data(s, 10)).toEqual(EXPECTED.slice(LENGTH - 5));

    expect(s.seek(10, Whence.Set)).toBe(true);
    expect(s.seek(3, Whence.Current)).toBe(true);
    expect(s.tell()).toBe(13);
    expect(await data(s, 2)).toEqual(EXPECTED.slice(13, 15));
  });

  it('should keep independent cursors for windows on one resource', async () => {
    const { table, id, s: first } = await openWindow();
    const second = stream(table);
    expect(await second.open(table.identifierFor(id, OFFSET, LENGTH))).toBe(true);

    await data(first, 20);
    expect(first.tell()).toBe(20);
    expect(second.tell()).toBe(0);
    expect(await data(second, 5)).toEqual(EXPECTED.slice(0, 5));
  });

  it('should leave the registered handle where it was', async () => {
    const { s, table, id } = await openWindow();
    await data(s, LENGTH);
    expect(table.get(id)?.handle.tell()).toBe(0);
  });

  it('should read the remainder with readToEnd', async () => {
    const { s } = await openWindow();
    await data(s, 8);
    const rest = await s.readToEnd();
    expect(rest).toEqual({ ok: true, value: EXPECTED.slice(8) });
    expect(s.eof()).toBe(true);
  });

  it('should treat a zero-byte read as empty data', async () => {
    const { s } = await openWindow();
    const result = await s.read(0);
    expect(result.kind).toBe('data');
    expect(result.kind === 'data' && result.bytes.length).toBe(0);
    expect(s.tell()).toBe(0);
  });

  it('should return known bytes written at an offset', async () => {
    const K = 123;
    const payload = pseudoRandomBytes(300, 99);
    const table = new ResourceTable();
    let id: string;
    if (backing === 'memory') {
      const source = new MemoryHandle();
      await source.seek(K);
      await source.write(payload);
      id = table.register(source, { seekable: true, backingKind: 'memory' });
    } else {
      const bytes = new Uint8Array(K + payload.length);
      bytes.set(payload, K);
      id = await registerFile(table, bytes);
    }

    const s = stream(table);
    expect(await s.open(table.identifierFor(id, K, payload.length))).toBe(true);
    const result = await s.readToEnd();
    expect(result).toEqual({ ok: true, value: payload });
  });
});

// ─── Failed opens ───────────────────────────────────────────────────────────

describe('SubStream open failures', () => {
  it.each([
    ['missing separator', (id: string) => `substream://10/${id}`, 'PARSE'],
    ['non-numeric length', (id: string) => `substream://0:ten/${id}`, 'PARSE'],
    ['wrong scheme', (id: string) => `other://0:4/${id}`, 'INVALID_SCHEME'],
    ['unknown resource', (_id: string) => 'substream://0:4/424242', 'RESOURCE_NOT_FOUND'],
  ])('should stay unopened on %s and never touch the resource', async (_label, path, code) => {
    const table = new ResourceTable();
    const source = new ProbeHandle(sequence(16));
    const id = table.register(source, { seekable: true, backingKind: 'memory' });
    const s = stream(table);

    expect(await s.open(path(id))).toBe(false);
    expect(s.state).toBe('unopened');
    expect(s.lastError?.code).toBe(code);

    expect(await s.read(4)).toEqual({ kind: 'error', error: expect.any(StateError) });
    expect(s.seek(0)).toBe(false);
    expect(s.tell()).toBeUndefined();
    expect(s.eof()).toBe(true);
    expect(s.stat()).toBeUndefined();
    expect((await s.readToEnd()).ok).toBe(false);
    await s.close();
    expect(source.touched).toBe(false);
  });

  it('should refuse non-seekable resources', async () => {
    const table = new ResourceTable();
    const id = table.register(new ProbeHandle(sequence(16)), { seekable: false, backingKind: 'file', backingAddress: '/x' });
    const s = stream(table);

    expect(await s.open(`substream://0:4/${id}`)).toBe(false);
    expect(s.lastError?.code).toBe('NOT_SEEKABLE');
  });

  it('should log failures at error level only when asked to', async () => {
    const { logger, records } = captureLogger();
    const s = new SubStream({ registry: new ResourceTable(), logger });

    expect(await s.open('substream://0:x/1')).toBe(false);
    expect(records.filter(r => r.type === 'error')).toHaveLength(0);

    expect(await s.open('substream://0:x/1', 'r', { reportErrors: true })).toBe(false);
    const errors = records.filter(r => r.type === 'error');
    expect(errors).toHaveLength(1);
    expect(errors[0].args[0]).toBe(s.lastError);
    expect(s.lastError).toBeInstanceOf(ParseError);
  });

  it('should allow a retry after a failed open', async () => {
    const table = new ResourceTable();
    const s = stream(table);
    expect(await s.open('substream://0:4/1')).toBe(false);

    table.registerBytes(sequence(8));
    expect(await s.open('substream://0:4/1')).toBe(true);
    expect(await data(s, 4)).toEqual(sequence(4));
  });
});

// ─── Lifecycle ──────────────────────────────────────────────────────────────

describe('SubStream lifecycle', () => {
  it('should accept any mode and still only read', async () => {
    const table = new ResourceTable();
    const id = table.registerBytes(sequence(8));
    const s = stream(table);
    expect(await s.open(`substream://2:3/${id}`, 'w+')).toBe(true);
    expect(await data(s, 3)).toEqual(new Uint8Array([2, 3, 4]));
  });

  it('should refuse a second open while open', async () => {
    const table = new ResourceTable();
    const id = table.registerBytes(sequence(8));
    const s = stream(table);
    expect(await s.open(`substream://0:4/${id}`)).toBe(true);
    expect(await s.open(`substream://4:4/${id}`)).toBe(false);
    expect(s.lastError).toBeInstanceOf(StateError);
    expect(await data(s, 4)).toEqual(sequence(4));
  });

  it('should become inert after close', async () => {
    const table = new ResourceTable();
    const id = table.registerBytes(sequence(8));
    const s = stream(table);
    await s.open(`substream://0:4/${id}`);

    await s.close();
    await s.close();

    expect(s.state).toBe('closed');
    expect(s.strategy).toBeUndefined();
    expect(await s.read(1)).toEqual({ kind: 'error', error: expect.any(StateError) });
    expect(s.lastError?.message).toBe('Cannot read: stream is closed');
    expect(s.stat()).toBeUndefined();
    expect(await s.open(`substream://0:4/${id}`)).toBe(false);
  });

  it('should keep a shared S3 fetcher usable for other windows after close', async () => {
    const { fetcher, state } = fakeFetcher({ 'bucket/blob.bin': sequence(64) });
    const table = new ResourceTable();
    const id = table.register(new MemoryHandle(sequence(64)), {
      seekable: true,
      backingKind: 'file',
      backingAddress: 's3://bucket/blob.bin',
    });
    const a = new SubStream({ registry: table, logger: silentLogger, s3: { fetcher } });
    const b = new SubStream({ registry: table, logger: silentLogger, s3: { fetcher } });
    streams.push(a, b);

    expect(await a.open(`substream://16:8/${id}`)).toBe(true);
    expect(await b.open(`substream://32:8/${id}`)).toBe(true);
    expect(await data(a, 8)).toEqual(sequence(8, 16));
    await a.close();

    expect(state.destroyed).toBe(0);
    expect(await data(b, 8)).toEqual(sequence(8, 32));
  });

  it('should log, not throw, when releasing fails', async () => {
    const { logger, records } = captureLogger();
    const table = new ResourceTable();
    const id = table.registerBytes(sequence(16));
    const s = new SubStream({ registry: table, logger });

    expect(await s.open(`substream://0:8/${id}`)).toBe(true);
    const close = vi.spyOn(MemoryHandle.prototype, 'close')
      .mockRejectedValueOnce(new Error('close refused'));
    try {
      await expect(s.close()).resolves.toBeUndefined();
    } finally {
      close.mockRestore();
    }
    expect(s.state).toBe('closed');
    const warnings = records.filter(r => r.type === 'warn');
    expect(warnings).toHaveLength(1);
    expect(warnings[0].args[0]).toBe(`Failed to close window on resource ${id}`);
  });
});

// ─── Overlapping opens ──────────────────────────────────────────────────────

describe('SubStream opened concurrently over one source', () => {
  it('should copy each window intact and restore the source cursor', async () => {
    const table = new ResourceTable();
    const id = table.registerBytes(sequence(200));
    const source = table.get(id);
    if (!source) throw new Error('resource missing');
    await source.handle.seek(5);

    const a = new SubStream({ registry: table, logger: silentLogger, copyChunkSize: 4 });
    const b = new SubStream({ registry: table, logger: silentLogger, copyChunkSize: 4 });
    streams.push(a, b);

    const opened = await Promise.all([
      a.open(`substream://0:16/${id}`),
      b.open(`substream://100:16/${id}`),
    ]);
    expect(opened).toEqual([true, true]);

    expect(await a.readToEnd()).toEqual({ ok: true, value: sequence(16) });
    expect(await b.readToEnd()).toEqual({ ok: true, value: sequence(16, 100) });
    expect(source.handle.tell()).toBe(5);
  });

  it('should keep copying after an earlier copy fails', async () => {
    const table = new ResourceTable();
    const id = table.registerBytes(sequence(32));

    const a = new SubStream({ registry: table, logger: silentLogger, copyChunkSize: 4 });
    const b = new SubStream({ registry: table, logger: silentLogger, copyChunkSize: 4 });
    streams.push(a, b);

    const opened = await Promise.all([
      a.open(`substream://24:16/${id}`),
      b.open(`substream://8:8/${id}`),
    ]);
    expect(opened).toEqual([false, true]);
    expect(a.lastError?.message).toBe(`Resource ${id} ended after 8 of 16 bytes from 24`);
    expect(await b.readToEnd()).toEqual({ ok: true, value: sequence(8, 8) });
  });
});

// ─── Reads against a failing backing ────────────────────────────────────────

describe('SubStream read failures', () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should report handle errors without moving the cursor', async () => {
    vi.stubGlobal('fetch', vi.fn(async () => new Response(null, { status: 500 })));
    const table = new ResourceTable();
    const id = table.register(new MemoryHandle(), {
      seekable: true,
      backingKind: 'file',
      backingAddress: 'https://example.test/blob.bin',
    });
    const s = new SubStream({
      registry: table,
      logger: silentLogger,
      http: { retry: { attempts: 1, backoff: 0 } },
    });
    streams.push(s);

    expect(await s.open(`substream://10:4/${id}`)).toBe(true);
    const result = await s.read(4);
    expect(result.kind).toBe('error');
    if (result.kind !== 'error') return;
    expect(result.error.code).toBe('IO');
    expect(result.error.message).toBe(
      'Read of 4 bytes at 10 failed: HTTP 500 reading https://example.test/blob.bin [10-13]',
    );
    expect(s.tell()).toBe(0);
    expect(s.lastError).toBe(result.error);
  });

  it('should report eof when the backing ends inside the window', async () => {
    const table = new ResourceTable();
    const id = await registerFile(table, sequence(10));
    const s = stream(table);

    expect(await s.open(`substream://5:10/${id}`)).toBe(true);
    expect(await data(s, 10)).toEqual(sequence(5, 5));
    expect(await s.read(10)).toEqual({ kind: 'eof' });
    expect(s.tell()).toBe(5);
    expect(s.stat()).toEqual({ size: 10 });
  });
});
