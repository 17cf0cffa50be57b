/**
 * @module handles/memory
 *
 * In-process {@link ReadHandle} over a growable byte buffer.
 *
 * Serves two roles: a memory-backed source that callers register, and the
 * private copy a window materializes when its source cannot be reopened.
 * Unlike the other handles it is writable, so the copy can be filled in.
 */

import { assertPosition, type ReadHandle } from './handle.js';

const INITIAL_CAPACITY = 256;

export class MemoryHandle implements ReadHandle {
  private buf: Uint8Array;
  private used: number;
  private cursor = 0;
  private closed = false;

  /** @param initial - Bytes to start with; copied, the cursor stays at 0. */
  constructor(initial?: Uint8Array) {
    this.used = initial?.length ?? 0;
    this.buf = new Uint8Array(Math.max(INITIAL_CAPACITY, this.used));
    if (initial) this.buf.set(initial);
  }

  /** Bytes currently stored. */
  get size(): number {
    return this.used;
  }

  tell(): number {
    return this.cursor;
  }

  async seek(position: number): Promise<void> {
    this.ensureOpen();
    assertPosition(position);
    this.cursor = position;
  }

  async read(length: number): Promise<Uint8Array> {
    this.ensureOpen();
    const start = Math.min(this.cursor, this.used);
    const end = Math.min(this.used, start + Math.max(0, length));
    this.cursor = Math.max(this.cursor, end);
    return this.buf.slice(start, end);
  }

  /**
   * Write at the cursor, growing the buffer as needed, and advance the
   * cursor. A gap between the old end and the cursor is zero-filled.
   */
  async write(bytes: Uint8Array): Promise<number> {
    this.ensureOpen();
    const end = this.cursor + bytes.length;
    this.reserve(end);
    this.buf.set(bytes, this.cursor);
    this.cursor = end;
    this.used = Math.max(this.used, end);
    return bytes.length;
  }

  /** A copy of everything stored. */
  contents(): Uint8Array {
    return this.buf.slice(0, this.used);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    this.buf = new Uint8Array(0);
    this.used = 0;
    this.cursor = 0;
  }

  get isClosed(): boolean {
    return this.closed;
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private ensureOpen(): void {
    if (this.closed) throw new Error('Memory handle is closed');
  }

  private reserve(capacity: number): void {
    if (capacity <= this.buf.length) return;
    let next = this.buf.length * 2;
    while (next < capacity) next *= 2;
    const grown = new Uint8Array(next);
    grown.set(this.buf.subarray(0, this.used));
    this.buf = grown;
  }
}
