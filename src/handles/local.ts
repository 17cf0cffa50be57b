/**
 * @module handles/local
 *
 * Local filesystem {@link ReadHandle} on a Node.js `FileHandle`.
 *
 * Every `LocalHandle` opens its own descriptor in read-only mode, so a
 * window reading through one never moves the cursor of whoever registered
 * the original file. Reads are positional (`pread`), the cursor lives here.
 */

import { open, type FileHandle } from 'node:fs/promises';
import { assertPosition, type ReadHandle } from './handle.js';

/**
 * Maximum number of bytes per individual `FileHandle.read()` call.
 *
 * Node.js's native `fs.read` binding asserts that `length` fits in an
 * `Int32`. Larger reads are split into sequential chunks.
 */
const MAX_READ_CHUNK = 1024 * 1024 * 1024; // 1 GiB

export class LocalHandle implements ReadHandle {
  private cursor = 0;
  private closed = false;

  private constructor(
    private readonly file: FileHandle,
    /** Filesystem path the handle was opened on. */
    readonly path: string,
  ) {}

  /**
   * Open `path` read-only.
   *
   * @throws {Error} If the file cannot be opened (`ENOENT`, `EACCES`, ...).
   *
   * @example
   * ```typescript
   * const handle = await LocalHandle.open('./data/archive.bin');
   * await handle.seek(1024);
   * const header = await handle.read(64);
   * await handle.close();
   * ```
   */
  static async open(path: string): Promise<LocalHandle> {
    return new LocalHandle(await open(path, 'r'), path);
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
    if (length <= 0) return new Uint8Array(0);

    const buf = Buffer.alloc(length);
    let totalRead = 0;
    let remaining = length;
    while (remaining > 0) {
      const chunk = Math.min(remaining, MAX_READ_CHUNK);
      const { bytesRead } = await this.file.read(buf, totalRead, chunk, this.cursor + totalRead);
      totalRead += bytesRead;
      if (bytesRead < chunk) break; // EOF
      remaining -= bytesRead;
    }

    this.cursor += totalRead;
    return new Uint8Array(buf.buffer, buf.byteOffset, totalRead);
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    await this.file.close();
  }

  private ensureOpen(): void {
    if (this.closed) throw new Error(`File handle is closed: ${this.path}`);
  }
}
