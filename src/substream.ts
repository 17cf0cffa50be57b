/**
 * @module substream
 *
 * A read-only stream over a bounded window of a registered resource.
 *
 * {@link SubStream} is the caller-facing object: it opens an identifier,
 * then reads, seeks and reports positions relative to the window start.
 * After a successful open nothing it does throws; failures come back as
 * `false`, `undefined` or an `error` {@link ReadResult}, and the most
 * recent one is kept in {@link SubStream.lastError}.
 *
 * Lifecycle: `unopened → open → closed`. A failed open leaves the instance
 * unopened and every other call inert; the handle is never touched.
 *
 * @example
 * ```typescript
 * import { ResourceTable, SubStream, Whence } from 'substream';
 *
 * const table = new ResourceTable();
 * const id = table.registerBytes(archiveBytes);
 *
 * const stream = new SubStream({ registry: table });
 * if (await stream.open(`substream://128:64/${id}`, 'r', { reportErrors: true })) {
 *   stream.seek(-16, Whence.End);
 *   const trailer = await stream.readToEnd();
 *   await stream.close();
 * }
 * ```
 */

import { resolveConfig, type SubStreamConfig, type SubStreamOptions } from './config.js';
import { IoError, StateError, type SubstreamError } from './errors.js';
import { openWindow, type OpenedWindow } from './resolver.js';
import {
  err,
  ok,
  Whence,
  type ReadResult,
  type Result,
  type WindowStat,
} from './types.js';

export interface OpenOptions {
  /**
   * Also write open failures to the logger at error level. Without it a
   * failed open only returns `false`.
   */
  reportErrors?: boolean;
}

export type SubStreamStatus = 'unopened' | 'opening' | 'open' | 'closed';

export class SubStream {
  private readonly config: SubStreamConfig;
  private status: SubStreamStatus = 'unopened';
  private window: OpenedWindow | null = null;
  private error: SubstreamError | null = null;

  constructor(options?: SubStreamOptions) {
    this.config = resolveConfig(options);
  }

  get state(): SubStreamStatus {
    return this.status;
  }

  /** Most recent failure on this instance. */
  get lastError(): SubstreamError | null {
    return this.error;
  }

  /** How the open window is served, or `undefined` when not open. */
  get strategy(): OpenedWindow['strategy'] | undefined {
    return this.window?.strategy;
  }

  /**
   * Open a window identified by `path`.
   *
   * `mode` is accepted for symmetry with file APIs; only read access is
   * ever granted.
   */
  async open(path: string, mode: string = 'r', options: OpenOptions = {}): Promise<boolean> {
    if (this.status !== 'unopened') {
      return this.rejectOpen(new StateError(`Cannot open a stream that is ${this.status}`), options);
    }

    this.status = 'opening';
    const result = await openWindow(path, this.config);

    if (!result.ok) {
      if (this.state === 'opening') this.status = 'unopened';
      return this.rejectOpen(result.error, options);
    }

    if (this.state !== 'opening') {
      // closed while the open was in flight
      await this.release(result.value);
      return this.rejectOpen(new StateError('Stream was closed during open'), options);
    }

    this.window = result.value;
    this.status = 'open';
    const { state, strategy } = result.value;
    this.config.logger.debug(
      `Opened ${path} (mode ${mode}) as ${strategy} window [${state.enforceMin}, ${state.enforceMax})`,
    );
    return true;
  }

  /**
   * Read up to `count` bytes from the cursor.
   *
   * Short reads are normal; loop until `eof`. A read at the end of the
   * window is `eof`, not an error.
   */
  async read(count: number): Promise<ReadResult> {
    const window = this.window;
    if (!window) return this.readError(this.notOpen('read'));

    const { handle, state } = window;
    const remaining = state.remaining();
    if (remaining <= 0) return { kind: 'eof' };

    const n = Math.min(Math.floor(count), remaining);
    if (!(n > 0)) return { kind: 'data', bytes: new Uint8Array(0) };

    let bytes: Uint8Array;
    try {
      await handle.seek(state.offset);
      bytes = await handle.read(n);
    } catch (e) {
      return this.readError(new IoError(`Read of ${n} bytes at ${state.offset} failed`, e));
    }

    // The backing ended before the window did.
    if (bytes.length === 0) return { kind: 'eof' };

    if (bytes.length > n) bytes = bytes.subarray(0, n);
    state.advance(bytes.length);
    return { kind: 'data', bytes };
  }

  /** Read from the cursor to the end of the window. */
  async readToEnd(): Promise<Result<Uint8Array, SubstreamError>> {
    const chunks: Uint8Array[] = [];
    let total = 0;

    for (;;) {
      const remaining = this.window?.state.remaining() ?? 0;
      const result = await this.read(Math.max(1, remaining));
      if (result.kind === 'error') return err(result.error);
      if (result.kind === 'eof') break;
      chunks.push(result.bytes);
      total += result.bytes.length;
    }

    const out = new Uint8Array(total);
    let offset = 0;
    for (const chunk of chunks) {
      out.set(chunk, offset);
      offset += chunk.length;
    }
    return ok(out);
  }

  /**
   * Move the cursor. Positions are relative to the window; the end of the
   * window itself is not a valid target.
   *
   * @returns `false` when the target falls outside the window or the
   *   stream is not open; the cursor is then unchanged.
   */
  seek(offset: number, whence: Whence = Whence.Set): boolean {
    const window = this.window;
    if (!window) {
      this.error = this.notOpen('seek');
      return false;
    }
    return window.state.resolveSeek(offset, whence) !== undefined;
  }

  /** Cursor relative to the window start; `undefined` at the end or when not open. */
  tell(): number | undefined {
    return this.window?.state.relativePosition();
  }

  eof(): boolean {
    return this.window?.state.isEof() ?? true;
  }

  stat(): WindowStat | undefined {
    const window = this.window;
    return window ? { size: window.state.size } : undefined;
  }

  /**
   * Release the handle this window owns. Safe to call more than once and
   * before a successful open.
   */
  async close(): Promise<void> {
    if (this.status === 'closed' || this.status === 'unopened') return;

    const window = this.window;
    this.window = null;
    this.status = 'closed';
    if (window) await this.release(window);
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private async release(window: OpenedWindow): Promise<void> {
    try {
      await window.handle.close();
      this.config.logger.debug(`Closed ${window.strategy} window on resource ${window.identifier.resourceId}`);
    } catch (e) {
      this.config.logger.warn(`Failed to close window on resource ${window.identifier.resourceId}`, e);
    }
  }

  private rejectOpen(error: SubstreamError, options: OpenOptions): false {
    this.error = error;
    if (options.reportErrors) {
      this.config.logger.error(error);
    } else {
      this.config.logger.debug(`Open failed: ${error.message}`);
    }
    return false;
  }

  private readError(error: SubstreamError): ReadResult {
    this.error = error;
    return { kind: 'error', error };
  }

  private notOpen(operation: string): StateError {
    return new StateError(`Cannot ${operation}: stream is ${this.status}`);
  }
}
