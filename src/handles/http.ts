/**
 * @module handles/http
 *
 * HTTP(S) {@link ReadHandle} using Range Requests.
 *
 * Uses the Node.js built-in `fetch` to issue `Range: bytes=...` requests
 * against any endpoint that serves partial content. Each read is one
 * request starting at the handle's cursor; there is no connection state to
 * hold between reads. Transient failures are retried with exponential
 * backoff and every attempt is bounded by a timeout.
 */

import { assertPosition, type ReadHandle } from './handle.js';

/**
 * Configuration options for {@link HttpHandle}.
 */
export interface HttpHandleOptions {
  /**
   * Headers sent with every request, e.g. `{ Authorization: 'Bearer ...' }`.
   */
  headers?: Record<string, string>;
  /**
   * Per-request timeout in milliseconds.
   *
   * @defaultValue 30000
   */
  timeout?: number;
  /**
   * Retry configuration for transient failures.
   *
   * Retries are attempted on HTTP 5xx, HTTP 429, network errors and
   * timeouts, waiting `backoff * 2^attempt` ms between attempts.
   *
   * @defaultValue \{ attempts: 3, backoff: 200 \}
   */
  retry?: {
    /** Total number of attempts (including the initial request). */
    attempts: number;
    /** Base backoff delay in milliseconds before the first retry. */
    backoff: number;
  };
}

/**
 * Read handle on an HTTP(S) URL.
 *
 * A `206 Partial Content` body is returned as-is (trimmed to the requested
 * length). A `200` from a server that ignores `Range` is sliced to the
 * requested range. `416 Range Not Satisfiable` means the cursor is past the
 * end of the resource and yields an empty read.
 *
 * @example
 * ```typescript
 * const handle = new HttpHandle('https://cdn.example.com/archive.bin', {
 *   timeout: 15_000,
 *   retry: { attempts: 5, backoff: 300 },
 * });
 * await handle.seek(4096);
 * const bytes = await handle.read(512);
 * ```
 */
export class HttpHandle implements ReadHandle {
  private readonly headers: Record<string, string>;
  private readonly timeout: number;
  private readonly retryAttempts: number;
  private readonly retryBackoff: number;
  private cursor = 0;
  private closed = false;

  constructor(readonly url: string, options?: HttpHandleOptions) {
    this.headers = options?.headers ?? {};
    this.timeout = options?.timeout ?? 30_000;
    this.retryAttempts = Math.max(1, options?.retry?.attempts ?? 3);
    this.retryBackoff = options?.retry?.backoff ?? 200;
  }

  tell(): number {
    return this.cursor;
  }

  async seek(position: number): Promise<void> {
    this.ensureOpen();
    assertPosition(position);
    this.cursor = position;
  }

  /**
   * @throws {Error} With the HTTP status, URL and byte range when the
   *   server answers with a non-success status after retries.
   */
  async read(length: number): Promise<Uint8Array> {
    this.ensureOpen();
    if (length <= 0) return new Uint8Array(0);

    const start = this.cursor;
    const end = start + length - 1;
    const response = await this.fetchWithRetry({
      headers: {
        ...this.headers,
        Range: `bytes=${start}-${end}`,
      },
    });

    if (response.status === 416 || !response.ok) {
      await response.body?.cancel();
      if (response.status === 416) return new Uint8Array(0);
      throw new Error(`HTTP ${response.status} reading ${this.url} [${start}-${end}]`);
    }

    const body = new Uint8Array(await response.arrayBuffer());
    const bytes = response.status === 206
      ? body.subarray(0, length)
      : body.subarray(Math.min(start, body.length), Math.min(start + length, body.length));

    this.cursor += bytes.length;
    return bytes;
  }

  /** Nothing is held open between requests. */
  async close(): Promise<void> {
    this.closed = true;
  }

  // ─── Internal ──────────────────────────────────────────────────────────

  private ensureOpen(): void {
    if (this.closed) throw new Error(`HTTP handle is closed: ${this.url}`);
  }

  /**
   * Execute a `fetch` with timeout and exponential-backoff retry.
   *
   * @throws {Error} The last encountered error once attempts run out.
   */
  private async fetchWithRetry(init: RequestInit): Promise<Response> {
    let lastError: unknown = null;

    for (let attempt = 0; attempt < this.retryAttempts; attempt++) {
      const controller = new AbortController();
      const timer = setTimeout(() => controller.abort(), this.timeout);
      try {
        const response = await fetch(this.url, { ...init, signal: controller.signal });

        // Retry on 5xx or 429
        if ((response.status >= 500 || response.status === 429)
          && attempt < this.retryAttempts - 1) {
          lastError = new Error(`HTTP ${response.status}`);
          await response.body?.cancel();
          await sleep(this.retryBackoff * Math.pow(2, attempt));
          continue;
        }

        return response;
      } catch (e) {
        lastError = e;
        if (attempt < this.retryAttempts - 1) {
          await sleep(this.retryBackoff * Math.pow(2, attempt));
        }
      } finally {
        clearTimeout(timer);
      }
    }

    throw lastError instanceof Error ? lastError : new Error(`Failed to fetch ${this.url}`);
  }
}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}
