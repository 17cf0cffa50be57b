/**
 * @module handles/s3
 *
 * Amazon S3 {@link ReadHandle} using AWS SDK v3.
 *
 * Reads byte ranges via `GetObject` with the `Range` header. The
 * `@aws-sdk/client-s3` package is loaded lazily at first read so that
 * applications that never window an S3 object pay no import cost.
 *
 * Compatible with any S3-compatible object store (MinIO, Cloudflare R2,
 * Backblaze B2, etc.) via the `endpoint` and `forcePathStyle` options.
 */

import type { S3ClientConfig } from '@aws-sdk/client-s3';
import { assertPosition, type ReadHandle } from './handle.js';

/**
 * Configuration options for {@link S3Handle}.
 */
export interface S3HandleOptions {
  /** AWS region for the S3 client (e.g. `"us-east-1"`). */
  region?: string;
  /**
   * Explicit AWS credentials. When omitted, the SDK's default provider
   * chain applies.
   */
  credentials?: {
    accessKeyId: string;
    secretAccessKey: string;
    sessionToken?: string;
  };
  /** Custom endpoint URL for S3-compatible object stores. */
  endpoint?: string;
  /** Force path-style addressing (`endpoint/bucket/key`). */
  forcePathStyle?: boolean;
  /**
   * Replaces the SDK-backed range fetcher. Mostly useful in tests. An
   * injected fetcher may be shared between handles and is never destroyed
   * by them.
   */
  fetcher?: S3RangeFetcher;
}

/**
 * Fetches an inclusive byte range of an object.
 *
 * Resolves `null` when the range starts past the end of the object.
 */
export interface S3RangeFetcher {
  getRange(bucket: string, key: string, start: number, end: number): Promise<Uint8Array | null>;
  destroy(): void;
}

/**
 * Parse an S3 path into bucket and key.
 *
 * - `"s3://my-bucket/path/to/file.bin"` → `{ bucket: "my-bucket", key: "path/to/file.bin" }`
 * - `"my-bucket/path/to/file.bin"` → same
 *
 * @throws {Error} If the key portion is missing.
 */
export function parseS3Path(path: string): { bucket: string; key: string } {
  const normalized = path.startsWith('s3://') ? path.slice(5) : path;
  const slashIdx = normalized.indexOf('/');
  if (slashIdx <= 0 || slashIdx === normalized.length - 1) {
    throw new Error(`Invalid S3 path (no key): ${path}`);
  }
  return {
    bucket: normalized.slice(0, slashIdx),
    key: normalized.slice(slashIdx + 1),
  };
}

/**
 * Read handle on a single S3 object.
 *
 * The bucket and key are parsed eagerly so an invalid address fails when
 * the handle is created; the S3 client itself is created on the first
 * read and destroyed by {@link S3Handle.close}. A fetcher passed in
 * through the options stays with its owner.
 *
 * @example
 * ```typescript
 * const handle = new S3Handle('s3://my-bucket/archives/2024.bin', {
 *   region: 'us-east-1',
 * });
 * await handle.seek(1 << 20);
 * const bytes = await handle.read(4096);
 * await handle.close();
 * ```
 */
export class S3Handle implements ReadHandle {
  private readonly bucket: string;
  private readonly key: string;
  private fetcher: S3RangeFetcher | null;
  private ownsFetcher = false;
  private cursor = 0;
  private closed = false;

  constructor(readonly path: string, private readonly options: S3HandleOptions = {}) {
    ({ bucket: this.bucket, key: this.key } = parseS3Path(path));
    this.fetcher = options.fetcher ?? null;
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
   * @throws {Error} If the SDK call fails (permissions, missing object,
   *   network) or the response has no body.
   */
  async read(length: number): Promise<Uint8Array> {
    this.ensureOpen();
    if (length <= 0) return new Uint8Array(0);

    if (!this.fetcher) {
      this.fetcher = createSdkFetcher(this.options);
      this.ownsFetcher = true;
    }
    const start = this.cursor;
    const bytes = await this.fetcher.getRange(this.bucket, this.key, start, start + length - 1);
    if (bytes === null) return new Uint8Array(0);

    const result = bytes.subarray(0, length);
    this.cursor += result.length;
    return result;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;
    const fetcher = this.fetcher;
    this.fetcher = null;
    if (this.ownsFetcher) fetcher?.destroy();
  }

  private ensureOpen(): void {
    if (this.closed) throw new Error(`S3 handle is closed: ${this.path}`);
  }
}

// ─── SDK-backed fetcher ─────────────────────────────────────────────────────

type S3Sdk = typeof import('@aws-sdk/client-s3');

/**
 * Lazily load `@aws-sdk/client-s3`.
 *
 * @throws {Error} If the package cannot be loaded.
 */
async function loadS3Sdk(): Promise<S3Sdk> {
  try {
    return await import('@aws-sdk/client-s3');
  } catch (cause) {
    throw new Error('S3 support requires @aws-sdk/client-s3', { cause });
  }
}

function createSdkFetcher(options: S3HandleOptions): S3RangeFetcher {
  let pending: Promise<{ sdk: S3Sdk; client: InstanceType<S3Sdk['S3Client']> }> | null = null;
  let destroyed = false;

  const init = async () => {
    const sdk = await loadS3Sdk();
    const config: S3ClientConfig = {};
    if (options.region) config.region = options.region;
    if (options.credentials) config.credentials = options.credentials;
    if (options.endpoint) config.endpoint = options.endpoint;
    if (options.forcePathStyle) config.forcePathStyle = true;
    return { sdk, client: new sdk.S3Client(config) };
  };

  return {
    async getRange(bucket, key, start, end) {
      if (destroyed) throw new Error('S3 client has been destroyed');
      pending ??= init().catch((e: unknown) => {
        pending = null; // allow retry on failure
        throw e;
      });
      const { sdk, client } = await pending;

      try {
        const response = await client.send(new sdk.GetObjectCommand({
          Bucket: bucket,
          Key: key,
          Range: `bytes=${start}-${end}`,
        }));
        if (!response.Body) {
          throw new Error(`Empty response body for s3://${bucket}/${key} [${start}-${end}]`);
        }
        return await response.Body.transformToByteArray();
      } catch (e) {
        if (e instanceof sdk.S3ServiceException
          && (e.name === 'InvalidRange' || e.$metadata.httpStatusCode === 416)) {
          return null;
        }
        throw e;
      }
    },

    destroy() {
      destroyed = true;
      const current = pending;
      pending = null;
      // A client still initializing is destroyed once it exists.
      void current?.then(({ client }) => client.destroy(), () => undefined);
    },
  };
}
