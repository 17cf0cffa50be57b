/**
 * @module config
 *
 * Option resolution for {@link SubStream} and the resolver.
 *
 * Every option is optional. Unset values fall back to
 * {@link DEFAULT_SUBSTREAM_OPTIONS}, the shared {@link defaultRegistry} and
 * the module-level {@link logger}.
 */

import { createConsola, type ConsolaInstance } from 'consola';
import type { HttpHandleOptions } from './handles/http.js';
import type { S3HandleOptions } from './handles/s3.js';
import { DEFAULT_SCHEME } from './identifier.js';
import { ResourceTable, type ResourceRegistry } from './registry.js';

export interface SubStreamOptions {
  /** Scheme identifiers must carry. @defaultValue 'substream' */
  scheme?: string;
  /** Where resource ids are looked up. @defaultValue {@link defaultRegistry} */
  registry?: ResourceRegistry;
  /** Logger for open/close tracing and reported errors. */
  logger?: ConsolaInstance;
  /** Bytes per read while materializing a copy. @defaultValue 65536 */
  copyChunkSize?: number;
  /** Options for handles reopened on `http(s)://` addresses. */
  http?: HttpHandleOptions;
  /** Options for handles reopened on `s3://` addresses. */
  s3?: S3HandleOptions;
}

export interface SubStreamConfig {
  scheme: string;
  registry: ResourceRegistry;
  logger: ConsolaInstance;
  copyChunkSize: number;
  http?: HttpHandleOptions;
  s3?: S3HandleOptions;
}

export const DEFAULT_SUBSTREAM_OPTIONS = {
  scheme: DEFAULT_SCHEME,
  copyChunkSize: 64 * 1024,
} as const;

/** Registry used when no other is configured. */
export const defaultRegistry = new ResourceTable();

export const logger = createConsola({ defaults: { tag: 'substream' } });

/**
 * @throws {RangeError} If `copyChunkSize` is not a positive integer.
 */
export function resolveConfig(options?: SubStreamOptions): SubStreamConfig {
  const copyChunkSize = options?.copyChunkSize ?? DEFAULT_SUBSTREAM_OPTIONS.copyChunkSize;
  if (!Number.isSafeInteger(copyChunkSize) || copyChunkSize <= 0) {
    throw new RangeError(`copyChunkSize must be a positive integer, got ${copyChunkSize}`);
  }

  return {
    scheme: options?.scheme ?? DEFAULT_SUBSTREAM_OPTIONS.scheme,
    registry: options?.registry ?? defaultRegistry,
    logger: options?.logger ?? logger,
    copyChunkSize,
    http: options?.http,
    s3: options?.s3,
  };
}
