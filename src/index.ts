/**
 * @module substream
 *
 * Public API surface.
 *
 * substream exposes a read-only, bounded window onto a larger seekable
 * resource. A window is named by an identifier of the form
 * `substream://offset:length/resourceId`, where `resourceId` points into a
 * {@link ResourceRegistry} of already-open resources.
 *
 * ---
 *
 * ### Layers
 *
 * | Layer | Export | Role |
 * |-------|--------|------|
 * | **Stream** | {@link SubStream} | Open, read, seek, tell, eof, stat, close |
 * | **Resolver** | {@link openWindow}, {@link resolveWindow} | Identifier → owned handle + bounds, as a {@link Result} |
 * | **Window** | {@link WindowState} | Bounds and cursor arithmetic |
 * | **Identifier** | {@link parseIdentifier}, {@link formatIdentifier} | The string form |
 *
 * ---
 *
 * ### Handles
 *
 * | Handle | Backing | Address |
 * |--------|---------|---------|
 * | {@link MemoryHandle} | In-process buffer | none |
 * | {@link LocalHandle} | Local filesystem (Node.js `FileHandle`) | `./data/archive.bin` |
 * | {@link HttpHandle} | HTTP/HTTPS with Range Requests | `https://cdn.example.com/archive.bin` |
 * | {@link S3Handle} | AWS S3 / S3-compatible stores | `s3://bucket/archive.bin` |
 */

// ─── Stream ─────────────────────────────────────────────────────────────────

export { SubStream } from './substream.js';
export { openWindow, resolveWindow, classify } from './resolver.js';
export { WindowState } from './window.js';
export { parseIdentifier, formatIdentifier, DEFAULT_SCHEME } from './identifier.js';
export { ResourceTable } from './registry.js';
export { resolveConfig, defaultRegistry, logger, DEFAULT_SUBSTREAM_OPTIONS } from './config.js';
export { Whence, ok, err } from './types.js';

// ─── Errors ─────────────────────────────────────────────────────────────────

export {
  SubstreamError,
  ParseError,
  InvalidSchemeError,
  ResourceNotFoundError,
  NotSeekableError,
  IoError,
  StateError,
} from './errors.js';

// ─── Handles ────────────────────────────────────────────────────────────────

export { MemoryHandle } from './handles/memory.js';
export { LocalHandle } from './handles/local.js';
export { HttpHandle } from './handles/http.js';
export { S3Handle, parseS3Path } from './handles/s3.js';
export { openAddress, addressKind } from './handles/open.js';

// ─── Types ──────────────────────────────────────────────────────────────────

export type { OpenOptions, SubStreamStatus } from './substream.js';
export type { OpenedWindow, WindowStrategy } from './resolver.js';
export type { RegisteredResource, ResourceRegistry } from './registry.js';
export type { SubStreamOptions, SubStreamConfig } from './config.js';
export type { SubstreamErrorCode } from './errors.js';
export type { ReadHandle } from './handles/handle.js';
export type { HttpHandleOptions } from './handles/http.js';
export type { S3HandleOptions, S3RangeFetcher } from './handles/s3.js';
export type { OpenAddressOptions, AddressKind } from './handles/open.js';
export type {
  Identifier,
  BackingKind,
  ResourceMeta,
  Result,
  ReadResult,
  WindowStat,
} from './types.js';
