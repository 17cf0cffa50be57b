/**
 * @module types
 *
 * Shared type definitions for substream.
 *
 * - **Identifier** — the parsed `scheme://offset:length/resourceId` form
 * - **ResourceMeta** — what the registry knows about an open resource
 * - **Whence** — seek origins, matching the classic `SEEK_SET/CUR/END`
 * - **Result / ReadResult** — explicit outcomes in place of thrown errors
 */

import type { SubstreamError } from './errors.js';

// ─── Identifier ─────────────────────────────────────────────────────────────

/**
 * A parsed window identifier.
 *
 * `offset` and `length` are absolute positions in the underlying
 * resource's coordinate space. `resourceId` is the decimal key under
 * which that resource is registered.
 */
export interface Identifier {
  readonly scheme: string;
  readonly offset: number;
  readonly length: number;
  readonly resourceId: string;
}

// ─── Resources ──────────────────────────────────────────────────────────────

/**
 * Classification of an underlying resource.
 *
 * - `file` — backed by something that can be opened a second time at
 *   {@link ResourceMeta.backingAddress} (a path, URL or S3 URI)
 * - `memory` — lives only in this process and cannot be reopened
 * - `other` — anything else; treated like `memory`
 */
export type BackingKind = 'file' | 'memory' | 'other';

/** Read-only view of a registered resource's metadata. */
export interface ResourceMeta {
  seekable: boolean;
  backingKind: BackingKind;
  /** Stable address for `file` resources. */
  backingAddress?: string;
}

// ─── Seeking ────────────────────────────────────────────────────────────────

/** Seek origin. */
export enum Whence {
  /** Relative to the start of the window. */
  Set = 0,
  /** Relative to the current cursor. */
  Current = 1,
  /** Relative to the end of the window. */
  End = 2,
}

// ─── Results ────────────────────────────────────────────────────────────────

export type Result<T, E> =
  | { ok: true; value: T }
  | { ok: false; error: E };

export function ok<T>(value: T): { ok: true; value: T } {
  return { ok: true, value };
}

export function err<E>(error: E): { ok: false; error: E } {
  return { ok: false, error };
}

/**
 * Outcome of a single window read.
 *
 * `eof` is an expected outcome, distinct from `error`: the cursor sits at
 * the end of the window (or the backing ended early) and there is nothing
 * left to return.
 */
export type ReadResult =
  | { kind: 'data'; bytes: Uint8Array }
  | { kind: 'eof' }
  | { kind: 'error'; error: SubstreamError };

/** Metadata reported by `stat()`. */
export interface WindowStat {
  /** Logical length of the window in bytes. */
  size: number;
}
