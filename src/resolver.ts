/**
 * @module resolver
 *
 * Turns an identifier into an opened window: a handle the window owns plus
 * its initial bounds.
 *
 * The backing of the registered resource is classified once:
 *
 * | Strategy | When | Handle | Bounds |
 * |----------|------|--------|--------|
 * | `reopen` | `file` with a backing address | fresh handle on that address | `[offset, offset+length)` |
 * | `copy` | `memory`, `other`, or no address | {@link MemoryHandle} filled from the source | `[0, length)` |
 *
 * Reopening reads straight from the backing without touching the cursor of
 * the registered handle. Copying moves that cursor while it works and puts
 * it back before returning, whether or not the copy succeeded. Copies from
 * the same source handle run one at a time.
 */

import type { SubStreamConfig } from './config.js';
import {
  InvalidSchemeError,
  IoError,
  NotSeekableError,
  ResourceNotFoundError,
  type SubstreamError,
} from './errors.js';
import type { ReadHandle } from './handles/handle.js';
import { MemoryHandle } from './handles/memory.js';
import { openAddress } from './handles/open.js';
import { parseIdentifier } from './identifier.js';
import { err, ok, type Identifier, type ResourceMeta, type Result } from './types.js';
import { WindowState } from './window.js';

export type WindowStrategy =
  | { kind: 'reopen'; address: string }
  | { kind: 'copy' };

export interface OpenedWindow {
  identifier: Identifier;
  strategy: WindowStrategy['kind'];
  /** Owned by the window; closing it is the window's job. */
  handle: ReadHandle;
  state: WindowState;
}

export function classify(meta: ResourceMeta): WindowStrategy {
  if (meta.backingKind === 'file' && meta.backingAddress) {
    return { kind: 'reopen', address: meta.backingAddress };
  }
  return { kind: 'copy' };
}

/**
 * Resolve a parsed identifier against the configured registry.
 *
 * Nothing is thrown; every failure comes back as a {@link SubstreamError}
 * and leaves no handle open.
 */
export async function resolveWindow(
  identifier: Identifier,
  config: SubStreamConfig,
): Promise<Result<OpenedWindow, SubstreamError>> {
  if (identifier.scheme !== config.scheme) {
    return err(new InvalidSchemeError(identifier.scheme, config.scheme));
  }

  const resource = config.registry.get(identifier.resourceId);
  if (!resource) {
    return err(new ResourceNotFoundError(identifier.resourceId));
  }
  if (!resource.meta.seekable) {
    return err(new NotSeekableError(identifier.resourceId));
  }

  const strategy = classify(resource.meta);
  const { offset, length } = identifier;

  if (strategy.kind === 'copy') {
    const copied = await exclusive(resource.handle, () =>
      materialize(resource.handle, identifier, config.copyChunkSize));
    if (!copied.ok) return copied;
    return ok({
      identifier,
      strategy: strategy.kind,
      handle: copied.value,
      state: new WindowState(0, length),
    });
  }

  let handle: ReadHandle;
  try {
    handle = await openAddress(strategy.address, { http: config.http, s3: config.s3 });
  } catch (e) {
    return err(new IoError(`Failed to reopen ${strategy.address}`, e));
  }

  return ok({
    identifier,
    strategy: strategy.kind,
    handle,
    state: new WindowState(offset, length),
  });
}

/** {@link parseIdentifier} followed by {@link resolveWindow}. */
export async function openWindow(
  path: string,
  config: SubStreamConfig,
): Promise<Result<OpenedWindow, SubstreamError>> {
  const parsed = parseIdentifier(path);
  if (!parsed.ok) return parsed;
  return resolveWindow(parsed.value, config);
}

// ─── Materialized copies ────────────────────────────────────────────────────

/** Tail of the pending copies per source handle. */
const copyQueues = new WeakMap<ReadHandle, Promise<unknown>>();

/**
 * Run `task` once every earlier task queued on `source` has settled.
 */
function exclusive<T>(source: ReadHandle, task: () => Promise<T>): Promise<T> {
  const previous = copyQueues.get(source) ?? Promise.resolve();
  const run = previous.then(task, task);
  const tail = run.then(() => undefined, () => undefined);
  copyQueues.set(source, tail);
  void tail.then(() => {
    if (copyQueues.get(source) === tail) copyQueues.delete(source);
  });
  return run;
}

/**
 * Copy `[offset, offset+length)` of `source` into a new memory handle,
 * restoring the source cursor afterwards.
 */
async function materialize(
  source: ReadHandle,
  identifier: Identifier,
  chunkSize: number,
): Promise<Result<MemoryHandle, IoError>> {
  const saved = source.tell();
  let result = await copyRange(source, identifier, chunkSize);

  try {
    await source.seek(saved);
  } catch (e) {
    if (result.ok) await result.value.close();
    result = err(new IoError(`Failed to restore cursor of resource ${identifier.resourceId}`, e));
  }

  return result;
}

async function copyRange(
  source: ReadHandle,
  { offset, length, resourceId }: Identifier,
  chunkSize: number,
): Promise<Result<MemoryHandle, IoError>> {
  const copy = new MemoryHandle();
  try {
    await source.seek(offset);
    let copied = 0;
    while (copied < length) {
      const chunk = await source.read(Math.min(chunkSize, length - copied));
      if (chunk.length === 0) break;
      copied += await copy.write(chunk.subarray(0, length - copied));
    }

    if (copied < length) {
      await copy.close();
      return err(new IoError(`Resource ${resourceId} ended after ${copied} of ${length} bytes from ${offset}`));
    }

    await copy.seek(0);
    return ok(copy);
  } catch (e) {
    await copy.close();
    return err(new IoError(`Failed to copy ${length} bytes from resource ${resourceId}`, e));
  }
}
