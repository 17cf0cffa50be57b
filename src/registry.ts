/**
 * @module registry
 *
 * Lookup from a numeric resource id to a live, already-open resource.
 *
 * The resolver only needs {@link ResourceRegistry.get}; how resources get
 * registered is up to the host. {@link ResourceTable} is the in-process
 * implementation: it assigns ids, keeps the handles, and formats
 * identifiers that point into them.
 *
 * @example
 * ```typescript
 * const table = new ResourceTable();
 * const id = await table.registerFile('./data/archive.bin');
 *
 * const stream = new SubStream({ registry: table });
 * await stream.open(table.identifierFor(id, 4096, 512));
 * ```
 */

import type { ReadHandle } from './handles/handle.js';
import { LocalHandle } from './handles/local.js';
import { MemoryHandle } from './handles/memory.js';
import { DEFAULT_SCHEME, formatIdentifier } from './identifier.js';
import type { ResourceMeta } from './types.js';

export interface RegisteredResource {
  handle: ReadHandle;
  meta: ResourceMeta;
}

export interface ResourceRegistry {
  get(resourceId: string): RegisteredResource | undefined;
}

export class ResourceTable implements ResourceRegistry {
  private readonly entries = new Map<string, RegisteredResource>();
  private nextId = 1;

  /**
   * Register an open handle.
   *
   * The table does not take ownership: {@link ResourceTable.unregister}
   * forgets the handle without closing it.
   *
   * @returns The decimal id to use in identifiers.
   */
  register(handle: ReadHandle, meta: ResourceMeta): string {
    const id = String(this.nextId++);
    this.entries.set(id, { handle, meta: { ...meta } });
    return id;
  }

  /** Open `path` and register it as a file-backed resource. */
  async registerFile(path: string): Promise<string> {
    const handle = await LocalHandle.open(path);
    return this.register(handle, { seekable: true, backingKind: 'file', backingAddress: path });
  }

  /** Register a copy of `bytes` as a memory-backed resource. */
  registerBytes(bytes: Uint8Array): string {
    return this.register(new MemoryHandle(bytes), { seekable: true, backingKind: 'memory' });
  }

  unregister(resourceId: string): boolean {
    return this.entries.delete(resourceId);
  }

  get(resourceId: string): RegisteredResource | undefined {
    return this.entries.get(resourceId);
  }

  get size(): number {
    return this.entries.size;
  }

  /** Identifier for a window over a registered resource. */
  identifierFor(resourceId: string, offset: number, length: number, scheme: string = DEFAULT_SCHEME): string {
    return formatIdentifier({ scheme, offset, length, resourceId });
  }
}
