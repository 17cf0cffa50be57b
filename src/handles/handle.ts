/**
 * @module handle
 *
 * Positioned read access to a byte resource.
 *
 * A {@link ReadHandle} owns a cursor and reads forward from it. Windows read
 * through one of these: either an independent handle opened on a backing
 * address, or a {@link MemoryHandle} holding a materialized copy.
 * Registered source resources are handles too; the resolver uses
 * `tell`/`seek`/`read` on them when it has to copy a range out.
 *
 * Built-in implementations:
 *
 * - {@link MemoryHandle} -- growable in-process buffer
 * - {@link LocalHandle} -- Node.js `FileHandle`
 * - {@link HttpHandle} -- HTTP(S) Range Requests with retry
 * - {@link S3Handle} -- AWS S3 `GetObject` with `Range`
 */
export interface ReadHandle {
  /** Current absolute cursor. */
  tell(): number;

  /**
   * Move the cursor to an absolute position.
   *
   * Positions past the end of the data are allowed; reads from there
   * return an empty array.
   *
   * @throws {Error} If the position is negative or not an integer.
   */
  seek(position: number): Promise<void>;

  /**
   * Read up to `length` bytes from the cursor and advance it by the
   * number of bytes returned.
   *
   * The result may be shorter than `length`; an empty result means the
   * cursor is at or past the end of the data.
   *
   * @throws {Error} If the underlying read fails.
   */
  read(length: number): Promise<Uint8Array>;

  /**
   * Release whatever the handle holds. Calling `close()` twice is a no-op;
   * reads after close throw.
   */
  close(): Promise<void>;
}

/** Shared argument check for `seek` implementations. */
export function assertPosition(position: number): void {
  if (!Number.isSafeInteger(position) || position < 0) {
    throw new Error(`Invalid seek position: ${position}`);
  }
}
