/**
 * @module window
 *
 * Bounds and cursor arithmetic for a window. No I/O happens here.
 *
 * Positions are absolute in the handle's coordinate space. A window over a
 * reopened file keeps `[offset, offset+length)`; a window over a
 * materialized copy uses `[0, length)`. Callers only ever see positions
 * relative to `enforceMin`.
 */

import { Whence } from './types.js';

export class WindowState {
  readonly enforceMin: number;
  readonly enforceMax: number;
  private cursor: number;

  /**
   * @param enforceMin - First valid absolute position.
   * @param length - Logical length of the window.
   * @param offset - Initial absolute cursor. Defaults to `enforceMin`.
   */
  constructor(enforceMin: number, length: number, offset: number = enforceMin) {
    if (!Number.isSafeInteger(enforceMin) || enforceMin < 0) {
      throw new RangeError(`Invalid window start: ${enforceMin}`);
    }
    if (!Number.isSafeInteger(length) || length < 0) {
      throw new RangeError(`Invalid window length: ${length}`);
    }
    this.enforceMin = enforceMin;
    this.enforceMax = enforceMin + length;
    if (!Number.isSafeInteger(offset) || offset < this.enforceMin || offset > this.enforceMax) {
      throw new RangeError(`Cursor ${offset} outside [${this.enforceMin}, ${this.enforceMax}]`);
    }
    this.cursor = offset;
  }

  /** Absolute cursor. */
  get offset(): number {
    return this.cursor;
  }

  /** Fixed logical length. */
  get size(): number {
    return this.enforceMax - this.enforceMin;
  }

  isEof(): boolean {
    return this.cursor >= this.enforceMax;
  }

  /** Bytes between the cursor and the end of the window. */
  remaining(): number {
    return Math.max(0, this.enforceMax - this.cursor);
  }

  /**
   * Cursor relative to the window start, or `undefined` once the cursor
   * has left the addressable range (including sitting at the end).
   */
  relativePosition(): number | undefined {
    if (this.cursor < this.enforceMin || this.cursor >= this.enforceMax) {
      return undefined;
    }
    return this.cursor - this.enforceMin;
  }

  /**
   * Move the cursor, or reject and leave it untouched.
   *
   * The upper bound is strict: positioning exactly at the end of the
   * window is rejected, so every accepted position addresses a byte.
   *
   * @returns The new absolute cursor, or `undefined` when rejected.
   */
  resolveSeek(requested: number, whence: Whence): number | undefined {
    if (!Number.isSafeInteger(requested)) return undefined;

    let candidate: number;
    switch (whence) {
      case Whence.Set:
        candidate = this.enforceMin + requested;
        break;
      case Whence.Current:
        candidate = this.cursor + requested;
        break;
      case Whence.End:
        candidate = this.enforceMax + requested;
        break;
      default:
        return undefined;
    }

    if (candidate < this.enforceMin || candidate >= this.enforceMax) {
      return undefined;
    }

    this.cursor = candidate;
    return candidate;
  }

  /** Advance after a read, never past `enforceMax`. */
  advance(bytes: number): void {
    this.cursor = Math.min(this.enforceMax, this.cursor + Math.max(0, bytes));
  }
}
