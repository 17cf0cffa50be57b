/**
 * @module identifier
 *
 * Parsing and formatting of window identifiers.
 *
 * An identifier has the exact form `scheme://offset:length/resourceId`:
 *
 * | Part | Pattern |
 * |------|---------|
 * | scheme | `[A-Za-z0-9.-]+` |
 * | offset | `\d+` |
 * | length | `\d+`, greater than zero |
 * | resourceId | `\d+` |
 *
 * No escaping is defined and nothing else may appear in the string.
 * Whether the scheme is the one a caller expects is checked by the
 * resolver, not here.
 *
 * @example
 * ```typescript
 * const parsed = parseIdentifier('substream://1024:512/7');
 * // → { ok: true, value: { scheme: 'substream', offset: 1024, length: 512, resourceId: '7' } }
 * ```
 */

import { ParseError } from './errors.js';
import { err, ok, type Identifier, type Result } from './types.js';

/** Scheme accepted when none is configured. */
export const DEFAULT_SCHEME = 'substream';

const IDENTIFIER_PATTERN = /^([A-Za-z0-9.-]+):\/\/(\d+):(\d+)\/(\d+)$/;

/**
 * Parse an identifier string.
 *
 * Fails when the string does not match the grammar, when `length` is
 * zero, or when a position does not fit in a safe integer.
 */
export function parseIdentifier(path: string): Result<Identifier, ParseError> {
  const match = IDENTIFIER_PATTERN.exec(path);
  if (!match) {
    return err(new ParseError(`Failed to parse identifier "${path}"`));
  }

  const [, scheme, offsetText, lengthText, resourceId] = match;
  const offset = Number(offsetText);
  const length = Number(lengthText);

  if (!Number.isSafeInteger(offset) || !Number.isSafeInteger(length)
    || !Number.isSafeInteger(offset + length)) {
    return err(new ParseError(`Window ${offsetText}:${lengthText} is out of range`));
  }
  if (length === 0) {
    return err(new ParseError(`Window length must be positive in "${path}"`));
  }

  return ok(Object.freeze({ scheme, offset, length, resourceId }));
}

/** Render an identifier back into its string form. */
export function formatIdentifier(identifier: Identifier): string {
  const { scheme, offset, length, resourceId } = identifier;
  return `${scheme}://${offset}:${length}/${resourceId}`;
}
