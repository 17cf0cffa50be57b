/**
 * @module errors
 *
 * Error kinds produced while opening and reading a window.
 *
 * Core functions never throw these; they return them inside a
 * {@link Result}. Callers switch on {@link SubstreamError.code}.
 */

export type SubstreamErrorCode =
  | 'PARSE'
  | 'INVALID_SCHEME'
  | 'RESOURCE_NOT_FOUND'
  | 'NOT_SEEKABLE'
  | 'IO'
  | 'STATE';

export class SubstreamError extends Error {
  readonly code: SubstreamErrorCode;

  constructor(code: SubstreamErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** The identifier does not match `scheme://offset:length/resourceId`. */
export class ParseError extends SubstreamError {
  constructor(message: string) {
    super('PARSE', message);
  }
}

export class InvalidSchemeError extends SubstreamError {
  constructor(readonly scheme: string, readonly expected: string) {
    super('INVALID_SCHEME', `Invalid scheme "${scheme}", expected "${expected}"`);
  }
}

export class ResourceNotFoundError extends SubstreamError {
  constructor(readonly resourceId: string) {
    super('RESOURCE_NOT_FOUND', `Resource ${resourceId} is not available`);
  }
}

export class NotSeekableError extends SubstreamError {
  constructor(readonly resourceId: string) {
    super('NOT_SEEKABLE', `Resource ${resourceId} is not seekable`);
  }
}

/** A seek, read, copy or open against a handle failed. */
export class IoError extends SubstreamError {
  constructor(message: string, cause?: unknown) {
    super('IO', cause === undefined ? message : `${message}: ${describe(cause)}`, { cause });
  }
}

/** An operation was called in the wrong lifecycle state. */
export class StateError extends SubstreamError {
  constructor(message: string) {
    super('STATE', message);
  }
}

function describe(cause: unknown): string {
  return cause instanceof Error ? cause.message : String(cause);
}
