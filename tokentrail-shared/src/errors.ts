/**
 * Error taxonomy.
 *
 * Only `StorageError` is meant to escape a tracking session. Parse and
 * transient I/O failures are reported as diagnostics and skipped; an empty
 * session is a stop result rather than an error.
 *
 * @module errors
 */

export type ErrorCode = 'PARSE_ERROR' | 'TRANSIENT_IO' | 'STORAGE' | 'SESSION_FINALIZED';

export class TokentrailError extends Error {
  readonly code: ErrorCode;

  constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.code = code;
  }
}

/** A raw record (line or document) could not be decoded. */
export class ParseError extends TokentrailError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super('PARSE_ERROR', message, options);
    this.source = source;
  }
}

/** A read failed in a way the next poll may not repeat (missing file, EBUSY, ...). */
export class TransientIOError extends TokentrailError {
  readonly source: string;

  constructor(source: string, message: string, options?: { cause?: unknown }) {
    super('TRANSIENT_IO', message, options);
    this.source = source;
  }
}

/** The session's storage location cannot be created or written. Fatal. */
export class StorageError extends TokentrailError {
  readonly path: string;

  constructor(filePath: string, message: string, options?: { cause?: unknown }) {
    super('STORAGE', message, options);
    this.path = filePath;
  }
}

export class SessionFinalizedError extends TokentrailError {
  constructor(sessionId: string) {
    super('SESSION_FINALIZED', `Session ${sessionId} is finalized and no longer accepts events`);
  }
}

/** Normalizes anything thrown into a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
