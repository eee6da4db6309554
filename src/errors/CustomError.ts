import type { CatalogEntry, CatalogNode } from '../types/telemetry';
import { validationErrorType } from '../types/errorType';

export class CustomError extends Error {
  public code: string;
  public statusCode: number;
  public details?: validationErrorType[];

  constructor(
    message: string,
    code: string,
    statusCode: number,
    details?: validationErrorType[],
  ) {
    super(message);
    this.code = code;
    this.statusCode = statusCode;
    this.details = details;
    this.name = this.constructor.name;
    Object.setPrototypeOf(this, new.target.prototype); // Restore prototype chain
  }
}

export class NotFoundError extends CustomError {
  constructor(message: string = 'Resource not found') {
    super(message, 'NOT_FOUND', 404);
  }
}

export class ValidationError extends CustomError {
  constructor(
    message: string = 'Validation error',
    details?: validationErrorType[],
  ) {
    super(message, 'VALIDATION_ERROR', 400, details);
  }
}

export class BadRequestError extends CustomError {
  constructor(message: string = 'Bad request') {
    super(message, 'BAD_REQUEST', 400);
  }
}

/* -------------------------------------------------------------------------------------------------
 * Acquisition errors
 * ------------------------------------------------------------------------------------------------- */

/** Transient failures are retried (or recorded as FAILED readings); fatal ones stop the process. */
export type FailureKind = 'transient' | 'fatal';

export class ConnectError extends CustomError {
  public readonly kind: FailureKind;

  constructor(message: string, kind: FailureKind = 'transient') {
    super(
      message,
      kind === 'fatal' ? 'CONNECT_FATAL' : 'CONNECT_TRANSIENT',
      503,
    );
    this.kind = kind;
  }
}

export class ReadError extends CustomError {
  public readonly kind: FailureKind;

  constructor(message: string, kind: FailureKind = 'transient') {
    super(message, kind === 'fatal' ? 'READ_FATAL' : 'READ_TRANSIENT', 502);
    this.kind = kind;
  }
}

export type BrowseFailureKind = FailureKind | 'depthExceeded';

export class BrowseError extends CustomError {
  public readonly kind: BrowseFailureKind;
  /** Entries collected before the browse was aborted. */
  public partial: readonly CatalogEntry[];
  public root?: CatalogNode;

  constructor(
    message: string,
    kind: BrowseFailureKind = 'transient',
    partial: readonly CatalogEntry[] = [],
  ) {
    super(
      message,
      kind === 'depthExceeded'
        ? 'BROWSE_DEPTH_EXCEEDED'
        : kind === 'fatal'
          ? 'BROWSE_FATAL'
          : 'BROWSE_TRANSIENT',
      502,
    );
    this.kind = kind;
    this.partial = partial;
  }
}

/**
 * Losing the record store is a stop condition, never retried.
 * `errno` keeps the I/O error code (ENOSPC, EACCES, ...) when there is one.
 */
export class WriteError extends CustomError {
  public readonly errno?: string;

  constructor(message: string, errno?: string) {
    super(message, 'WRITE_FATAL', 500);
    this.errno = errno;
  }
}

/** Returns a one-line human readable message for any thrown value. */
export function describeError(err: unknown): string {
  const text = err instanceof Error ? err.message : String(err);
  return text.replace(/[\r\n]+/g, ' ').trim() || 'unknown error';
}
