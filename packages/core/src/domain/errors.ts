/**
 * Error taxonomy of the join pipeline.
 *
 * | Error                 | Level  | Handling                                     |
 * |-----------------------|--------|----------------------------------------------|
 * | `FetchIdBatchError`   | page   | logged, page skipped, page index advances    |
 * | `FetchPointError`     | record | written as `POINTFAIL`                       |
 * | `PIPError`            | record | written as `PIPFAIL`                         |
 * | `InitialisationError` | fatal  | index provider unusable, run does not start  |
 */

/** Base class for all pipeline errors. */
export class PipJoinError extends Error {
  /** Error code for programmatic handling */
  readonly code: string;

  /** Additional error context */
  readonly context?: Record<string, unknown>;

  constructor(message: string, code: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'PipJoinError';
    this.code = code;
    this.context = context;
    Error.captureStackTrace(this, this.constructor);
  }
}

/** A page of identifiers could not be retrieved. No partial page is ever returned. */
export class FetchIdBatchError extends PipJoinError {
  constructor(pageIndex: number, pageSize: number, detail: string, options?: { cause?: unknown }) {
    super(`Failed to fetch page ${String(pageIndex)} (size ${String(pageSize)}): ${detail}`, 'FETCH_ID_BATCH', {
      pageIndex,
      pageSize,
    }, options);
    this.name = 'FetchIdBatchError';
  }
}

/** The point of an identifier could not be retrieved or read. */
export class FetchPointError extends PipJoinError {
  constructor(identifier: string, detail: string, options?: { cause?: unknown }) {
    super(`Failed to fetch point for ${identifier}: ${detail}`, 'FETCH_POINT', { identifier }, options);
    this.name = 'FetchPointError';
  }
}

/** The point-in-polygon query failed or returned a response that is not well-formed. */
export class PIPError extends PipJoinError {
  constructor(detail: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
    super(`Point in polygon failed: ${detail}`, 'PIP', context, options);
    this.name = 'PIPError';
  }
}

/** An index provider could not be set up (e.g. its count query failed). */
export class InitialisationError extends PipJoinError {
  constructor(detail: string, options?: { cause?: unknown }) {
    super(`Index initialisation failed: ${detail}`, 'INITIALISATION', undefined, options);
    this.name = 'InitialisationError';
  }
}

/** Message of an unknown thrown value. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
