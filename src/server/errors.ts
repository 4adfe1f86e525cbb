/**
 * Error taxonomy for the query service.
 *
 * Request-scoped failures extend `QueryServiceError` and carry the code and
 * HTTP status the route layer reports. Startup failures (`ConfigError`,
 * `CatalogLoadError`) are fatal and never reach a request.
 */

import type { ReasonCode, RejectedVerdict } from '../shared/types';

export type ErrorCode =
  | ReasonCode
  | 'UNKNOWN_DATASET'
  | 'INVALID_REQUEST'
  | 'GENERATION_FAILED'
  | 'EXECUTION_TIMEOUT'
  | 'EXECUTION_FAILED'
  | 'AUDIT_UNAVAILABLE';

export class QueryServiceError extends Error {
  constructor(
    message: string,
    readonly code: ErrorCode,
    readonly httpStatus: number,
    options?: { cause?: unknown },
  ) {
    super(message, options);
    this.name = new.target.name;
  }
}

/** Untrusted SQL failed the safety policy. Client-caused, never retried. */
export class ValidationRejectedError extends QueryServiceError {
  readonly reason: ReasonCode;
  readonly column?: string;

  constructor(verdict: RejectedVerdict) {
    super(verdict.message, verdict.reason, 400);
    this.reason = verdict.reason;
    this.column = verdict.column;
  }
}

export class UnknownDatasetError extends QueryServiceError {
  constructor(dataset: string) {
    super(`Unknown dataset '${dataset}'`, 'UNKNOWN_DATASET', 404);
  }
}

export class InvalidRequestError extends QueryServiceError {
  constructor(message: string) {
    super(message, 'INVALID_REQUEST', 400);
  }
}

/** The SQL generator failed, timed out, or returned nothing usable. */
export class GenerationFailedError extends QueryServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'GENERATION_FAILED', 502, options);
  }
}

/** Postgres cancelled the statement at its statement_timeout. */
export class ExecutionTimeoutError extends QueryServiceError {
  constructor(timeoutMs: number, options?: { cause?: unknown }) {
    super(`Query exceeded the ${timeoutMs} ms statement timeout`, 'EXECUTION_TIMEOUT', 504, options);
  }
}

export class ExecutionFailedError extends QueryServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'EXECUTION_FAILED', 500, options);
  }
}

/** Audit entries cannot be read back: they are only printed, or the table is missing. */
export class AuditUnavailableError extends QueryServiceError {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, 'AUDIT_UNAVAILABLE', 503, options);
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

export class CatalogLoadError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'CatalogLoadError';
  }
}

/** Message of any thrown value, for logs and audit records. */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/** SQLSTATE of a pg `DatabaseError`, when the value is one. */
export function pgErrorCode(error: unknown): string | undefined {
  if (error instanceof Error && 'code' in error && typeof error.code === 'string') {
    return error.code;
  }
  return undefined;
}
