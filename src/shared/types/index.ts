/**
 * Shared TypeScript type definitions for the NL2SQL query service.
 *
 * Keep this file free of runtime dependencies.
 */

import type { REASON_CODES } from '../constants';

// ---------------------------------------------------------------------------
// Validation types
// ---------------------------------------------------------------------------

/** Machine-readable reason attached to every rejected candidate. */
export type ReasonCode = (typeof REASON_CODES)[number];

/** The single table a validated statement reads from. */
export interface TableReference {
  /** Schema qualifier as written in the statement, lower-cased. */
  schema?: string;
  /** Relation name as written in the statement. */
  name: string;
  alias?: string;
  /** Byte offset of the reference inside the validated text. */
  location: number;
  /** `schema.table` as resolved through the catalog. */
  qualifiedName: string;
}

export interface AcceptedVerdict {
  valid: true;
  /** Comment-stripped, trimmed statement without its trailing terminator. */
  sanitisedSql: string;
  statementType: 'SelectStmt';
  table: TableReference;
  columnsReferenced: string[];
  /** True when a LIMIT or FETCH FIRST bounds the rows. */
  hasLimit: boolean;
  /** Byte offset of a `LIMIT ALL` / `LIMIT NULL` value, which bounds nothing. */
  unboundedLimitLocation?: number;
}

export interface RejectedVerdict {
  valid: false;
  reason: ReasonCode;
  message: string;
  /** Offending column for DISALLOWED_COLUMN. */
  column?: string;
}

/** Result of validating a candidate statement against the safety policy. */
export type SqlVerdict = AcceptedVerdict | RejectedVerdict;

// ---------------------------------------------------------------------------
// Execution types
// ---------------------------------------------------------------------------

/** Rows and timing for one guarded execution. Never cached. */
export interface ExecutionResult {
  columns: string[];
  rows: Record<string, unknown>[];
  rowCount: number;
  elapsedMs: number;
}

// ---------------------------------------------------------------------------
// Request / response types
// ---------------------------------------------------------------------------

/** A natural-language (or named template) intent against one dataset. */
export interface QueryRequest {
  dataset: string;
  intent: string;
  params?: Record<string, unknown>;
  /** When false the rewritten SQL is returned without being executed. */
  execute?: boolean;
  /** Row bound for a statement without one; capped at the configured maximum. */
  limit?: number;
  requestIp?: string;
}

/** Caller-supplied SQL that still goes through validation and rewriting. */
export interface SqlExecuteRequest {
  dataset: string;
  sql: string;
  limit?: number;
  requestIp?: string;
}

export interface QueryResponse {
  ok: true;
  dataset: string;
  schema: string;
  /** The exact statement that was (or would be) executed. */
  sql: string;
  columns: string[];
  rows: Record<string, unknown>[];
  rowcount: number;
  elapsedMs: number;
  executed: boolean;
  model?: string;
}

export interface ErrorResponse {
  ok: false;
  error: {
    code: string;
    message: string;
    column?: string;
  };
}

/** Lifecycle of a single request through the pipeline. */
export type PipelineState =
  | 'RECEIVED'
  | 'GENERATING_SQL'
  | 'VALIDATING'
  | 'REJECTED'
  | 'REWRITING'
  | 'EXECUTING'
  | 'GENERATED'
  | 'SUCCEEDED'
  | 'FAILED';

// ---------------------------------------------------------------------------
// Audit types
// ---------------------------------------------------------------------------

export type AuditStatus = 'succeeded' | 'rejected' | 'failed' | 'generated';

export interface TokenUsage {
  inputTokens?: number;
  outputTokens?: number;
}

/** One audit entry per request, written once and never mutated. */
export interface AuditRecord {
  dataset: string;
  intent: string;
  sqlText: string;
  rowCount: number;
  durationMs: number;
  status: AuditStatus;
  error?: string;
  requestIp?: string;
  model?: string;
  tokenUsage?: TokenUsage;
  timestamp: Date;
}
