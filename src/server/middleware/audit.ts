/**
 * Audit logging middleware.
 *
 * Writes one entry per request. The Postgres sink settles the shape of the
 * audit store on its first write (rich table, or the minimal fallback table
 * when the rich one is missing or has a different shape) and keeps that
 * decision for the life of the process. Audit failures never propagate to
 * the caller, ensuring that a broken audit pipeline does not degrade the
 * primary query flow. The rich table can also be read back, newest first.
 */

import type { Pool } from 'pg';

import { STATEMENT_TIMEOUT_MS } from '../../shared/constants';
import type { AuditRecord, AuditStatus } from '../../shared/types';
import { AuditUnavailableError, errorMessage, pgErrorCode } from '../errors';
import { getPool, runReadOnly } from '../db/pool';

export interface AuditSink {
  /** Persist one entry. Resolves even when the write fails. */
  record(entry: AuditRecord): Promise<void>;
}

/** One row of the rich audit table. */
export interface AuditLogRow {
  created_at: Date;
  dataset: string;
  intent: string;
  sql_text: string;
  row_count: number;
  duration_ms: number;
  status: AuditStatus;
  error: string | null;
  request_ip: string | null;
  model: string | null;
  prompt_tokens: number | null;
  completion_tokens: number | null;
}

export interface AuditLogReader {
  /** The newest `limit` entries, newest first. */
  recent(limit: number): Promise<AuditLogRow[]>;
}

/** SQLSTATEs meaning the audit table is missing or shaped differently. */
const SCHEMA_MISMATCH = new Set(['42703', '42P01']);

// ---------------------------------------------------------------------------
// Console sink
// ---------------------------------------------------------------------------

export class ConsoleAuditSink implements AuditSink {
  async record(entry: AuditRecord): Promise<void> {
    console.log('[AUDIT]', {
      dataset: entry.dataset,
      intent: entry.intent,
      sql: entry.sqlText,
      status: entry.status,
      rowCount: entry.rowCount,
      durationMs: entry.durationMs,
      error: entry.error,
    });
  }
}

// ---------------------------------------------------------------------------
// Postgres sink
// ---------------------------------------------------------------------------

export type AuditTier = 'undetermined' | 'rich' | 'minimal';

export interface PostgresAuditSinkOptions {
  table: string;
  fallbackTable: string;
  /** Defaults to the process-wide pool. */
  pool?: Pool;
  /** Where records go when the database write fails. */
  fallbackSink?: AuditSink;
  /** statement_timeout for reading entries back. */
  readTimeoutMs?: number;
}

export class PostgresAuditSink implements AuditSink, AuditLogReader {
  private state: AuditTier = 'undetermined';
  private readonly fallbackSink: AuditSink;
  private readonly richSql: string;
  private readonly minimalSql: string;
  private readonly listSql: string;

  constructor(private readonly options: PostgresAuditSinkOptions) {
    this.fallbackSink = options.fallbackSink ?? new ConsoleAuditSink();
    this.richSql = `
      INSERT INTO ${options.table} (dataset, intent, sql_text, row_count, duration_ms, status, error, request_ip, model, prompt_tokens, completion_tokens, created_at)
      VALUES ($1, $2, $3, $4, $5, $6, $7, $8, $9, $10, $11, $12)
    `;
    this.minimalSql = `
      INSERT INTO ${options.fallbackTable} (dataset, intent, sql_text, status, duration_ms)
      VALUES ($1, $2, $3, $4, $5)
    `;
    this.listSql = `
      SELECT created_at, dataset, intent, sql_text, row_count, duration_ms, status, error,
             request_ip, model, prompt_tokens, completion_tokens
      FROM ${options.table}
      ORDER BY created_at DESC
      LIMIT $1
    `;
  }

  get tier(): AuditTier {
    return this.state;
  }

  async record(entry: AuditRecord): Promise<void> {
    try {
      if (this.state === 'minimal') {
        await this.writeMinimal(entry);
        return;
      }

      try {
        await this.writeRich(entry);
        this.state = 'rich';
      } catch (error) {
        if (this.state !== 'undetermined' || !SCHEMA_MISMATCH.has(pgErrorCode(error) ?? '')) {
          throw error;
        }
        console.warn(
          `[AUDIT] ${this.options.table} is unavailable (${errorMessage(error)}); using ${this.options.fallbackTable}`,
        );
        this.state = 'minimal';
        await this.writeMinimal(entry);
      }
    } catch (dbError) {
      // Fallback: log to console so audit data is never silently lost
      try {
        console.error('Failed to write audit entry to DB, falling back to console:', errorMessage(dbError));
        await this.fallbackSink.record(entry);
      } catch {
        // Swallow: audit must never break the primary flow
      }
    }
  }

  async recent(limit: number): Promise<AuditLogRow[]> {
    const { table, fallbackTable, readTimeoutMs = STATEMENT_TIMEOUT_MS } = this.options;
    if (this.state === 'minimal') {
      throw new AuditUnavailableError(`Audit entries are going to ${fallbackTable}, which cannot be listed`);
    }

    try {
      const result = await runReadOnly(this.pool(), { timeoutMs: readTimeoutMs }, (client) =>
        client.query<AuditLogRow>(this.listSql, [limit]),
      );
      return result.rows;
    } catch (error) {
      if (SCHEMA_MISMATCH.has(pgErrorCode(error) ?? '')) {
        throw new AuditUnavailableError(`Audit table ${table} is unavailable: ${errorMessage(error)}`, {
          cause: error,
        });
      }
      throw error;
    }
  }

  private pool(): Pool {
    return this.options.pool ?? getPool();
  }

  private async writeRich(entry: AuditRecord): Promise<void> {
    await this.pool().query(this.richSql, [
      entry.dataset,
      entry.intent,
      entry.sqlText,
      entry.rowCount,
      entry.durationMs,
      entry.status,
      entry.error ?? null,
      entry.requestIp ?? null,
      entry.model ?? null,
      entry.tokenUsage?.inputTokens ?? null,
      entry.tokenUsage?.outputTokens ?? null,
      entry.timestamp,
    ]);
  }

  private async writeMinimal(entry: AuditRecord): Promise<void> {
    await this.pool().query(this.minimalSql, [
      entry.dataset,
      entry.intent,
      entry.sqlText,
      entry.status,
      entry.durationMs,
    ]);
  }
}

// ---------------------------------------------------------------------------
// Core wrapper
// ---------------------------------------------------------------------------

/**
 * Record an audit entry without ever throwing, whatever the sink does.
 */
export async function safeRecord(sink: AuditSink, entry: AuditRecord): Promise<void> {
  try {
    await sink.record(entry);
  } catch (error) {
    try {
      console.error('[AUDIT] Sink failed:', errorMessage(error));
    } catch {
      // Swallow: audit must never break the primary flow
    }
  }
}
