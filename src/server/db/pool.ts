/**
 * Database connection pool and the guarded executor.
 *
 * Every validated statement runs inside a read-only transaction whose
 * `statement_timeout` and `search_path` are pinned with `set_config(..., true)`,
 * so both settings end with the transaction and never leak to the next
 * checkout of the same connection.
 */

import { Pool, type PoolClient } from 'pg';

import type { ExecutionResult } from '../../shared/types';
import { ExecutionFailedError, ExecutionTimeoutError, errorMessage, pgErrorCode } from '../errors';

/** SQLSTATE raised when Postgres cancels a statement (query_canceled). */
const QUERY_CANCELED = '57014';

// ---------------------------------------------------------------------------
// Pool initialisation
// ---------------------------------------------------------------------------

export interface PoolSettings {
  connectionString?: string;
  host?: string;
  port?: number;
  user?: string;
  password?: string;
  database?: string;
  max: number;
  connectionTimeoutMillis: number;
  idleTimeoutMillis: number;
}

let pool: Pool | null = null;

/** Create the process-wide pool. Replaces (without closing) any previous one. */
export function initPool(settings: PoolSettings): Pool {
  pool = new Pool({
    connectionString: settings.connectionString,
    host: settings.host,
    port: settings.port,
    user: settings.user,
    password: settings.password,
    database: settings.database,
    max: settings.max,
    idleTimeoutMillis: settings.idleTimeoutMillis,
    connectionTimeoutMillis: settings.connectionTimeoutMillis,
  });

  // An idle client losing its connection must not crash the process.
  pool.on('error', (err) => {
    console.error('[executor] Idle client error:', err.message);
  });

  return pool;
}

export function getPool(): Pool {
  if (!pool) {
    throw new Error('Database pool has not been initialised');
  }
  return pool;
}

export async function closePool(): Promise<void> {
  if (!pool) return;
  const current = pool;
  pool = null;
  await current.end();
}

// ---------------------------------------------------------------------------
// Guarded execution
// ---------------------------------------------------------------------------

export interface ExecuteOptions {
  /** Physical schema pinned as the transaction's search_path. */
  schema: string;
  timeoutMs: number;
  params?: unknown[];
}

export interface GuardedExecutor {
  execute(sql: string, options: ExecuteOptions): Promise<ExecutionResult>;
}

export interface ReadOnlySettings {
  timeoutMs: number;
  /** Pinned as the transaction's search_path when given. */
  searchPath?: string;
}

async function checkout(source: Pool): Promise<PoolClient> {
  try {
    return await source.connect();
  } catch (error) {
    throw new ExecutionFailedError(`Could not acquire a database connection: ${errorMessage(error)}`, {
      cause: error,
    });
  }
}

/**
 * Run `work` on one client inside `BEGIN READ ONLY ... COMMIT` with a
 * transaction-local statement_timeout. Rolls back on any failure and always
 * releases the client; a client whose ROLLBACK failed is discarded.
 */
export async function runReadOnly<T>(
  source: Pool,
  settings: ReadOnlySettings,
  work: (client: PoolClient) => Promise<T>,
): Promise<T> {
  const client = await checkout(source);
  let releaseError: Error | undefined;

  try {
    await client.query('BEGIN READ ONLY');
    await client.query('SELECT set_config($1, $2, true)', ['statement_timeout', `${settings.timeoutMs}ms`]);
    if (settings.searchPath) {
      await client.query('SELECT set_config($1, $2, true)', ['search_path', settings.searchPath]);
    }

    const result = await work(client);

    await client.query('COMMIT');
    return result;
  } catch (error) {
    try {
      await client.query('ROLLBACK');
    } catch (rollbackError) {
      console.error('[executor] ROLLBACK failed:', errorMessage(rollbackError));
      releaseError = rollbackError instanceof Error ? rollbackError : new Error(String(rollbackError));
    }
    throw error;
  } finally {
    client.release(releaseError);
  }
}

/**
 * Build an executor over `source`. Runs exactly one statement per call and
 * always releases the client it checked out.
 */
export function createGuardedExecutor(source: Pool): GuardedExecutor {
  return {
    async execute(sql, { schema, timeoutMs, params = [] }) {
      const start = Date.now();
      try {
        const result = await runReadOnly(source, { timeoutMs, searchPath: schema }, (client) =>
          client.query<Record<string, unknown>>(sql, params),
        );

        return {
          columns: result.fields.map((field) => field.name),
          rows: result.rows,
          rowCount: result.rows.length,
          elapsedMs: Date.now() - start,
        };
      } catch (error) {
        if (error instanceof ExecutionFailedError) throw error;

        if (pgErrorCode(error) === QUERY_CANCELED) {
          throw new ExecutionTimeoutError(timeoutMs, { cause: error });
        }

        // The statement passed validation, so a failure here is a policy miss worth a look.
        console.error('[executor] Validated statement failed:', errorMessage(error));
        throw new ExecutionFailedError(`Query execution failed: ${errorMessage(error)}`, { cause: error });
      }
    },
  };
}

// ---------------------------------------------------------------------------
// Schema introspection
// ---------------------------------------------------------------------------

/**
 * Live column types for every table in `schema`, keyed by table then column.
 *
 * System query: bypasses the validator but still runs read-only under
 * `statement_timeout`.
 */
export async function fetchColumnTypes(
  schema: string,
  timeoutMs: number,
  source: Pool = getPool(),
): Promise<Map<string, Map<string, string>>> {
  const result = await runReadOnly(source, { timeoutMs }, (client) =>
    client.query<{ table_name: string; column_name: string; data_type: string }>(
      `
    SELECT table_name, column_name, data_type
    FROM information_schema.columns
    WHERE table_schema = $1
    ORDER BY table_name, ordinal_position
  `,
      [schema],
    ),
  );

  const tables = new Map<string, Map<string, string>>();
  for (const row of result.rows) {
    const columns = tables.get(row.table_name) ?? new Map<string, string>();
    columns.set(row.column_name, row.data_type);
    tables.set(row.table_name, columns);
  }
  return tables;
}

// ---------------------------------------------------------------------------
// Health check
// ---------------------------------------------------------------------------

/**
 * Lightweight connectivity check.
 *
 * Returns `true` if the pool can successfully execute a trivial query,
 * `false` otherwise. Safe to call from readiness checks.
 */
export async function healthCheck(source: Pool = getPool()): Promise<boolean> {
  try {
    await source.query('SELECT 1');
    return true;
  } catch {
    return false;
  }
}
