/**
 * Query pipeline.
 *
 * Drives one request through generation, validation, rewriting and guarded
 * execution:
 *
 *   RECEIVED -> GENERATING_SQL -> VALIDATING -> REJECTED
 *                                            -> REWRITING -> EXECUTING -> SUCCEEDED | FAILED
 *                                                         -> GENERATED (execute: false)
 *
 * Exactly one audit record is written per request, on every path.
 */

import type {
  AuditStatus,
  PipelineState,
  QueryRequest,
  QueryResponse,
  SqlExecuteRequest,
  TokenUsage,
} from '../../shared/types';
import type { SchemaCatalog } from '../catalog/schema-catalog';
import type { GuardedExecutor } from '../db/pool';
import {
  InvalidRequestError,
  UnknownDatasetError,
  ValidationRejectedError,
  errorMessage,
} from '../errors';
import { StaticSqlGenerator, type SqlGenerator } from '../generators';
import { safeRecord, type AuditSink } from '../middleware/audit';
import { rewriteSql } from '../validators/sql-rewriter';
import { validateSql } from '../validators/sql-validator';

export interface SchemaHintSource {
  get(dataset: string): Promise<string>;
}

export interface QueryPipelineDeps {
  catalog: SchemaCatalog;
  hints: SchemaHintSource;
  generator: SqlGenerator;
  executor: GuardedExecutor;
  auditSink: AuditSink;
  /** Row bound for unbounded statements, and the ceiling for a requested limit. */
  defaultLimit: number;
  statementTimeoutMs: number;
  now?: () => number;
  /** Observer for state transitions. */
  onTransition?: (state: PipelineState) => void;
}

export interface QueryPipeline {
  run(request: QueryRequest): Promise<QueryResponse>;
  /** Run caller-supplied SQL through the same guards. */
  runSql(request: SqlExecuteRequest): Promise<QueryResponse>;
}

function isRejection(error: unknown): boolean {
  return (
    error instanceof ValidationRejectedError ||
    error instanceof UnknownDatasetError ||
    error instanceof InvalidRequestError
  );
}

/** A requested row bound, capped at the configured maximum. */
function rowLimitFor(requested: number | undefined, maxRows: number): number {
  if (requested === undefined) return maxRows;
  if (!Number.isInteger(requested) || requested <= 0) {
    throw new InvalidRequestError(`limit must be a positive integer (got ${requested})`);
  }
  return Math.min(requested, maxRows);
}

export function createQueryPipeline(deps: QueryPipelineDeps): QueryPipeline {
  const { catalog, hints, executor, auditSink, defaultLimit, statementTimeoutMs, onTransition } = deps;
  const now = deps.now ?? Date.now;
  const staticGenerator = new StaticSqlGenerator();

  async function handle(request: QueryRequest, generator: SqlGenerator): Promise<QueryResponse> {
    const startedAt = now();
    const { dataset, intent } = request;

    const progress: { state: PipelineState } = { state: 'RECEIVED' };
    const transition = (next: PipelineState) => {
      progress.state = next;
      onTransition?.(next);
    };
    onTransition?.(progress.state);

    let status: AuditStatus = 'failed';
    let sqlText = '';
    let rowCount = 0;
    let failure: string | undefined;
    let model: string | undefined;
    let tokenUsage: TokenUsage | undefined;

    try {
      const schema = catalog.resolve(dataset);
      if (!schema) {
        throw new UnknownDatasetError(dataset);
      }
      const rowLimit = rowLimitFor(request.limit, defaultLimit);

      transition('GENERATING_SQL');
      const schemaHint = await hints.get(dataset);
      const generated = await generator.generate({
        dataset,
        schema,
        intent,
        schemaHint,
        params: request.params ?? {},
        rowLimit,
      });
      sqlText = generated.sql;
      model = generated.model;
      tokenUsage = generated.usage;

      transition('VALIDATING');
      const verdict = await validateSql(generated.sql, { catalog, dataset });
      if (!verdict.valid) {
        transition('REJECTED');
        throw new ValidationRejectedError(verdict);
      }

      transition('REWRITING');
      const sql = rewriteSql(verdict.sanitisedSql, {
        defaultLimit: rowLimit,
        hasLimit: verdict.hasLimit,
        unboundedLimitLocation: verdict.unboundedLimitLocation,
        schema,
        table: verdict.table,
      });
      sqlText = sql;

      const recheck = await validateSql(sql, { catalog, dataset, requireLimit: true });
      if (!recheck.valid) {
        transition('REJECTED');
        throw new ValidationRejectedError(recheck);
      }

      if (request.execute === false) {
        transition('GENERATED');
        status = 'generated';
        return {
          ok: true,
          dataset,
          schema,
          sql,
          columns: [],
          rows: [],
          rowcount: 0,
          elapsedMs: 0,
          executed: false,
          ...(model ? { model } : {}),
        };
      }

      transition('EXECUTING');
      const result = await executor.execute(sql, {
        schema,
        timeoutMs: statementTimeoutMs,
        params: generated.params,
      });

      rowCount = result.rowCount;
      transition('SUCCEEDED');
      status = 'succeeded';
      return {
        ok: true,
        dataset,
        schema,
        sql,
        columns: result.columns,
        rows: result.rows,
        rowcount: result.rowCount,
        elapsedMs: result.elapsedMs,
        executed: true,
        ...(model ? { model } : {}),
      };
    } catch (error) {
      if (isRejection(error)) {
        status = 'rejected';
        if (progress.state !== 'REJECTED') transition('REJECTED');
      } else {
        status = 'failed';
        transition('FAILED');
      }
      failure = errorMessage(error);
      throw error;
    } finally {
      await safeRecord(
        auditSink,
        Object.freeze({
          dataset,
          intent,
          sqlText,
          rowCount,
          durationMs: now() - startedAt,
          status,
          error: failure,
          requestIp: request.requestIp,
          model,
          tokenUsage,
          timestamp: new Date(startedAt),
        }),
      );
    }
  }

  return {
    run: (request) => handle(request, deps.generator),
    runSql: (request) =>
      handle(
        { dataset: request.dataset, intent: request.sql, limit: request.limit, requestIp: request.requestIp },
        staticGenerator,
      ),
  };
}
