/**
 * Process-wide service graph behind the route handlers.
 *
 * Built once from the environment, either by the instrumentation hook when
 * the server starts or by the first request that needs it.
 */

import * as path from 'path';

import { createQueryPipeline, type QueryPipeline } from './agents/query-pipeline';
import { loadCatalog, type SchemaCatalog } from './catalog/schema-catalog';
import { SchemaHintProvider } from './catalog/schema-hints';
import { loadServerConfig, type ServerConfig } from './config';
import { closePool, createGuardedExecutor, fetchColumnTypes, healthCheck, initPool } from './db/pool';
import { LlmSqlGenerator, createSqlGenerator } from './generators';
import { TtlCache } from './lib/ttl-cache';
import { getLLMProvider } from './llm';
import {
  ConsoleAuditSink,
  PostgresAuditSink,
  type AuditLogReader,
  type AuditSink,
} from './middleware/audit';

export interface QueryService {
  catalog: SchemaCatalog;
  pipeline: QueryPipeline;
  /** Absent when audit records are only printed. */
  auditLog?: AuditLogReader;
  healthCheck(): Promise<boolean>;
}

let service: QueryService | null = null;

export function buildQueryService(config: Readonly<ServerConfig>): QueryService {
  const catalog = loadCatalog(path.resolve(config.catalogPath));

  const pool = initPool(config.database);
  const provider = getLLMProvider(config.llm.provider, {
    apiKey: config.llm.apiKey,
    model: config.llm.model,
    timeoutMs: config.llm.timeoutMs,
    endpoint: config.llm.azure.endpoint,
    deployment: config.llm.azure.deployment,
    apiVersion: config.llm.azure.apiVersion,
  });
  const generator = createSqlGenerator(new LlmSqlGenerator(provider, { timeoutMs: config.llm.timeoutMs }));

  const hints = new SchemaHintProvider(
    catalog,
    new TtlCache<string>(config.schemaHintTtlMs),
    (schema) => fetchColumnTypes(schema, config.statementTimeoutMs, pool),
  );

  const postgresSink =
    config.audit.sink === 'postgres'
      ? new PostgresAuditSink({
          table: config.audit.table,
          fallbackTable: config.audit.fallbackTable,
          pool,
          readTimeoutMs: config.statementTimeoutMs,
        })
      : undefined;
  const auditSink: AuditSink = postgresSink ?? new ConsoleAuditSink();

  const pipeline = createQueryPipeline({
    catalog,
    hints,
    generator,
    executor: createGuardedExecutor(pool),
    auditSink,
    defaultLimit: config.maxRows,
    statementTimeoutMs: config.statementTimeoutMs,
  });

  console.info(
    `[server] Ready (datasets: ${catalog.datasetNames().join(', ')}; generator: ${generator.name}; audit: ${config.audit.sink})`,
  );

  return {
    catalog,
    pipeline,
    ...(postgresSink ? { auditLog: postgresSink } : {}),
    healthCheck: () => healthCheck(pool),
  };
}

export function getQueryService(): QueryService {
  if (!service) {
    service = buildQueryService(loadServerConfig());
  }
  return service;
}

/** Drop the service graph and close its pool. */
export async function closeQueryService(): Promise<void> {
  service = null;
  await closePool();
}
