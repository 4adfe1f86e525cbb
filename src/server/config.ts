/**
 * Server configuration.
 *
 * Read once from the environment at startup. Invalid values stop the
 * process before it listens.
 */

import {
  AUDIT_FALLBACK_TABLE,
  AUDIT_TABLE,
  DEFAULT_ROW_LIMIT,
  GENERATION_TIMEOUT_MS,
  POOL_CHECKOUT_TIMEOUT_MS,
  POOL_IDLE_TIMEOUT_MS,
  POOL_MAX,
  SCHEMA_HINT_TTL_MS,
  STATEMENT_TIMEOUT_MS,
} from '../shared/constants';
import type { PoolSettings } from './db/pool';
import { ConfigError } from './errors';
import { isProviderName, type LLMProviderName } from './llm';

export type AuditSinkKind = 'postgres' | 'console';

/** Environment variables by name; `process.env` or a plain object in tests. */
export type Env = Readonly<Record<string, string | undefined>>;

export interface ServerConfig {
  database: PoolSettings;
  /** LIMIT injected into statements without a row bound. */
  maxRows: number;
  statementTimeoutMs: number;
  catalogPath: string;
  schemaHintTtlMs: number;
  llm: {
    provider: LLMProviderName;
    model?: string;
    apiKey?: string;
    timeoutMs: number;
    azure: {
      endpoint?: string;
      deployment?: string;
      apiVersion: string;
    };
  };
  audit: {
    sink: AuditSinkKind;
    table: string;
    fallbackTable: string;
  };
}

function isAuditSinkKind(value: string): value is AuditSinkKind {
  return value === 'postgres' || value === 'console';
}

const TABLE_NAME = /^[a-z_][a-z0-9_]*(\.[a-z_][a-z0-9_]*)?$/;

function optional(env: Env, name: string): string | undefined {
  const value = env[name]?.trim();
  return value ? value : undefined;
}

function positiveInt(env: Env, name: string, fallback: number): number {
  const raw = optional(env, name);
  if (raw === undefined) return fallback;

  const value = parseInt(raw, 10);
  if (!/^\d+$/.test(raw) || value <= 0) {
    throw new ConfigError(`${name} must be a positive integer (got "${raw}")`);
  }
  return value;
}

function tableName(env: Env, name: string, fallback: string): string {
  const value = optional(env, name) ?? fallback;
  if (!TABLE_NAME.test(value)) {
    throw new ConfigError(`${name} must be a plain or schema-qualified table name (got "${value}")`);
  }
  return value;
}

export function loadServerConfig(env: Env = process.env): Readonly<ServerConfig> {
  const provider = optional(env, 'LLM_PROVIDER') ?? 'openai';
  if (!isProviderName(provider)) {
    throw new ConfigError(`Unsupported LLM_PROVIDER: "${provider}"`);
  }

  const sink = optional(env, 'AUDIT_SINK') ?? 'postgres';
  if (!isAuditSinkKind(sink)) {
    throw new ConfigError(`AUDIT_SINK must be "postgres" or "console" (got "${sink}")`);
  }

  const connectionString = optional(env, 'DATABASE_URL');

  const config: ServerConfig = {
    database: {
      ...(connectionString
        ? { connectionString }
        : {
            host: env.PG_HOST || 'localhost',
            port: positiveInt(env, 'PG_PORT', 5432),
            user: optional(env, 'PG_USER'),
            password: env.PG_PASSWORD,
            database: optional(env, 'PG_DATABASE'),
          }),
      max: positiveInt(env, 'POOL_MAX', POOL_MAX),
      connectionTimeoutMillis: positiveInt(env, 'POOL_CHECKOUT_TIMEOUT_MS', POOL_CHECKOUT_TIMEOUT_MS),
      idleTimeoutMillis: positiveInt(env, 'POOL_IDLE_TIMEOUT_MS', POOL_IDLE_TIMEOUT_MS),
    },
    maxRows: positiveInt(env, 'MAX_ROWS', DEFAULT_ROW_LIMIT),
    statementTimeoutMs: positiveInt(env, 'STATEMENT_TIMEOUT_MS', STATEMENT_TIMEOUT_MS),
    catalogPath: optional(env, 'CATALOG_PATH') ?? 'config/catalog.yaml',
    schemaHintTtlMs: positiveInt(env, 'SCHEMA_HINT_TTL_MS', SCHEMA_HINT_TTL_MS),
    llm: {
      provider,
      model: optional(env, 'LLM_MODEL'),
      apiKey: optional(env, 'LLM_API_KEY'),
      timeoutMs: positiveInt(env, 'LLM_TIMEOUT_MS', GENERATION_TIMEOUT_MS),
      azure: {
        endpoint: optional(env, 'AZURE_OPENAI_ENDPOINT'),
        deployment: optional(env, 'AZURE_OPENAI_DEPLOYMENT'),
        apiVersion: optional(env, 'AZURE_OPENAI_API_VERSION') ?? '2024-06-01',
      },
    },
    audit: {
      sink,
      table: tableName(env, 'AUDIT_TABLE', AUDIT_TABLE),
      fallbackTable: tableName(env, 'AUDIT_FALLBACK_TABLE', AUDIT_FALLBACK_TABLE),
    },
  };

  return Object.freeze(config);
}
