/**
 * Shared constants for the NL2SQL query service.
 *
 * Security-critical block-lists and the defaults behind the
 * environment-driven configuration.
 */

// ---------------------------------------------------------------------------
// Validation policy
// ---------------------------------------------------------------------------

/** Every reason a candidate statement can be rejected for. */
export const REASON_CODES = [
  'NOT_SELECT',
  'FORBIDDEN_KEYWORD',
  'UNKNOWN_TABLE',
  'DISALLOWED_COLUMN',
  'MISSING_LIMIT',
  'WILDCARD_SELECT',
  'MULTI_STATEMENT',
  'UNPARSEABLE',
] as const;

/** Whole-word keywords rejected anywhere in a candidate, in any case. */
export const FORBIDDEN_KEYWORDS = [
  'INSERT', 'UPDATE', 'DELETE', 'DROP', 'TRUNCATE', 'ALTER',
  'GRANT', 'REVOKE', 'CREATE', 'COMMENT', 'MERGE', 'CALL',
  'EXECUTE', 'COPY', 'DO', 'SET', 'SHOW',
] as const;

/** Schema that must never be named in a candidate. */
export const METADATA_SCHEMA = 'information_schema';

/** Identifier prefix of the system catalogues. */
export const SYSTEM_IDENTIFIER_PREFIX = 'pg_';

/** PostgreSQL functions that must never appear in generated queries. */
export const BLOCKED_FUNCTIONS = new Set([
  'lo_import', 'lo_export', 'lo_get', 'lo_put', 'lo_from_bytea',
  'dblink', 'dblink_exec', 'dblink_connect', 'dblink_send_query',
  'set_config', 'current_setting',
  'txid_current', 'query_to_xml', 'table_to_xml', 'cursor_to_xml',
  'version', 'inet_server_addr', 'inet_server_port',
]);

/** Function families blocked by name prefix (large objects, dblink). */
export const BLOCKED_FUNCTION_PREFIXES = ['lo_', 'dblink'] as const;

// ---------------------------------------------------------------------------
// Query limits
// ---------------------------------------------------------------------------

/** LIMIT appended to statements that carry no row bound of their own. */
export const DEFAULT_ROW_LIMIT = 200;

/** Per-statement execution timeout in milliseconds. */
export const STATEMENT_TIMEOUT_MS = 8_000;

/** Hard upper bound on one SQL generation call. */
export const GENERATION_TIMEOUT_MS = 30_000;

/** Maximum length of a submitted intent (characters). */
export const MAX_INTENT_LENGTH = 1_000;

/** Lifetime of a cached schema hint. */
export const SCHEMA_HINT_TTL_MS = 3_600_000;

// ---------------------------------------------------------------------------
// Connection pool
// ---------------------------------------------------------------------------

export const POOL_MAX = 10;
export const POOL_CHECKOUT_TIMEOUT_MS = 5_000;
export const POOL_IDLE_TIMEOUT_MS = 30_000;

// ---------------------------------------------------------------------------
// Audit
// ---------------------------------------------------------------------------

export const AUDIT_TABLE = 'n2sql_audit';
export const AUDIT_FALLBACK_TABLE = 'audit_log';

/** Entries returned by GET /api/diag/audit without a `limit`, and the most it allows. */
export const AUDIT_LIST_DEFAULT_LIMIT = 100;
export const AUDIT_LIST_MAX_LIMIT = 2_000;
