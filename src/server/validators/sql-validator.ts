/**
 * SQL Validator using PostgreSQL's actual parser (libpg-query WASM).
 *
 * This module is the **critical security layer** between candidate SQL
 * (LLM output, rule templates or caller input) and the database. Checks run
 * in a fixed order and the first failure wins:
 *
 *  1. Strip comments (prevent obfuscation)
 *  2. Reject stacked statements
 *  3. Require a leading SELECT
 *  4. Pre-parse keyword and metadata-reference check
 *  5. Parse SQL into an AST via libpg-query and validate statement type
 *  6. Validate function calls against a block-list
 *  7. Restrict the grammar to a single-table SELECT
 *  8. Validate the table and projected columns against the catalog
 *  9. Optionally require a row bound
 */

import type { ReasonCode, SqlVerdict, TableReference } from '../../shared/types';
import {
  BLOCKED_FUNCTIONS,
  BLOCKED_FUNCTION_PREFIXES,
  FORBIDDEN_KEYWORDS,
  METADATA_SCHEMA,
  SYSTEM_IDENTIFIER_PREFIX,
} from '../../shared/constants';
import type { SchemaCatalog } from '../catalog/schema-catalog';
import { errorMessage } from '../errors';
import { escapeRegExp, maskQuoted, stripComments, stripTerminator } from '../lib/sql-text';

export interface ValidateOptions {
  catalog: SchemaCatalog;
  dataset: string;
  /** Reject statements without a usable LIMIT / FETCH FIRST bound. */
  requireLimit?: boolean;
}

// ---------------------------------------------------------------------------
// Lazy-load the WASM parser
// ---------------------------------------------------------------------------

interface Parser {
  parse: (sql: string) => Promise<unknown>;
}

let pgQuery: Parser | null = null;

async function getParser(): Promise<Parser> {
  if (!pgQuery) {
    pgQuery = await import('libpg-query');
  }
  return pgQuery;
}

// ---------------------------------------------------------------------------
// Pre-parse helpers
// ---------------------------------------------------------------------------

const KEYWORD_PATTERN = new RegExp(`\\b(${FORBIDDEN_KEYWORDS.join('|')})\\b`, 'i');

const METADATA_PATTERN = new RegExp(
  `\\b${escapeRegExp(METADATA_SCHEMA)}\\b|\\b${escapeRegExp(SYSTEM_IDENTIFIER_PREFIX)}\\w*`,
  'i',
);

function reject(reason: ReasonCode, message: string, column?: string): SqlVerdict {
  return column === undefined
    ? { valid: false, reason, message }
    : { valid: false, reason, message, column };
}

// ---------------------------------------------------------------------------
// AST helpers
// ---------------------------------------------------------------------------

type AstNode = Record<string, unknown>;

function isNode(value: unknown): value is AstNode {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function child(node: AstNode, key: string): AstNode | undefined {
  const value = node[key];
  return isNode(value) ? value : undefined;
}

function children(node: AstNode, key: string): AstNode[] {
  const value = node[key];
  return Array.isArray(value) ? value.filter(isNode) : [];
}

function stringField(node: AstNode, key: string): string | undefined {
  const value = node[key];
  return typeof value === 'string' ? value : undefined;
}

/** Text of a `{ String: { sval } }` name node (older parsers used `str`). */
function nameOf(node: AstNode): string | undefined {
  const str = child(node, 'String');
  if (!str) return undefined;
  return stringField(str, 'sval') ?? stringField(str, 'str');
}

/** Recursively collect every node of the given kind below `node`. */
function findNodes(node: unknown, kind: string, found: AstNode[] = []): AstNode[] {
  if (Array.isArray(node)) {
    for (const item of node) findNodes(item, kind, found);
    return found;
  }
  if (!isNode(node)) return found;

  for (const [key, value] of Object.entries(node)) {
    if (key === kind && isNode(value)) found.push(value);
    findNodes(value, kind, found);
  }
  return found;
}

function containsNode(node: unknown, kinds: readonly string[]): boolean {
  return kinds.some((kind) => findNodes(node, kind).length > 0);
}

/** Function names invoked anywhere below `node`, lower-cased and dotted. */
function extractFunctionCalls(node: unknown): string[] {
  return findNodes(node, 'FuncCall').map((call) =>
    children(call, 'funcname')
      .map((part) => nameOf(part) ?? '')
      .join('.')
      .toLowerCase(),
  );
}

function isBlockedFunction(qualifiedName: string): boolean {
  const name = qualifiedName.split('.').pop() ?? qualifiedName;
  return (
    BLOCKED_FUNCTIONS.has(name) ||
    BLOCKED_FUNCTION_PREFIXES.some((prefix) => name.startsWith(prefix))
  );
}

interface RowBound {
  hasLimit: boolean;
  /** Location of the null constant behind LIMIT ALL / LIMIT NULL. */
  unboundedLimitLocation?: number;
}

/** LIMIT ALL and LIMIT NULL (cast or not) parse to a null constant and bound nothing. */
function rowBound(select: AstNode): RowBound {
  const limit = child(select, 'limitCount');
  if (!limit) return { hasLimit: false };

  const cast = child(limit, 'TypeCast');
  const value = cast ? child(cast, 'arg') : limit;
  const constant = value ? child(value, 'A_Const') : undefined;
  if (!constant || constant.isnull !== true) return { hasLimit: true };

  const location = constant.location;
  return typeof location === 'number'
    ? { hasLimit: false, unboundedLimitLocation: location }
    : { hasLimit: false };
}

function isSetOperation(select: AstNode): boolean {
  const op = stringField(select, 'op');
  return (op !== undefined && op !== 'SETOP_NONE') || child(select, 'larg') !== undefined;
}

// ---------------------------------------------------------------------------
// Public API
// ---------------------------------------------------------------------------

/**
 * Validate a candidate statement against the safety policy for one dataset.
 *
 * Deterministic and connection-free: the only external input is the catalog.
 */
export async function validateSql(candidate: string, options: ValidateOptions): Promise<SqlVerdict> {
  const { catalog, dataset, requireLimit = false } = options;

  // Step 1: Strip comments
  const stripped = stripComments(candidate);
  const sql = stripTerminator(stripped);
  if (!sql) {
    return reject('UNPARSEABLE', 'Empty SQL after stripping comments');
  }

  // Step 2: Stacked statements
  if (maskQuoted(sql).includes(';')) {
    return reject('MULTI_STATEMENT', 'Multiple statements are not permitted');
  }

  // Step 3: Leading SELECT
  if (!/^select\b/i.test(sql)) {
    return reject('NOT_SELECT', 'Only SELECT statements are permitted');
  }

  // Step 4: Keyword and metadata-reference check over the whole text
  const keyword = KEYWORD_PATTERN.exec(sql);
  if (keyword) {
    return reject('FORBIDDEN_KEYWORD', `Blocked keyword detected: ${keyword[1].toUpperCase()}`);
  }
  const reference = METADATA_PATTERN.exec(sql);
  if (reference) {
    return reject('FORBIDDEN_KEYWORD', `Access to system catalogue '${reference[0]}' is not permitted`);
  }

  // Step 5: Parse and validate statement count and type
  let ast: unknown;
  try {
    const parser = await getParser();
    ast = await parser.parse(sql);
  } catch (parseError: unknown) {
    return reject('UNPARSEABLE', `SQL parse error: ${errorMessage(parseError)}`);
  }

  const stmts = isNode(ast) ? children(ast, 'stmts') : [];
  if (stmts.length === 0) {
    return reject('UNPARSEABLE', 'No valid SQL statement found');
  }
  if (stmts.length > 1) {
    return reject('MULTI_STATEMENT', 'Multiple statements are not permitted');
  }

  const stmt = child(stmts[0], 'stmt');
  const select = stmt ? child(stmt, 'SelectStmt') : undefined;
  if (!stmt || !select) {
    const stmtType = stmt ? Object.keys(stmt)[0] : 'unknown';
    return reject('NOT_SELECT', `Only SELECT statements are permitted (got ${stmtType})`);
  }
  if (child(select, 'intoClause')) {
    return reject('NOT_SELECT', 'SELECT ... INTO is not permitted');
  }

  // Step 6: Function block-list
  const blocked = extractFunctionCalls(stmt).find(isBlockedFunction);
  if (blocked) {
    return reject('FORBIDDEN_KEYWORD', `Function '${blocked}' is not permitted`);
  }

  // Step 7: Supported grammar
  if (isSetOperation(select)) {
    return reject('UNPARSEABLE', 'UNION, INTERSECT and EXCEPT are not supported');
  }
  if (child(select, 'withClause')) {
    return reject('UNPARSEABLE', 'Common table expressions are not supported');
  }
  if (children(select, 'valuesLists').length > 0) {
    return reject('UNPARSEABLE', 'VALUES lists are not supported');
  }
  if (children(select, 'lockingClause').length > 0) {
    return reject('UNPARSEABLE', 'Locking clauses are not supported');
  }
  if (containsNode(select, ['SubLink', 'RangeSubselect', 'SelectStmt'])) {
    return reject('UNPARSEABLE', 'Sub-selects are not supported');
  }

  const from = children(select, 'fromClause');
  if (from.length === 0) {
    return reject('UNPARSEABLE', 'A FROM clause naming one table is required');
  }
  const rangeVar = from.length === 1 ? child(from[0], 'RangeVar') : undefined;
  if (!rangeVar) {
    return reject('UNPARSEABLE', 'Only single-table queries are supported');
  }

  // Step 8: Table against the catalog
  const relname = (stringField(rangeVar, 'relname') ?? '').toLowerCase();
  const schemaname = stringField(rangeVar, 'schemaname')?.toLowerCase();
  const written = schemaname ? `${schemaname}.${relname}` : relname;
  const tableSpec =
    stringField(rangeVar, 'catalogname') === undefined ? catalog.table(dataset, written) : undefined;
  if (!tableSpec) {
    return reject('UNKNOWN_TABLE', `Table '${written}' is not in the catalog for dataset '${dataset}'`);
  }

  const aliasNode = child(rangeVar, 'alias');
  const alias = aliasNode ? stringField(aliasNode, 'aliasname')?.toLowerCase() : undefined;
  const location = rangeVar.location;
  const table: TableReference = {
    ...(schemaname ? { schema: schemaname } : {}),
    name: stringField(rangeVar, 'relname') ?? relname,
    ...(alias ? { alias } : {}),
    location: typeof location === 'number' ? location : -1,
    qualifiedName: tableSpec.qualifiedName,
  };

  // Step 9: Projection. Wildcards first, then every column reference.
  const targets = children(select, 'targetList')
    .map((target) => child(target, 'ResTarget'))
    .filter(isNode)
    .map((target) => target.val);

  const columnRefs = findNodes(targets, 'ColumnRef');
  if (columnRefs.some((ref) => children(ref, 'fields').some((field) => child(field, 'A_Star')))) {
    return reject('WILDCARD_SELECT', 'SELECT * is not permitted; name the columns explicitly');
  }

  const [catalogSchema] = tableSpec.qualifiedName.split('.');
  const qualifiers = new Set([relname, `${schemaname ?? catalogSchema}.${relname}`]);
  if (alias) qualifiers.add(alias);

  const columnsReferenced: string[] = [];
  for (const ref of columnRefs) {
    const parts = children(ref, 'fields').map((field) => (nameOf(field) ?? '').toLowerCase());
    const column = parts.pop() ?? '';
    const qualifier = parts.join('.');

    if (parts.length > 2 || (qualifier && !qualifiers.has(qualifier))) {
      return reject('UNKNOWN_TABLE', `Column qualifier '${qualifier}' does not name the queried table`);
    }
    if (!tableSpec.columnNames.has(column)) {
      return reject(
        'DISALLOWED_COLUMN',
        `Column '${column}' is not allowed on table '${tableSpec.qualifiedName}'`,
        column,
      );
    }
    if (!columnsReferenced.includes(column)) columnsReferenced.push(column);
  }

  // Step 10: Row bound
  const bound = rowBound(select);
  if (requireLimit && !bound.hasLimit) {
    return reject('MISSING_LIMIT', 'A LIMIT clause is required');
  }

  return {
    valid: true,
    sanitisedSql: sql,
    statementType: 'SelectStmt',
    table,
    columnsReferenced,
    ...bound,
  };
}
