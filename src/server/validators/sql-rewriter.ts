/**
 * Query Rewriter.
 *
 * Normalises an accepted statement before execution: qualifies the table
 * with the dataset's schema, bounds the row count and terminates the
 * statement exactly once. Only applied to text that already passed the
 * validator, and the output is validated again before it runs.
 */

import type { TableReference } from '../../shared/types';
import { escapeRegExp, stripTerminators } from '../lib/sql-text';

export interface RewriteOptions {
  /** LIMIT applied when the statement carries no bound of its own. */
  defaultLimit: number;
  /** The validator's answer for this exact text. */
  hasLimit: boolean;
  /** Where the validator found a `LIMIT ALL` / `LIMIT NULL` value. */
  unboundedLimitLocation?: number;
  /** Physical schema to qualify an unqualified table with. */
  schema?: string;
  /** Table reference reported by the validator for this exact text. */
  table?: TableReference;
}

/** Convert a parser byte offset into a string index. */
function charIndex(sql: string, byteOffset: number): number {
  return Buffer.from(sql, 'utf8').subarray(0, byteOffset).toString('utf8').length;
}

/** Swap the ALL / NULL of an unusable LIMIT for a number. */
function boundLimit(sql: string, location: number, limit: number): string | undefined {
  const index = charIndex(sql, location);
  const value = /^(?:all|null)(?![\w$])/i.exec(sql.slice(index));
  if (!value) return undefined;
  return `${sql.slice(0, index)}${limit}${sql.slice(index + value[0].length)}`;
}

function qualifyTable(sql: string, schema: string, table: TableReference): string {
  if (table.schema || table.location < 0) return sql;

  const index = charIndex(sql, table.location);
  if (index > 0 && sql[index - 1] === '.') return sql;

  const name = escapeRegExp(table.name);
  const atTable = new RegExp(`^(?:"${name}"|${name})(?![\\w$."])`, 'i');
  if (!atTable.test(sql.slice(index))) return sql;

  return `${sql.slice(0, index)}${schema}.${sql.slice(index)}`;
}

/**
 * Rewrite an accepted statement into the form that is executed.
 *
 * Idempotent: rewriting the output again, with the verdict for the output,
 * returns it unchanged.
 */
export function rewriteSql(sql: string, options: RewriteOptions): string {
  const { defaultLimit, hasLimit, unboundedLimitLocation, schema, table } = options;
  if (!Number.isInteger(defaultLimit) || defaultLimit <= 0) {
    throw new RangeError(`defaultLimit must be a positive integer (got ${defaultLimit})`);
  }

  let body = stripTerminators(sql);

  // The LIMIT follows the table, so bound it before qualifying shifts offsets.
  if (!hasLimit) {
    const bounded =
      unboundedLimitLocation === undefined ? undefined : boundLimit(body, unboundedLimitLocation, defaultLimit);
    body = bounded ?? `${body} LIMIT ${defaultLimit}`;
  }

  if (schema && table) {
    body = qualifyTable(body, schema, table);
  }

  return `${body};`;
}
