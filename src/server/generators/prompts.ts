/**
 * Prompt text for LLM-backed SQL generation.
 */

import { FORBIDDEN_KEYWORDS } from '../../shared/constants';

export interface SystemPromptOptions {
  schemaHint: string;
  rowLimit: number;
}

export function buildSystemPrompt({ schemaHint, rowLimit }: SystemPromptOptions): string {
  return `You are an expert PostgreSQL assistant.
Write exactly ONE valid SQL query for the user's intent.

RULES (MANDATORY):
1. Generate ONLY a single SELECT statement. Never ${FORBIDDEN_KEYWORDS.join(', ')}.
2. Read from exactly one table. No joins, sub-selects, CTEs or UNION.
3. Use only the tables and columns listed below, and name every column explicitly (never SELECT *).
4. Prefer fully qualified table names: schema.table.
5. Use ILIKE for name/email searches (case-insensitive).
6. When the user asks for "latest" or "most recent" rows, ORDER BY the relevant date column DESC.
7. Add LIMIT ${rowLimit} unless the user asks for fewer rows.
8. Never access pg_catalog, information_schema, or system tables.

DATABASE SCHEMA:
${schemaHint}

Return only the SQL, without explanations.`;
}

export function buildUserMessage(intent: string): string {
  return `User intent:\n${intent.trim()}`;
}
