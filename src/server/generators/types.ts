import type { TokenUsage } from '../../shared/types';

export interface GenerationRequest {
  dataset: string;
  /** Physical schema the dataset maps to. */
  schema: string;
  /** Free-text intent, or the name of a structured template. */
  intent: string;
  /** One line per allowed table: `schema.table(col:type, ...)`. */
  schemaHint: string;
  params: Record<string, unknown>;
  /** Row bound for this request. */
  rowLimit: number;
}

export interface GeneratedSql {
  /** Candidate SQL. Untrusted until the validator accepts it. */
  sql: string;
  /** Values bound to `$n` placeholders in `sql`. */
  params: unknown[];
  model?: string;
  usage?: TokenUsage;
}

/**
 * Turns an intent into candidate SQL. Implementations are selected once at
 * startup; the pipeline never knows which backend produced the text.
 */
export interface SqlGenerator {
  readonly name: string;
  generate(request: GenerationRequest): Promise<GeneratedSql>;
}
