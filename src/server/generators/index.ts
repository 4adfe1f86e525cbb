/**
 * SQL generator selection.
 *
 * The pipeline holds one `SqlGenerator`. In production that is a composite
 * that answers named templates from the rule engine and everything else
 * from the configured LLM provider.
 */

import { LlmSqlGenerator } from './llm-sql-generator';
import { RuleBasedSqlGenerator } from './rule-based';
import type { GeneratedSql, GenerationRequest, SqlGenerator } from './types';

export type { GeneratedSql, GenerationRequest, SqlGenerator } from './types';
export { LlmSqlGenerator, extractSql, type LlmSqlGeneratorOptions } from './llm-sql-generator';
export { RuleBasedSqlGenerator, TEMPLATE_NAMES } from './rule-based';
export { buildSystemPrompt, buildUserMessage } from './prompts';

export class CompositeSqlGenerator implements SqlGenerator {
  readonly name: string;

  constructor(
    private readonly rules: RuleBasedSqlGenerator,
    private readonly fallback: SqlGenerator,
  ) {
    this.name = `${rules.name}+${fallback.name}`;
  }

  generate(request: GenerationRequest): Promise<GeneratedSql> {
    return this.rules.has(request.intent) ? this.rules.generate(request) : this.fallback.generate(request);
  }
}

/** Serves caller-supplied SQL as the candidate. The intent is the SQL text. */
export class StaticSqlGenerator implements SqlGenerator {
  readonly name = 'static';

  async generate(request: GenerationRequest): Promise<GeneratedSql> {
    return { sql: request.intent, params: [] };
  }
}

export function createSqlGenerator(llm: LlmSqlGenerator): CompositeSqlGenerator {
  return new CompositeSqlGenerator(new RuleBasedSqlGenerator(), llm);
}
