/**
 * LLM-backed SQL generator.
 *
 * Wraps any `LLMProvider` behind the `SqlGenerator` seam: builds the prompt,
 * bounds the call with a hard timeout and pulls the SQL out of the reply.
 */

import { GenerationFailedError, errorMessage } from '../errors';
import type { LLMCompletionResponse, LLMProvider } from '../llm';
import { stripTerminator } from '../lib/sql-text';
import { TimeoutError, withTimeout } from '../lib/timeout';
import { buildSystemPrompt, buildUserMessage } from './prompts';
import type { GeneratedSql, GenerationRequest, SqlGenerator } from './types';

export interface LlmSqlGeneratorOptions {
  /** Hard upper bound on one completion call. */
  timeoutMs: number;
  maxTokens?: number;
}

/**
 * Pull the SQL statement out of a model reply.
 *
 * Takes the longest fenced block when there is one, otherwise everything
 * from the first line that starts with SELECT. The trailing terminator is
 * dropped. Returns an empty string when nothing looks like SQL.
 */
export function extractSql(text: string): string {
  const fences = Array.from(text.matchAll(/```(?:sql|postgresql|postgres|pgsql)?\s*([\s\S]*?)```/gi))
    .map((match) => match[1].trim())
    .filter(Boolean);

  let candidate = '';
  if (fences.length > 0) {
    candidate = fences.reduce((longest, fence) => (fence.length > longest.length ? fence : longest));
  } else {
    const match = /^\s*select\b[\s\S]*/im.exec(text);
    candidate = match ? match[0] : '';
  }

  return stripTerminator(candidate);
}

export class LlmSqlGenerator implements SqlGenerator {
  readonly name: string;

  constructor(
    private readonly provider: LLMProvider,
    private readonly options: LlmSqlGeneratorOptions,
  ) {
    this.name = `llm:${provider.name}`;
  }

  async generate(request: GenerationRequest): Promise<GeneratedSql> {
    const { timeoutMs, maxTokens } = this.options;

    let completion: LLMCompletionResponse;
    try {
      completion = await withTimeout(
        this.provider.complete({
          system: buildSystemPrompt({ schemaHint: request.schemaHint, rowLimit: request.rowLimit }),
          userMessage: buildUserMessage(request.intent),
          maxTokens,
        }),
        timeoutMs,
      );
    } catch (error) {
      if (error instanceof TimeoutError) {
        throw new GenerationFailedError(`SQL generation timed out after ${timeoutMs} ms`, { cause: error });
      }
      throw new GenerationFailedError(`SQL generation failed: ${errorMessage(error)}`, { cause: error });
    }

    const sql = extractSql(completion.text);
    if (!sql) {
      throw new GenerationFailedError('The model returned no SQL');
    }

    return { sql, params: [], model: completion.model, usage: completion.usage };
  }
}
