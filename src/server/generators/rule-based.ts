/**
 * Rule-based SQL generator.
 *
 * Named templates for the structured intents the service answers without a
 * model. Every user value is bound as a `$n` parameter; nothing from the
 * request is spliced into the SQL text.
 */

import { z } from 'zod';

import { GenerationFailedError, InvalidRequestError } from '../errors';
import { ParamBuilder, buildWhere } from '../lib/query-builder';
import type { GeneratedSql, GenerationRequest, SqlGenerator } from './types';

const ISO_DATE = /^\d{4}-\d{2}-\d{2}$/;

const partnersSearchParams = z.object({
  q: z.string().trim().min(1).optional(),
  company_id: z.coerce.number().int().positive().optional(),
});

const movesExpiringParams = z
  .object({
    start: z.string().regex(ISO_DATE, 'expected YYYY-MM-DD').optional(),
    end: z.string().regex(ISO_DATE, 'expected YYYY-MM-DD').optional(),
    state: z.string().trim().min(1).optional(),
    partner_id: z.coerce.number().int().positive().optional(),
  })
  .refine((p) => (p.start === undefined) === (p.end === undefined), {
    message: 'start and end must be given together',
    path: ['end'],
  });

type Template = (
  schema: string,
  params: Record<string, unknown>,
  rowLimit: number,
) => { sql: string; params: unknown[] };

function parseParams<T extends z.ZodTypeAny>(template: string, schema: T, params: unknown): z.infer<T> {
  const parsed = schema.safeParse(params);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    const field = issue?.path.join('.') || 'params';
    throw new InvalidRequestError(`Invalid parameter '${field}' for ${template}: ${issue?.message ?? 'invalid'}`);
  }
  return parsed.data;
}

const TEMPLATES: Record<string, Template> = {
  partners_search(schema, raw, rowLimit) {
    const p = parseParams('partners_search', partnersSearchParams, raw);
    const pb = new ParamBuilder();
    const where = buildWhere([
      pb.search(['display_name', 'email'], p.q),
      pb.equals('company_id', p.company_id),
    ]);

    return {
      sql: [
        'SELECT id, display_name, vat, email, company_id',
        `FROM ${schema}.stg_res_partner`,
        where,
        'ORDER BY display_name ASC',
        `LIMIT ${rowLimit}`,
      ].filter(Boolean).join(' '),
      params: pb.params,
    };
  },

  moves_expiring(schema, raw, rowLimit) {
    const p = parseParams('moves_expiring', movesExpiringParams, raw);
    const pb = new ParamBuilder();
    const where = buildWhere([
      pb.between('invoice_date_due', p.start, p.end),
      pb.equals('state', p.state),
      pb.equals('partner_id', p.partner_id),
    ]);

    return {
      sql: [
        'SELECT id, name, move_type, state, payment_state, partner_id,',
        'invoice_date, invoice_date_due, amount_total, amount_residual,',
        'currency_id, company_id',
        `FROM ${schema}.stg_account_move`,
        where,
        'ORDER BY invoice_date DESC',
        `LIMIT ${rowLimit}`,
      ].filter(Boolean).join(' '),
      params: pb.params,
    };
  },
};

export const TEMPLATE_NAMES = Object.keys(TEMPLATES);

export class RuleBasedSqlGenerator implements SqlGenerator {
  readonly name = 'rules';

  has(intent: string): boolean {
    return Object.hasOwn(TEMPLATES, intent.trim());
  }

  async generate(request: GenerationRequest): Promise<GeneratedSql> {
    const key = request.intent.trim();
    if (!Object.hasOwn(TEMPLATES, key)) {
      throw new GenerationFailedError(`Unknown query template '${key}'`);
    }
    return TEMPLATES[key](request.schema, request.params, request.rowLimit);
  }
}
