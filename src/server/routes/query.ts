import { NextRequest, NextResponse } from 'next/server';
import { z } from 'zod';

import { MAX_INTENT_LENGTH } from '../../shared/constants';
import type { QueryResponse } from '../../shared/types';
import { InvalidRequestError } from '../errors';
import { getQueryService } from '../service';
import { clientIp, errorResponse, readJson } from './respond';

const dataset = z
  .string({ required_error: 'dataset is required', invalid_type_error: 'dataset must be a string' })
  .trim()
  .min(1, 'dataset is required');

const limit = z
  .number({ invalid_type_error: 'limit must be a number' })
  .int('limit must be an integer')
  .positive('limit must be positive')
  .optional();

const queryBody = z.object({
  dataset,
  intent: z
    .string({ required_error: 'intent is required', invalid_type_error: 'intent must be a string' })
    .trim()
    .min(1, 'intent is required')
    .max(MAX_INTENT_LENGTH, `intent exceeds maximum length of ${MAX_INTENT_LENGTH} characters`),
  params: z.record(z.unknown(), { invalid_type_error: 'params must be an object' }).optional(),
  execute: z.boolean({ invalid_type_error: 'execute must be a boolean' }).optional(),
  limit,
});

const sqlBody = z.object({
  dataset,
  sql: z
    .string({ required_error: 'sql is required', invalid_type_error: 'sql must be a string' })
    .trim()
    .min(1, 'sql is required'),
  limit,
});

function parseBody<T extends z.ZodTypeAny>(schema: T, body: unknown): z.infer<T> {
  if (typeof body !== 'object' || body === null || Array.isArray(body)) {
    throw new InvalidRequestError('Request body must be a JSON object');
  }
  const parsed = schema.safeParse(body);
  if (!parsed.success) {
    throw new InvalidRequestError(parsed.error.issues[0]?.message ?? 'Invalid request body');
  }
  return parsed.data;
}

/** POST /api/v1/query */
export async function handleQuery(req: NextRequest): Promise<NextResponse> {
  try {
    const body = parseBody(queryBody, await readJson(req));
    const response: QueryResponse = await getQueryService().pipeline.run({ ...body, requestIp: clientIp(req) });
    return NextResponse.json(response);
  } catch (error) {
    return errorResponse(error);
  }
}

/** POST /api/v1/sql/execute */
export async function handleSqlExecute(req: NextRequest): Promise<NextResponse> {
  try {
    const body = parseBody(sqlBody, await readJson(req));
    const response: QueryResponse = await getQueryService().pipeline.runSql({ ...body, requestIp: clientIp(req) });
    return NextResponse.json(response);
  } catch (error) {
    return errorResponse(error);
  }
}
