/**
 * Shared response plumbing for the route handlers.
 */

import { NextRequest, NextResponse } from 'next/server';

import type { ErrorResponse } from '../../shared/types';
import { InvalidRequestError, QueryServiceError, ValidationRejectedError, errorMessage } from '../errors';

/**
 * Map a thrown error to its HTTP status and error envelope.
 * Anything that is not a `QueryServiceError` is a 500 with a generic message.
 */
export function errorResponse(error: unknown): NextResponse {
  if (error instanceof QueryServiceError) {
    return NextResponse.json<ErrorResponse>(
      {
        ok: false,
        error: {
          code: error.code,
          message: error.message,
          ...(error instanceof ValidationRejectedError && error.column ? { column: error.column } : {}),
        },
      },
      { status: error.httpStatus },
    );
  }

  // Don't leak internal errors to client
  console.error('[routes] Unhandled error:', errorMessage(error));
  return NextResponse.json<ErrorResponse>(
    { ok: false, error: { code: 'INTERNAL_ERROR', message: 'Internal server error' } },
    { status: 500 },
  );
}

export async function readJson(req: NextRequest): Promise<unknown> {
  try {
    return await req.json();
  } catch {
    throw new InvalidRequestError('Request body must be valid JSON');
  }
}

/** First hop of X-Forwarded-For, else X-Real-IP. */
export function clientIp(req: NextRequest): string | undefined {
  const forwarded = req.headers.get('x-forwarded-for')?.split(',')[0]?.trim();
  return forwarded || req.headers.get('x-real-ip') || undefined;
}
