import { NextRequest, NextResponse } from 'next/server';

import { AUDIT_LIST_DEFAULT_LIMIT, AUDIT_LIST_MAX_LIMIT } from '../../shared/constants';
import { AuditUnavailableError, InvalidRequestError } from '../errors';
import { getQueryService } from '../service';
import { errorResponse } from './respond';

function parseLimit(raw: string | null): number {
  if (raw === null) return AUDIT_LIST_DEFAULT_LIMIT;
  const limit = parseInt(raw, 10);
  if (!/^\d+$/.test(raw) || limit < 1 || limit > AUDIT_LIST_MAX_LIMIT) {
    throw new InvalidRequestError(`limit must be an integer between 1 and ${AUDIT_LIST_MAX_LIMIT}`);
  }
  return limit;
}

/** GET /api/diag/audit?limit=N: the newest audit entries, newest first. */
export async function handleAuditList(req: NextRequest): Promise<NextResponse> {
  try {
    const limit = parseLimit(req.nextUrl.searchParams.get('limit'));
    const { auditLog } = getQueryService();
    if (!auditLog) {
      throw new AuditUnavailableError('Audit entries are only printed (AUDIT_SINK=console)');
    }

    const rows = await auditLog.recent(limit);
    return NextResponse.json({ ok: true, count: rows.length, rows });
  } catch (error) {
    return errorResponse(error);
  }
}
