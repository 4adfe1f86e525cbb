import { NextResponse } from 'next/server';

import { errorMessage } from '../errors';
import { getQueryService } from '../service';

/** GET /api/health */
export async function handleHealth(): Promise<NextResponse> {
  let ok = false;
  try {
    ok = await getQueryService().healthCheck();
  } catch (error) {
    console.error('[health] Service failed to start:', errorMessage(error));
  }

  if (ok) {
    return NextResponse.json({ status: 'ok' }, { status: 200 });
  }

  return NextResponse.json({ status: 'error', message: 'Database unavailable' }, { status: 503 });
}
