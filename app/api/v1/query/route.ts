import { NextRequest } from 'next/server';
import { handleQuery } from '../../../../src/server/routes/query';

export async function POST(request: NextRequest) {
  return handleQuery(request);
}
