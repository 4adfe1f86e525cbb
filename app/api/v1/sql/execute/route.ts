import { NextRequest } from 'next/server';
import { handleSqlExecute } from '../../../../../src/server/routes/query';

export async function POST(request: NextRequest) {
  return handleSqlExecute(request);
}
