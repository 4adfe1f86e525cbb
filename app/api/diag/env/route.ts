import { handleDiagEnv } from '../../../../src/server/routes/diag';

export async function GET() {
  return handleDiagEnv();
}
