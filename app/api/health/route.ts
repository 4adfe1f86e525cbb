import { handleHealth } from '../../../src/server/routes/health';

export async function GET() {
  return handleHealth();
}
