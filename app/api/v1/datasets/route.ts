import { handleDatasets } from '../../../../src/server/routes/datasets';

export async function GET() {
  return handleDatasets();
}
