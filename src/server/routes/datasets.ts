import { NextResponse } from 'next/server';

import { getQueryService } from '../service';
import { errorResponse } from './respond';

/** GET /api/v1/datasets: the catalog as clients may query it. */
export async function handleDatasets(): Promise<NextResponse> {
  try {
    const { catalog } = getQueryService();
    const datasets = catalog.datasetNames().flatMap((name) => {
      const spec = catalog.describe(name);
      if (!spec) return [];
      return [
        {
          name: spec.name,
          schema: spec.schema,
          description: spec.description,
          tables: Array.from(spec.tables.values()).map((table) => ({
            name: table.name,
            description: table.description,
            columns: table.columns.map((column) => ({ name: column.name, type: column.type })),
          })),
        },
      ];
    });

    return NextResponse.json({ datasets });
  } catch (error) {
    return errorResponse(error);
  }
}
