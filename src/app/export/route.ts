import { NextResponse } from 'next/server';
import type { NextRequest } from 'next/server';
import getGateway from '@/db/index';
import { exportForecastCsv } from '@/lib/forecastService';
import { handleRoute, readParams } from '@/lib/http';
import { parseExportQuery } from '@/lib/validation';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

// POST /export — full series for one store/product as a CSV attachment
export async function POST(request: NextRequest) {
  return handleRoute('POST', '/export', async () => {
    const query = parseExportQuery(await readParams(request));
    const { filename, body } = await exportForecastCsv(getGateway(), query);
    return new NextResponse(body, {
      status: 200,
      headers: {
        'Content-Type': 'text/csv; charset=utf-8',
        'Content-Disposition': `attachment; filename="${filename}"`,
        'Cache-Control': 'no-store',
      },
    });
  });
}
