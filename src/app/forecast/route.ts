import { NextResponse } from 'next/server';
import type { NextRequest } from 'next/server';
import getGateway from '@/db/index';
import { getForecastReport } from '@/lib/forecastService';
import { handleRoute, readParams } from '@/lib/http';
import { parseForecastQuery } from '@/lib/validation';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

// POST /forecast — series, stats and whole-table rankings for one store/product
export async function POST(request: NextRequest) {
  return handleRoute('POST', '/forecast', async (log) => {
    const query = parseForecastQuery(await readParams(request));
    const report = await getForecastReport(getGateway(), query);
    log.debug('Forecast report built', { points: report.history.length });
    return NextResponse.json(report);
  });
}
