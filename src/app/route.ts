import { NextResponse } from 'next/server';
import getGateway from '@/db/index';
import { getDashboardOptions } from '@/lib/forecastService';
import { handleRoute } from '@/lib/http';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

// GET / — distinct stores and products for the selection inputs
export async function GET() {
  return handleRoute('GET', '/', async () => {
    const options = await getDashboardOptions(getGateway());
    return NextResponse.json(options);
  });
}
