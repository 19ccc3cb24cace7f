import { NextResponse } from 'next/server';
import { metrics } from '@/lib/metrics';

export const dynamic = 'force-dynamic';

// GET /api/metrics — request counts and latency percentiles per endpoint
export async function GET() {
  return NextResponse.json({
    endpoints: metrics.getSnapshot(),
    generatedAt: new Date().toISOString(),
  });
}
