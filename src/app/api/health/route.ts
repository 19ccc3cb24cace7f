import { NextResponse } from 'next/server';
import getGateway from '@/db/index';
import { logger } from '@/lib/logger';

export const runtime = 'nodejs';
export const dynamic = 'force-dynamic';

interface HealthStatus {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  source: string | null;
  checks: Record<string, { status: 'ok' | 'fail'; latencyMs?: number; detail?: string }>;
}

const SERVER_START = Date.now();

export async function GET() {
  const checks: HealthStatus['checks'] = {};
  let source: string | null = null;

  // Check: backing store round trip
  const start = Date.now();
  try {
    const gateway = getGateway();
    source = gateway.source;
    await gateway.ping();
    checks.dataSource = { status: 'ok', latencyMs: Date.now() - start };
  } catch (e) {
    logger.warn('Health check failed', { detail: e instanceof Error ? e.message : String(e) });
    checks.dataSource = {
      status: 'fail',
      latencyMs: Date.now() - start,
      detail: e instanceof Error ? e.name : 'Unknown error',
    };
  }

  const healthy = checks.dataSource.status === 'ok';
  const body: HealthStatus = {
    status: healthy ? 'healthy' : 'unhealthy',
    timestamp: new Date().toISOString(),
    uptime: Math.floor((Date.now() - SERVER_START) / 1000),
    source,
    checks,
  };

  return NextResponse.json(body, { status: healthy ? 200 : 503 });
}
