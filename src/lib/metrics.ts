import { APP_CONFIG } from './config';

interface LatencySample {
  durationMs: number;
  timestamp: number;
}

interface EndpointMetrics {
  samples: LatencySample[];
  requestCount: number;
  errorCount: number;
}

export interface EndpointSnapshot {
  endpoint: string;
  method: string;
  p50Ms: number;
  p95Ms: number;
  p99Ms: number;
  requestCount: number;
  errorCount: number;
  errorRate: number;
}

export class MetricsCollector {
  private store = new Map<string, EndpointMetrics>();
  private readonly windowMs: number;

  // Eviction runs on record/snapshot; a timer would keep the process alive.
  constructor(windowMs = 60_000) {
    this.windowMs = windowMs;
  }

  private key(method: string, endpoint: string): string {
    return `${method.toUpperCase()}:${endpoint}`;
  }

  private evict(now: number): void {
    const cutoff = now - this.windowMs;
    for (const metrics of this.store.values()) {
      metrics.samples = metrics.samples.filter((s) => s.timestamp > cutoff);
    }
  }

  record(method: string, endpoint: string, durationMs: number, isError: boolean): void {
    const now = Date.now();
    this.evict(now);
    const k = this.key(method, endpoint);
    let m = this.store.get(k);
    if (!m) {
      m = { samples: [], requestCount: 0, errorCount: 0 };
      this.store.set(k, m);
    }
    m.samples.push({ durationMs, timestamp: now });
    m.requestCount++;
    if (isError) m.errorCount++;
  }

  percentile(samples: number[], p: number): number {
    if (samples.length === 0) return 0;
    const sorted = [...samples].sort((a, b) => a - b);
    const idx = Math.ceil((p / 100) * sorted.length) - 1;
    return sorted[Math.max(0, idx)];
  }

  getSnapshot(): EndpointSnapshot[] {
    this.evict(Date.now());
    const results: EndpointSnapshot[] = [];
    for (const [k, m] of this.store) {
      const [method, ...endpointParts] = k.split(':');
      const endpoint = endpointParts.join(':');
      const durations = m.samples.map((s) => s.durationMs);
      results.push({
        endpoint,
        method,
        p50Ms: this.percentile(durations, 50),
        p95Ms: this.percentile(durations, 95),
        p99Ms: this.percentile(durations, 99),
        requestCount: m.requestCount,
        errorCount: m.errorCount,
        errorRate:
          m.requestCount > 0
            ? parseFloat(((m.errorCount / m.requestCount) * 100).toFixed(2))
            : 0,
      });
    }
    return results.sort((a, b) => b.requestCount - a.requestCount);
  }

  reset(): void {
    this.store.clear();
  }
}

const GLOBAL_METRICS_KEY = '__forecastMetrics__';

function getMetrics(): MetricsCollector {
  const g = globalThis as unknown as Record<string, MetricsCollector | undefined>;
  const existing = g[GLOBAL_METRICS_KEY];
  if (existing) return existing;
  const created = new MetricsCollector(APP_CONFIG.metricsWindowMs);
  g[GLOBAL_METRICS_KEY] = created;
  return created;
}

export const metrics = getMetrics();

export { getMetrics };
