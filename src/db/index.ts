import type { ForecastGateway } from './gateway';
import { RestForecastGateway } from './restGateway';
import type { FetchLike } from './restGateway';
import { createPool, SqlForecastGateway } from './sqlGateway';
import { loadDataSourceConfig } from '@/lib/config';
import type { DataSourceConfig } from '@/lib/config';
import { logger } from '@/lib/logger';

export type { ForecastGateway } from './gateway';

export function createForecastGateway(
  config: DataSourceConfig,
  options: { fetchImpl?: FetchLike } = {},
): ForecastGateway {
  if (config.kind === 'rest') {
    return new RestForecastGateway(
      { baseUrl: config.baseUrl, apiKey: config.apiKey, table: config.table, timeoutMs: config.timeoutMs },
      options.fetchImpl,
    );
  }
  return new SqlForecastGateway(createPool(config), config.table);
}

const GLOBAL_GATEWAY_KEY = '__forecastGateway__';

/**
 * Process-wide gateway, built from the environment on first use and kept on
 * globalThis so dev-server reloads reuse the same pg pool.
 */
export default function getGateway(): ForecastGateway {
  const g = globalThis as unknown as Record<string, ForecastGateway | undefined>;
  const existing = g[GLOBAL_GATEWAY_KEY];
  if (existing) return existing;

  const config = loadDataSourceConfig(process.env);
  const gateway = createForecastGateway(config);
  logger.info('Forecast gateway initialised', { source: gateway.source });
  g[GLOBAL_GATEWAY_KEY] = gateway;
  return gateway;
}
