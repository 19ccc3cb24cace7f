import { Pool } from 'pg';
import type { PoolConfig } from 'pg';
import type { ForecastGateway } from './gateway';
import { assertDistinctColumn } from './gateway';
import { extractColumn, normalizeAll, normalizeForecastRow, normalizeProductQuantity } from './normalize';
import { distinctValues } from '@/lib/aggregation';
import { DataSourceError } from '@/lib/errors';
import { logger } from '@/lib/logger';
import type { SqlSourceConfig } from '@/lib/config';
import type { DistinctColumn, ForecastFilter, ForecastRow, ProductQuantity } from '@/types/forecast';

/**
 * The slice of pg's Pool the gateway relies on. `Pool#query` checks a client
 * out and returns it to the pool whether the query succeeds or fails.
 */
export interface SqlClient {
  query(text: string, values?: unknown[]): Promise<{ rows: unknown[] }>;
}

export function createPool(config: SqlSourceConfig): Pool {
  const poolConfig: PoolConfig = {
    host: config.host,
    port: config.port,
    database: config.database,
    user: config.user,
    password: config.password,
    ssl: config.ssl,
    max: 10,
    idleTimeoutMillis: 30_000,
    connectionTimeoutMillis: config.timeoutMs,
    statement_timeout: config.timeoutMs,
  };
  const pool = new Pool(poolConfig);

  // pg emits errors for idle clients; unhandled they crash the process
  pool.on('error', (err) => {
    logger.error('Idle database client error', err, { host: config.host, database: config.database });
  });

  return pool;
}

export class SqlForecastGateway implements ForecastGateway {
  readonly source = 'sql' as const;
  private readonly table: string;

  constructor(
    private readonly client: SqlClient,
    table: string,
  ) {
    if (!/^[A-Za-z_][A-Za-z0-9_]*$/.test(table)) {
      throw new DataSourceError(`Invalid table name: ${table}`, this.source);
    }
    this.table = `"${table}"`;
  }

  async fetchRows(filter: ForecastFilter): Promise<ForecastRow[]> {
    const values: unknown[] = [filter.store_id, filter.product_id];
    const conditions = ['store_id = $1', 'product_id = $2'];
    if (filter.start_date) {
      values.push(filter.start_date);
      conditions.push(`forecast_date >= $${values.length}`);
    }
    if (filter.end_date) {
      values.push(filter.end_date);
      conditions.push(`forecast_date <= $${values.length}`);
    }

    const rows = await this.run(
      `SELECT store_id, product_id, to_char(forecast_date, 'YYYY-MM-DD') AS forecast_date, forecast_qty, model
       FROM ${this.table}
       WHERE ${conditions.join(' AND ')}
       ORDER BY forecast_date ASC, model ASC`,
      values,
    );
    return normalizeAll(rows, this.source, normalizeForecastRow);
  }

  async fetchDistinct(column: DistinctColumn): Promise<string[]> {
    const checked = assertDistinctColumn(column, this.source);
    const rows = await this.run(
      `SELECT DISTINCT ${checked} FROM ${this.table} WHERE ${checked} IS NOT NULL`,
    );
    const values = normalizeAll(rows, this.source, (raw, source) => extractColumn(raw, checked, source));
    return distinctValues(values.filter((v): v is string => v !== null));
  }

  async fetchProductQuantities(): Promise<ProductQuantity[]> {
    const rows = await this.run(`SELECT product_id, forecast_qty FROM ${this.table}`);
    return normalizeAll(rows, this.source, normalizeProductQuantity);
  }

  async ping(): Promise<void> {
    await this.run('SELECT 1');
  }

  private async run(text: string, values: unknown[] = []): Promise<unknown[]> {
    try {
      const result = await this.client.query(text, values);
      return result.rows;
    } catch (error) {
      throw new DataSourceError('Database query failed', this.source, { cause: error });
    }
  }
}
