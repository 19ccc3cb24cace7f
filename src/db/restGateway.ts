/**
 * PostgREST-backed gateway (the data API Supabase exposes over a table).
 *
 * Every call is a single GET bounded by an AbortController timeout. There is
 * no retry: a failure is reported to the caller straight away.
 */
import type { ForecastGateway } from './gateway';
import { assertDistinctColumn, FORECAST_COLUMNS } from './gateway';
import { extractColumn, normalizeAll, normalizeForecastRow, normalizeProductQuantity } from './normalize';
import { distinctValues } from '@/lib/aggregation';
import { DataSourceError } from '@/lib/errors';
import type { RestSourceConfig } from '@/lib/config';
import type { DistinctColumn, ForecastFilter, ForecastRow, ProductQuantity } from '@/types/forecast';

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export class RestForecastGateway implements ForecastGateway {
  readonly source = 'rest' as const;
  private readonly headers: Record<string, string>;
  private readonly endpoint: string;

  constructor(
    private readonly config: Omit<RestSourceConfig, 'kind'>,
    private readonly fetchImpl: FetchLike = fetch,
  ) {
    this.endpoint = `${config.baseUrl}/rest/v1/${config.table}`;
    this.headers = {
      apikey: config.apiKey,
      Authorization: `Bearer ${config.apiKey}`,
      Accept: 'application/json',
    };
  }

  async fetchRows(filter: ForecastFilter): Promise<ForecastRow[]> {
    const params = new URLSearchParams();
    params.set('select', FORECAST_COLUMNS.join(','));
    params.append('store_id', `eq.${filter.store_id}`);
    params.append('product_id', `eq.${filter.product_id}`);
    if (filter.start_date) params.append('forecast_date', `gte.${filter.start_date}`);
    if (filter.end_date) params.append('forecast_date', `lte.${filter.end_date}`);
    params.set('order', 'forecast_date.asc,model.asc');

    const payload = await this.getAll(params);
    return normalizeAll(payload, this.source, normalizeForecastRow);
  }

  async fetchDistinct(column: DistinctColumn): Promise<string[]> {
    const checked = assertDistinctColumn(column, this.source);
    const params = new URLSearchParams({ select: checked });
    params.append(checked, 'not.is.null');

    const payload = await this.getAll(params);
    const values = normalizeAll(payload, this.source, (raw, source) => extractColumn(raw, checked, source));
    return distinctValues(values.filter((v): v is string => v !== null));
  }

  async fetchProductQuantities(): Promise<ProductQuantity[]> {
    const payload = await this.getAll(new URLSearchParams({ select: 'product_id,forecast_qty' }));
    return normalizeAll(payload, this.source, normalizeProductQuantity);
  }

  async ping(): Promise<void> {
    const { payload } = await this.get(new URLSearchParams({ select: 'store_id', limit: '1' }));
    if (!Array.isArray(payload)) {
      throw new DataSourceError('Malformed forecast payload: expected an array of rows', this.source);
    }
  }

  /**
   * Reads a whole result set. A response shorter than the exact count in
   * Content-Range was cut by the server's max-rows cap and is an error.
   */
  private async getAll(params: URLSearchParams): Promise<unknown> {
    const { payload, contentRange } = await this.get(params, { Prefer: 'count=exact' });
    const total = totalFromContentRange(contentRange);
    if (Array.isArray(payload) && total !== null && payload.length < total) {
      throw new DataSourceError(
        `Data API returned ${payload.length} of ${total} rows; raise its max-rows limit`,
        this.source,
      );
    }
    return payload;
  }

  private async get(
    params: URLSearchParams,
    extraHeaders: Record<string, string> = {},
  ): Promise<{ payload: unknown; contentRange: string | null }> {
    const url = `${this.endpoint}?${params.toString()}`;
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      const response = await this.fetchImpl(url, {
        method: 'GET',
        headers: { ...this.headers, ...extraHeaders },
        signal: controller.signal,
      });
      if (!response.ok) {
        throw new DataSourceError(`Data API responded with status ${response.status}`, this.source);
      }
      try {
        return { payload: await response.json(), contentRange: response.headers.get('content-range') };
      } catch (error) {
        throw new DataSourceError('Malformed forecast payload: response is not JSON', this.source, {
          cause: error,
        });
      }
    } catch (error) {
      if (error instanceof DataSourceError) throw error;
      if (controller.signal.aborted) {
        throw new DataSourceError(
          `Data API request timed out after ${this.config.timeoutMs}ms`,
          this.source,
          { cause: error },
        );
      }
      throw new DataSourceError('Data API request failed', this.source, { cause: error });
    } finally {
      clearTimeout(timeout);
    }
  }
}

// "0-999/5000", "*/0" or, without an exact count, "0-999/*"
function totalFromContentRange(header: string | null): number | null {
  const match = header ? /\/(\d+)$/.exec(header.trim()) : null;
  return match ? Number(match[1]) : null;
}
