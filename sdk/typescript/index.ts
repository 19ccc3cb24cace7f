/**
 * Forecast Dashboard TypeScript SDK
 *
 * Typed client for the dashboard's HTTP surface: selection options, forecast
 * reports, CSV export and health.
 */

export interface SDKConfig {
  baseURL: string;
  timeout?: number;
  fetch?: (input: string, init?: RequestInit) => Promise<Response>;
}

export type ForecastQuery = {
  store_id: string;
  product_id: string;
  start_date?: string;
  end_date?: string;
};

export type ExportParams = Pick<ForecastQuery, 'store_id' | 'product_id'>;

export interface DashboardOptions {
  stores: string[];
  skus: string[];
}

export interface ForecastReport {
  latest: { forecast_qty: number; forecast_date: string; model: string };
  history: { date: string; qty: number; model: string }[];
  stats: { avg: number; max: number; min: number };
  top_skus: { product_id: string; total_forecast: number }[];
  critical_skus: { product_id: string; min_qty: number }[];
}

export interface HealthReport {
  status: 'healthy' | 'unhealthy';
  timestamp: string;
  uptime: number;
  source: string | null;
}

export interface CsvFile {
  filename: string;
  content: string;
}

export interface APIResponse<T> {
  success: boolean;
  status: number;
  data?: T;
  error?: {
    message: string;
  };
  requestId?: string;
}

export class ForecastDashboardClient {
  private readonly baseURL: string;
  private readonly timeout: number;
  private readonly fetchImpl: (input: string, init?: RequestInit) => Promise<Response>;

  constructor(config: SDKConfig) {
    this.baseURL = config.baseURL.replace(/\/+$/, '');
    this.timeout = config.timeout || 30000;
    this.fetchImpl = config.fetch || fetch;
  }

  /**
   * Distinct store and product ids
   */
  async getOptions(): Promise<APIResponse<DashboardOptions>> {
    return this.request<DashboardOptions>('GET', '/', undefined, (response) => response.json());
  }

  /**
   * Forecast series, stats and whole-table rankings for one store/product
   */
  async getForecast(query: ForecastQuery): Promise<APIResponse<ForecastReport>> {
    return this.request<ForecastReport>('POST', '/forecast', query, (response) => response.json());
  }

  /**
   * Full series as CSV
   */
  async exportCsv(params: ExportParams): Promise<APIResponse<CsvFile>> {
    return this.request('POST', '/export', params, async (response) => {
      const fallback = `forecast_${params.store_id}_${params.product_id}.csv`;
      return {
        filename: parseFilename(response.headers.get('content-disposition')) ?? fallback,
        content: await response.text(),
      };
    });
  }

  async getHealth(): Promise<APIResponse<HealthReport>> {
    return this.request<HealthReport>('GET', '/api/health', undefined, (response) => response.json());
  }

  private async request<T>(
    method: 'GET' | 'POST',
    path: string,
    form: Record<string, string | undefined> | undefined,
    read: (response: Response) => Promise<T>,
  ): Promise<APIResponse<T>> {
    const body = form ? encodeForm(form) : undefined;
    const headers: Record<string, string> = { Accept: 'application/json, text/csv' };
    if (body) headers['Content-Type'] = 'application/x-www-form-urlencoded';

    let response: Response;
    try {
      response = await this.fetchWithTimeout(`${this.baseURL}${path}`, { method, headers, body });
    } catch (error) {
      return {
        success: false,
        status: 0,
        error: { message: error instanceof Error ? error.message : 'Request failed' },
      };
    }

    const requestId = response.headers.get('x-request-id') ?? undefined;

    if (!response.ok) {
      return {
        success: false,
        status: response.status,
        error: { message: await readErrorMessage(response) },
        requestId,
      };
    }

    return { success: true, status: response.status, data: await read(response), requestId };
  }

  /**
   * Fetch with timeout
   */
  private async fetchWithTimeout(url: string, options: RequestInit): Promise<Response> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.timeout);

    try {
      return await this.fetchImpl(url, {
        ...options,
        signal: controller.signal,
      });
    } finally {
      clearTimeout(timeout);
    }
  }
}

function encodeForm(form: Record<string, string | undefined>): string {
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(form)) {
    if (value !== undefined && value !== '') params.append(key, value);
  }
  return params.toString();
}

function parseJson(text: string): unknown {
  try {
    return JSON.parse(text);
  } catch {
    return undefined;
  }
}

async function readErrorMessage(response: Response): Promise<string> {
  const text = await response.text();
  const parsed = parseJson(text);
  if (typeof parsed === 'object' && parsed !== null && 'error' in parsed && typeof parsed.error === 'string') {
    return parsed.error;
  }
  return text || response.statusText;
}

function parseFilename(disposition: string | null): string | null {
  if (!disposition) return null;
  const match = /filename="([^"]+)"/.exec(disposition);
  return match ? match[1] : null;
}

export default ForecastDashboardClient;
