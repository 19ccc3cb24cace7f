export type DataSourceKind = 'rest' | 'sql';

export type DistinctColumn = 'store_id' | 'product_id';

export const DISTINCT_COLUMNS: readonly DistinctColumn[] = ['store_id', 'product_id'];

export interface ForecastRow {
  readonly store_id: string;
  readonly product_id: string;
  readonly forecast_date: string; // YYYY-MM-DD
  readonly forecast_qty: number;
  readonly model: string;
}

export type ProductQuantity = Pick<ForecastRow, 'product_id' | 'forecast_qty'>;

export interface ForecastFilter {
  store_id: string;
  product_id: string;
  start_date?: string;
  end_date?: string;
}

export type ExportQuery = Pick<ForecastFilter, 'store_id' | 'product_id'>;

export type ExportEmptyPolicy = 'reject' | 'header-only';

export type Stats = { avg: number; max: number; min: number };
export type TopSku = { product_id: string; total_forecast: number };
export type CriticalSku = { product_id: string; min_qty: number };
export type HistoryPoint = { date: string; qty: number; model: string };
export type LatestForecast = { forecast_qty: number; forecast_date: string; model: string };

export interface ForecastReport {
  latest: LatestForecast;
  history: HistoryPoint[];
  stats: Stats;
  top_skus: TopSku[];
  critical_skus: CriticalSku[];
}

export interface DashboardOptions {
  stores: string[];
  skus: string[];
}

export interface CsvExport {
  filename: string;
  body: Uint8Array<ArrayBuffer>;
}

export interface DemoProfile {
  name: string;
  email: string;
  role: string;
  joined: string;
}
