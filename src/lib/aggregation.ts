/**
 * Aggregations over fetched forecast rows. Everything here is pure: inputs
 * are never mutated and every result is a fresh structure.
 */
import { EmptyInputError } from './errors';
import type {
  CriticalSku,
  ForecastRow,
  HistoryPoint,
  ProductQuantity,
  Stats,
  TopSku,
} from '@/types/forecast';

export const DEFAULT_TOP_LIMIT = 10;
export const DEFAULT_CRITICAL_THRESHOLD = 5;

function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

function shiftDecimal(value: number, places: number): number {
  const [mantissa, exponent = '0'] = String(value).split('e');
  return Number(`${mantissa}e${Number(exponent) + places}`);
}

/**
 * Round half up at the given number of decimals. Shifting through the
 * decimal exponent avoids binary artefacts such as 1.005 * 100 = 100.49999.
 */
export function roundHalfUp(value: number, decimals = 2): number {
  return shiftDecimal(Math.round(shiftDecimal(value, decimals)), -decimals);
}

export function computeStats(rows: readonly Pick<ForecastRow, 'forecast_qty'>[]): Stats {
  if (rows.length === 0) throw new EmptyInputError('computeStats');

  let sum = 0;
  let max = rows[0].forecast_qty;
  let min = rows[0].forecast_qty;
  for (const row of rows) {
    sum += row.forecast_qty;
    if (row.forecast_qty > max) max = row.forecast_qty;
    if (row.forecast_qty < min) min = row.forecast_qty;
  }

  return { avg: roundHalfUp(sum / rows.length), max, min };
}

/**
 * Greatest forecast_date wins; equal dates fall back to the greatest model
 * name, which matches the last row of the gateways' (date, model) ordering.
 */
export function latestEntry(rows: readonly ForecastRow[]): ForecastRow {
  if (rows.length === 0) throw new EmptyInputError('latestEntry');

  let latest = rows[0];
  for (const row of rows) {
    const byDate = compareText(row.forecast_date, latest.forecast_date);
    if (byDate > 0 || (byDate === 0 && compareText(row.model, latest.model) >= 0)) {
      latest = row;
    }
  }
  return latest;
}

export function buildHistory(rows: readonly ForecastRow[]): HistoryPoint[] {
  return rows.map((r) => ({ date: r.forecast_date, qty: r.forecast_qty, model: r.model }));
}

export function topSkus(
  rows: readonly ProductQuantity[],
  limit: number = DEFAULT_TOP_LIMIT,
): TopSku[] {
  if (limit <= 0) return [];

  const totals = new Map<string, number>();
  for (const row of rows) {
    totals.set(row.product_id, (totals.get(row.product_id) ?? 0) + row.forecast_qty);
  }

  return Array.from(totals.entries())
    .sort((a, b) => b[1] - a[1] || compareText(a[0], b[0]))
    .slice(0, limit)
    .map(([product_id, total_forecast]) => ({ product_id, total_forecast }));
}

export function criticalSkus(
  rows: readonly ProductQuantity[],
  threshold: number = DEFAULT_CRITICAL_THRESHOLD,
): CriticalSku[] {
  const minimums = new Map<string, number>();
  for (const row of rows) {
    const current = minimums.get(row.product_id);
    if (current === undefined || row.forecast_qty < current) {
      minimums.set(row.product_id, row.forecast_qty);
    }
  }

  return Array.from(minimums.entries())
    .filter(([, minQty]) => minQty < threshold)
    .sort((a, b) => compareText(a[0], b[0]))
    .map(([product_id, min_qty]) => ({ product_id, min_qty }));
}

export function distinctValues(values: Iterable<string>): string[] {
  return Array.from(new Set(values)).sort(compareText);
}
