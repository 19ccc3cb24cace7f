import { DataSourceError } from '@/lib/errors';
import type { DataSourceKind, DistinctColumn, ForecastRow, ProductQuantity } from '@/types/forecast';

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function malformed(source: DataSourceKind, detail: string): DataSourceError {
  return new DataSourceError(`Malformed forecast payload: ${detail}`, source);
}

function toIdentifier(value: unknown, field: string, source: DataSourceKind): string {
  if (typeof value === 'string' && value.length > 0) return value;
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  throw malformed(source, `${field} must be a non-empty string`);
}

function toQuantity(value: unknown, source: DataSourceKind): number {
  // bigint/numeric columns arrive as digit strings from pg
  const parsed = typeof value === 'string' && /^\d+$/.test(value) ? Number(value) : value;
  if (typeof parsed === 'number' && Number.isSafeInteger(parsed) && parsed >= 0) return parsed;
  throw malformed(source, 'forecast_qty must be a non-negative integer');
}

function toCalendarDate(value: unknown, source: DataSourceKind): string {
  if (typeof value === 'string' && /^\d{4}-\d{2}-\d{2}(?:$|[T ])/.test(value)) {
    return value.slice(0, 10);
  }
  throw malformed(source, 'forecast_date must be an ISO date');
}

export function normalizeForecastRow(raw: unknown, source: DataSourceKind): ForecastRow {
  if (!isRecord(raw)) throw malformed(source, 'row is not an object');
  const model = raw.model;
  if (typeof model !== 'string') throw malformed(source, 'model must be a string');

  return Object.freeze({
    store_id: toIdentifier(raw.store_id, 'store_id', source),
    product_id: toIdentifier(raw.product_id, 'product_id', source),
    forecast_date: toCalendarDate(raw.forecast_date, source),
    forecast_qty: toQuantity(raw.forecast_qty, source),
    model,
  });
}

export function normalizeProductQuantity(raw: unknown, source: DataSourceKind): ProductQuantity {
  if (!isRecord(raw)) throw malformed(source, 'row is not an object');
  return Object.freeze({
    product_id: toIdentifier(raw.product_id, 'product_id', source),
    forecast_qty: toQuantity(raw.forecast_qty, source),
  });
}

/** Null values are skipped; anything else that is not an identifier is malformed. */
export function extractColumn(raw: unknown, column: DistinctColumn, source: DataSourceKind): string | null {
  if (!isRecord(raw)) throw malformed(source, 'row is not an object');
  const value = raw[column];
  if (value === null || value === undefined) return null;
  return toIdentifier(value, column, source);
}

/**
 * Validates a whole result set before handing any of it out, so a bad row
 * anywhere fails the request instead of truncating it.
 */
export function normalizeAll<T>(
  payload: unknown,
  source: DataSourceKind,
  normalize: (raw: unknown, source: DataSourceKind) => T,
): T[] {
  if (!Array.isArray(payload)) throw malformed(source, 'expected an array of rows');
  return payload.map((raw) => normalize(raw, source));
}
