import type { ExportQuery, ForecastFilter } from '@/types/forecast';

export class ValidationError extends Error {
  constructor(
    public readonly field: string,
    message: string,
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/** Read-only view over a request body: FormData, URLSearchParams or a JSON object. */
export interface ParamSource {
  get(name: string): unknown;
}

const REQUIRED_IDS_MESSAGE = 'store_id and product_id are required';

// Blank counts as absent; anything else is passed through untouched, since
// stored ids may carry edge whitespace.
function readString(params: ParamSource, name: string): string | undefined {
  const value = params.get(name);
  if (typeof value === 'number' && Number.isFinite(value)) return String(value);
  if (typeof value !== 'string' || value.trim().length === 0) return undefined;
  return value;
}

function requireIds(params: ParamSource): ExportQuery {
  const storeId = readString(params, 'store_id');
  const productId = readString(params, 'product_id');
  if (!storeId) throw new ValidationError('store_id', REQUIRED_IDS_MESSAGE);
  if (!productId) throw new ValidationError('product_id', REQUIRED_IDS_MESSAGE);
  return { store_id: storeId, product_id: productId };
}

/**
 * Accepts only real calendar days in YYYY-MM-DD form (2024-02-30 is rejected).
 */
export function isIsoDate(value: string): boolean {
  const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(value);
  if (!match) return false;
  const [year, month, day] = [Number(match[1]), Number(match[2]), Number(match[3])];
  const date = new Date(Date.UTC(year, month - 1, day));
  return (
    date.getUTCFullYear() === year &&
    date.getUTCMonth() === month - 1 &&
    date.getUTCDate() === day
  );
}

export function validateOptionalDate(params: ParamSource, field: string): string | undefined {
  const value = readString(params, field)?.trim();
  if (value === undefined) return undefined;
  if (!isIsoDate(value)) {
    throw new ValidationError(field, `${field} must be a date in YYYY-MM-DD format`);
  }
  return value;
}

export function parseForecastQuery(params: ParamSource): ForecastFilter {
  const ids = requireIds(params);
  const startDate = validateOptionalDate(params, 'start_date');
  const endDate = validateOptionalDate(params, 'end_date');

  // ISO dates compare correctly as strings
  if (startDate && endDate && startDate > endDate) {
    throw new ValidationError('start_date', 'start_date must not be after end_date');
  }

  return {
    ...ids,
    ...(startDate ? { start_date: startDate } : {}),
    ...(endDate ? { end_date: endDate } : {}),
  };
}

export function parseExportQuery(params: ParamSource): ExportQuery {
  return requireIds(params);
}
