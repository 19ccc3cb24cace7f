import Papa from 'papaparse';
import type { ForecastRow } from '@/types/forecast';

export const CSV_COLUMNS = [
  'forecast_date',
  'store_id',
  'product_id',
  'forecast_qty',
  'model',
] as const satisfies readonly (keyof ForecastRow)[];

const encoder = new TextEncoder();

/**
 * Serialize rows as UTF-8 CSV with a fixed header. Fields are quoted only
 * when they contain the delimiter, a quote, a line break or edge spaces.
 * Empty input produces the header line alone.
 */
export function toCsv(rows: readonly ForecastRow[]): Uint8Array<ArrayBuffer> {
  const lines: (string | number)[][] = [
    [...CSV_COLUMNS],
    ...rows.map((row) => CSV_COLUMNS.map((column) => row[column])),
  ];
  const csv = Papa.unparse(lines, { newline: '\r\n' });
  return encoder.encode(csv);
}

export function exportFilename(storeId: string, productId: string): string {
  const safe = (value: string) => value.replace(/[^A-Za-z0-9._-]/g, '_');
  return `forecast_${safe(storeId)}_${safe(productId)}.csv`;
}
