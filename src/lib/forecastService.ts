import type { ForecastGateway } from '@/db/gateway';
import {
  buildHistory,
  computeStats,
  criticalSkus,
  latestEntry,
  topSkus,
} from './aggregation';
import { APP_CONFIG } from './config';
import { exportFilename, toCsv } from './csvExport';
import { NotFoundError } from './errors';
import type {
  CsvExport,
  DashboardOptions,
  ExportEmptyPolicy,
  ExportQuery,
  ForecastFilter,
  ForecastReport,
} from '@/types/forecast';

export async function getDashboardOptions(gateway: ForecastGateway): Promise<DashboardOptions> {
  const [stores, skus] = await Promise.all([
    gateway.fetchDistinct('store_id'),
    gateway.fetchDistinct('product_id'),
  ]);
  return { stores, skus };
}

/**
 * Series, latest entry and stats for the filtered pair. The top and critical
 * lists always describe the whole table, whatever the filter.
 */
export async function getForecastReport(
  gateway: ForecastGateway,
  query: ForecastFilter,
): Promise<ForecastReport> {
  const rows = await gateway.fetchRows(query);
  if (rows.length === 0) throw new NotFoundError('No forecast found');

  const latest = latestEntry(rows);
  const stats = computeStats(rows);
  const everything = await gateway.fetchProductQuantities();

  return {
    latest: {
      forecast_qty: latest.forecast_qty,
      forecast_date: latest.forecast_date,
      model: latest.model,
    },
    history: buildHistory(rows),
    stats,
    top_skus: topSkus(everything, APP_CONFIG.topSkuLimit),
    critical_skus: criticalSkus(everything, APP_CONFIG.criticalThreshold),
  };
}

export async function exportForecastCsv(
  gateway: ForecastGateway,
  query: ExportQuery,
  emptyPolicy: ExportEmptyPolicy = APP_CONFIG.exportEmptyPolicy,
): Promise<CsvExport> {
  const rows = await gateway.fetchRows({ store_id: query.store_id, product_id: query.product_id });
  if (rows.length === 0 && emptyPolicy === 'reject') {
    throw new NotFoundError('No data to export');
  }
  return {
    filename: exportFilename(query.store_id, query.product_id),
    body: toCsv(rows),
  };
}
