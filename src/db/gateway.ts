import type {
  DataSourceKind,
  DistinctColumn,
  ForecastFilter,
  ForecastRow,
  ProductQuantity,
} from '@/types/forecast';
import { DISTINCT_COLUMNS } from '@/types/forecast';
import { DataSourceError } from '@/lib/errors';

/**
 * Read access to the forecasts table. Implementations normalize every record
 * into a ForecastRow and report any failure as a DataSourceError.
 */
export interface ForecastGateway {
  readonly source: DataSourceKind;

  /** Rows for one store/product pair, ordered by forecast_date then model. */
  fetchRows(filter: ForecastFilter): Promise<ForecastRow[]>;

  /** Distinct non-null values of a column, sorted ascending. */
  fetchDistinct(column: DistinctColumn): Promise<string[]>;

  /** Product and quantity of every row in the table, unfiltered. */
  fetchProductQuantities(): Promise<ProductQuantity[]>;

  ping(): Promise<void>;
}

export function assertDistinctColumn(column: string, source: DataSourceKind): DistinctColumn {
  const match = DISTINCT_COLUMNS.find((c) => c === column);
  if (!match) {
    throw new DataSourceError(`Column ${column} is not available for distinct lookups`, source);
  }
  return match;
}

export const FORECAST_COLUMNS = ['store_id', 'product_id', 'forecast_date', 'forecast_qty', 'model'] as const;
