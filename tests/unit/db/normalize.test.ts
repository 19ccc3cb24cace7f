import { describe, it, expect } from '@jest/globals';
import {
  extractColumn,
  normalizeAll,
  normalizeForecastRow,
  normalizeProductQuantity,
} from '@/db/normalize';
import { DataSourceError } from '@/lib/errors';

describe('Row normalization', () => {
  it('should produce a frozen row with a calendar date', () => {
    const normalized = normalizeForecastRow(
      {
        store_id: 'S1',
        product_id: 101,
        forecast_date: '2024-03-05T00:00:00+00:00',
        forecast_qty: '12',
        model: 'arima',
        extra: true,
      },
      'rest',
    );

    expect(normalized).toEqual({
      store_id: 'S1',
      product_id: '101',
      forecast_date: '2024-03-05',
      forecast_qty: 12,
      model: 'arima',
    });
    expect(Object.isFrozen(normalized)).toBe(true);
  });

  it('should reject negative and fractional quantities', () => {
    const base = { store_id: 'S1', product_id: 'P1', forecast_date: '2024-03-05', model: 'arima' };
    expect(() => normalizeForecastRow({ ...base, forecast_qty: -1 }, 'sql')).toThrow(
      'Malformed forecast payload: forecast_qty must be a non-negative integer',
    );
    expect(() => normalizeForecastRow({ ...base, forecast_qty: 1.5 }, 'sql')).toThrow(DataSourceError);
  });

  it('should reject missing identifiers and dates', () => {
    expect(() =>
      normalizeForecastRow({ store_id: '', product_id: 'P1', forecast_date: '2024-03-05', forecast_qty: 1, model: 'm' }, 'rest'),
    ).toThrow('Malformed forecast payload: store_id must be a non-empty string');
    expect(() =>
      normalizeForecastRow({ store_id: 'S1', product_id: 'P1', forecast_date: '05/03/2024', forecast_qty: 1, model: 'm' }, 'rest'),
    ).toThrow('Malformed forecast payload: forecast_date must be an ISO date');
  });

  it('should tag errors with the source that produced them', () => {
    try {
      normalizeForecastRow('not a row', 'sql');
      throw new Error('expected a DataSourceError');
    } catch (error) {
      expect(error).toBeInstanceOf(DataSourceError);
      expect(error).toMatchObject({ source: 'sql', message: 'Malformed forecast payload: row is not an object' });
    }
  });

  it('should normalize product quantities', () => {
    expect(normalizeProductQuantity({ product_id: 'P1', forecast_qty: 4 }, 'rest')).toEqual({
      product_id: 'P1',
      forecast_qty: 4,
    });
  });

  it('should skip null column values', () => {
    expect(extractColumn({ store_id: null }, 'store_id', 'rest')).toBeNull();
    expect(extractColumn({ store_id: 7 }, 'store_id', 'rest')).toBe('7');
  });

  it('should fail the whole payload on one bad row', () => {
    const payload = [
      { product_id: 'P1', forecast_qty: 1 },
      { product_id: 'P2', forecast_qty: 'many' },
    ];
    expect(() => normalizeAll(payload, 'rest', normalizeProductQuantity)).toThrow(
      'Malformed forecast payload: forecast_qty must be a non-negative integer',
    );
    expect(() => normalizeAll({ rows: [] }, 'rest', normalizeProductQuantity)).toThrow(
      'Malformed forecast payload: expected an array of rows',
    );
  });
});
