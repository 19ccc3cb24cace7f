import { describe, it, expect, jest } from '@jest/globals';
import { RestForecastGateway } from '@/db/restGateway';
import type { FetchLike } from '@/db/restGateway';
import { DataSourceError } from '@/lib/errors';

const CONFIG = {
  baseUrl: 'http://data-api.test',
  apiKey: 'test-api-key',
  table: 'forecasts',
  timeoutMs: 50,
};

function jsonResponse(body: unknown, status = 200, headers: Record<string, string> = {}): Response {
  return new Response(JSON.stringify(body), {
    status,
    headers: { 'Content-Type': 'application/json', ...headers },
  });
}

function requestedUrl(fetchMock: { mock: { calls: unknown[][] } }): URL {
  return new URL(String(fetchMock.mock.calls[0][0]));
}

describe('RestForecastGateway', () => {
  describe('fetchRows', () => {
    it('should filter by pair and date range and order by date then model', async () => {
      const fetchMock = jest.fn<FetchLike>().mockResolvedValue(
        jsonResponse([
          { store_id: 'S1', product_id: 'P1', forecast_date: '2024-01-01', forecast_qty: 10, model: 'arima' },
        ]),
      );
      const gateway = new RestForecastGateway(CONFIG, fetchMock);

      const rows = await gateway.fetchRows({
        store_id: 'S1',
        product_id: 'P1',
        start_date: '2024-01-01',
        end_date: '2024-01-31',
      });

      expect(rows).toEqual([
        { store_id: 'S1', product_id: 'P1', forecast_date: '2024-01-01', forecast_qty: 10, model: 'arima' },
      ]);
      const url = requestedUrl(fetchMock);
      expect(`${url.origin}${url.pathname}`).toBe('http://data-api.test/rest/v1/forecasts');
      expect(url.searchParams.get('select')).toBe('store_id,product_id,forecast_date,forecast_qty,model');
      expect(url.searchParams.get('store_id')).toBe('eq.S1');
      expect(url.searchParams.get('product_id')).toBe('eq.P1');
      expect(url.searchParams.getAll('forecast_date')).toEqual(['gte.2024-01-01', 'lte.2024-01-31']);
      expect(url.searchParams.get('order')).toBe('forecast_date.asc,model.asc');
    });

    it('should send the API key in both auth headers', async () => {
      const fetchMock = jest.fn<FetchLike>().mockResolvedValue(jsonResponse([]));
      const gateway = new RestForecastGateway(CONFIG, fetchMock);

      await gateway.fetchRows({ store_id: 'S1', product_id: 'P1' });

      const init = fetchMock.mock.calls[0][1];
      expect(init?.method).toBe('GET');
      expect(init?.headers).toEqual({
        apikey: 'test-api-key',
        Authorization: 'Bearer test-api-key',
        Accept: 'application/json',
        Prefer: 'count=exact',
      });
      expect(requestedUrl(fetchMock).searchParams.has('forecast_date')).toBe(false);
    });

    it('should map an error status to DataSourceError', async () => {
      const fetchMock = jest.fn<FetchLike>().mockResolvedValue(new Response('', { status: 503 }));
      const gateway = new RestForecastGateway(CONFIG, fetchMock);

      await expect(gateway.fetchRows({ store_id: 'S1', product_id: 'P1' })).rejects.toThrow(
        new DataSourceError('Data API responded with status 503', 'rest'),
      );
    });

    it('should map a network failure to DataSourceError with its cause', async () => {
      const failure = new TypeError('fetch failed');
      const fetchMock = jest.fn<FetchLike>().mockRejectedValue(failure);
      const gateway = new RestForecastGateway(CONFIG, fetchMock);

      await expect(gateway.fetchRows({ store_id: 'S1', product_id: 'P1' })).rejects.toMatchObject({
        name: 'DataSourceError',
        message: 'Data API request failed',
        cause: failure,
      });
    });

    it('should give up once the timeout elapses', async () => {
      const fetchMock = jest.fn<FetchLike>((_url, init) => {
        return new Promise<Response>((_resolve, reject) => {
          init?.signal?.addEventListener('abort', () => reject(new Error('aborted')));
        });
      });
      const gateway = new RestForecastGateway(CONFIG, fetchMock);

      await expect(gateway.fetchRows({ store_id: 'S1', product_id: 'P1' })).rejects.toThrow(
        'Data API request timed out after 50ms',
      );
    });

    it('should reject a body that is not JSON', async () => {
      const fetchMock = jest.fn<FetchLike>().mockResolvedValue(new Response('<html></html>', { status: 200 }));
      const gateway = new RestForecastGateway(CONFIG, fetchMock);

      await expect(gateway.fetchRows({ store_id: 'S1', product_id: 'P1' })).rejects.toThrow(
        'Malformed forecast payload: response is not JSON',
      );
    });

    it('should reject a payload with a malformed row', async () => {
      const fetchMock = jest.fn<FetchLike>().mockResolvedValue(
        jsonResponse([{ store_id: 'S1', product_id: 'P1', forecast_date: '2024-01-01', forecast_qty: 3 }]),
      );
      const gateway = new RestForecastGateway(CONFIG, fetchMock);

      await expect(gateway.fetchRows({ store_id: 'S1', product_id: 'P1' })).rejects.toThrow(
        'Malformed forecast payload: model must be a string',
      );
    });
  });

  describe('result limits', () => {
    it('should fail when the server returns fewer rows than it counted', async () => {
      const fetchMock = jest.fn<FetchLike>().mockResolvedValue(
        jsonResponse([
          { product_id: 'P1', forecast_qty: 4 },
          { product_id: 'P2', forecast_qty: 9 },
        ], 200, { 'Content-Range': '0-1/5000' }),
      );
      const gateway = new RestForecastGateway(CONFIG, fetchMock);

      await expect(gateway.fetchProductQuantities()).rejects.toThrow(
        new DataSourceError('Data API returned 2 of 5000 rows; raise its max-rows limit', 'rest'),
      );
    });

    it('should accept a complete count', async () => {
      const fetchMock = jest.fn<FetchLike>().mockResolvedValue(
        jsonResponse([{ store_id: 'S1' }], 200, { 'Content-Range': '0-0/1' }),
      );
      const gateway = new RestForecastGateway(CONFIG, fetchMock);

      await expect(gateway.fetchDistinct('store_id')).resolves.toEqual(['S1']);
    });

    it('should accept an empty range', async () => {
      const fetchMock = jest.fn<FetchLike>().mockResolvedValue(jsonResponse([], 200, { 'Content-Range': '*/0' }));
      const gateway = new RestForecastGateway(CONFIG, fetchMock);

      await expect(gateway.fetchRows({ store_id: 'S1', product_id: 'P1' })).resolves.toEqual([]);
    });

    it('should not ask for a count when pinging', async () => {
      const fetchMock = jest.fn<FetchLike>().mockResolvedValue(jsonResponse([], 200, { 'Content-Range': '*/0' }));
      const gateway = new RestForecastGateway(CONFIG, fetchMock);

      await gateway.ping();

      expect(fetchMock.mock.calls[0][1]?.headers).not.toHaveProperty('Prefer');
    });
  });

  describe('fetchDistinct', () => {
    it('should drop nulls and return sorted unique values', async () => {
      const fetchMock = jest.fn<FetchLike>().mockResolvedValue(
        jsonResponse([{ store_id: 'S2' }, { store_id: null }, { store_id: 'S1' }, { store_id: 'S2' }]),
      );
      const gateway = new RestForecastGateway(CONFIG, fetchMock);

      await expect(gateway.fetchDistinct('store_id')).resolves.toEqual(['S1', 'S2']);
      const url = requestedUrl(fetchMock);
      expect(url.searchParams.get('select')).toBe('store_id');
      expect(url.searchParams.get('store_id')).toBe('not.is.null');
    });
  });

  describe('fetchProductQuantities', () => {
    it('should request only product and quantity', async () => {
      const fetchMock = jest.fn<FetchLike>().mockResolvedValue(
        jsonResponse([{ product_id: 'P1', forecast_qty: 4 }]),
      );
      const gateway = new RestForecastGateway(CONFIG, fetchMock);

      await expect(gateway.fetchProductQuantities()).resolves.toEqual([{ product_id: 'P1', forecast_qty: 4 }]);
      expect(requestedUrl(fetchMock).searchParams.get('select')).toBe('product_id,forecast_qty');
    });
  });

  describe('ping', () => {
    it('should fetch a single row', async () => {
      const fetchMock = jest.fn<FetchLike>().mockResolvedValue(jsonResponse([]));
      const gateway = new RestForecastGateway(CONFIG, fetchMock);

      await expect(gateway.ping()).resolves.toBeUndefined();
      expect(requestedUrl(fetchMock).searchParams.get('limit')).toBe('1');
    });

    it('should fail on a non-array payload', async () => {
      const fetchMock = jest.fn<FetchLike>().mockResolvedValue(jsonResponse({ message: 'ok' }));
      const gateway = new RestForecastGateway(CONFIG, fetchMock);

      await expect(gateway.ping()).rejects.toBeInstanceOf(DataSourceError);
    });
  });
});
