/**
 * @fileoverview Tests for Yahoo Finance provider.
 *
 * Covers fixture mode, HTTP request construction, error mapping and parsing.
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { fileURLToPath } from 'node:url';
import axios, { AxiosError } from 'axios';
import type { AxiosInstance, AxiosResponse, InternalAxiosRequestConfig } from 'axios';
import {
  DataUnavailableError,
  Interval,
  InvalidDateRangeError,
  ProviderRequestError,
} from '@stocker/contracts';
import { YahooProvider } from '../src/yahoo-provider.js';
import { parseChartResponse } from '../src/parser.js';

const fixturePath = fileURLToPath(new URL('../__fixtures__', import.meta.url));

interface StubReply {
  status: number;
  data: unknown;
}

/**
 * axios instance answered in process; records every request config.
 */
function stubClient(reply: (config: InternalAxiosRequestConfig) => StubReply): {
  http: AxiosInstance;
  calls: InternalAxiosRequestConfig[];
} {
  const calls: InternalAxiosRequestConfig[] = [];
  const http = axios.create({
    adapter: async (config) => {
      calls.push(config);
      const { status, data } = reply(config);
      const response: AxiosResponse = { data, status, statusText: String(status), headers: {}, config };
      if (status >= 400) {
        throw new AxiosError(
          `Request failed with status code ${status}`,
          AxiosError.ERR_BAD_REQUEST,
          config,
          undefined,
          response
        );
      }
      return response;
    },
  });
  return { http, calls };
}

const chartBody = {
  chart: {
    result: [
      {
        meta: { symbol: 'MSFT', currency: 'USD' },
        timestamp: [1672756200, 1672842600],
        indicators: {
          quote: [
            {
              open: [240, 232],
              high: [245, 234],
              low: [233, 227],
              close: [239, 229],
              volume: [25000000, 50000000],
            },
          ],
        },
      },
    ],
    error: null,
  },
};

describe('YahooProvider (fixture mode)', () => {
  let provider: YahooProvider;

  beforeEach(() => {
    provider = new YahooProvider({ fixturePath });
  });

  describe('getSeries', () => {
    it('should return bars in [start, end) and drop null rows', async () => {
      const bars = await provider.getSeries({
        ticker: 'TSLA',
        startDate: '2023-01-03',
        endDate: '2023-01-09',
        interval: Interval.D1,
      });

      expect(bars.map((bar) => bar.timestamp)).toEqual([
        '2023-01-03T14:30:00.000Z',
        '2023-01-04T14:30:00.000Z',
        '2023-01-06T14:30:00.000Z',
      ]);
      expect(bars[0]).toEqual({
        timestamp: '2023-01-03T14:30:00.000Z',
        open: 100,
        high: 104,
        low: 98,
        close: 102,
        volume: 1000,
      });
    });

    it('should default a null volume to 0', async () => {
      const bars = await provider.getSeries({
        ticker: 'TSLA',
        startDate: '2023-01-06',
        endDate: '2023-01-07',
        interval: Interval.D1,
      });

      expect(bars).toHaveLength(1);
      expect(bars[0]?.volume).toBe(0);
    });

    it('should include the whole fixture for a wide range', async () => {
      const bars = await provider.getSeries({
        ticker: 'TSLA',
        startDate: '2023-01-01',
        endDate: '2023-02-01',
        interval: Interval.D1,
      });

      expect(bars).toHaveLength(4);
      expect(bars[3]?.close).toBe(108);
    });

    it('should reject a range without bars', async () => {
      await expect(
        provider.getSeries({
          ticker: 'TSLA',
          startDate: '2023-02-01',
          endDate: '2023-03-01',
          interval: Interval.D1,
        })
      ).rejects.toThrow(DataUnavailableError);
    });

    it('should reject an unknown ticker', async () => {
      await expect(
        provider.getSeries({
          ticker: 'ZZZZINVALID',
          startDate: '2023-01-01',
          endDate: '2023-06-01',
          interval: Interval.D1,
        })
      ).rejects.toThrow(DataUnavailableError);
    });

    it('should reject an inverted range before loading anything', async () => {
      await expect(
        provider.getSeries({
          ticker: 'TSLA',
          startDate: '2023-06-01',
          endDate: '2023-01-01',
          interval: Interval.D1,
        })
      ).rejects.toThrow(InvalidDateRangeError);
    });
  });

  describe('getMetadata', () => {
    it('should read beta and currency from summaryDetail', async () => {
      await expect(provider.getMetadata('TSLA')).resolves.toEqual({
        symbol: 'TSLA',
        beta: 2.1,
        currency: 'USD',
      });
    });

    it('should report a null beta when Yahoo has none', async () => {
      await expect(provider.getMetadata('SPY')).resolves.toEqual({
        symbol: 'SPY',
        beta: null,
        currency: 'USD',
      });
    });

    it('should reject a malformed body', async () => {
      await expect(provider.getMetadata('BROKEN')).rejects.toThrow(ProviderRequestError);
    });

    it('should reject an unknown ticker', async () => {
      await expect(provider.getMetadata('ZZZZINVALID')).rejects.toThrow(DataUnavailableError);
    });

    it('should reject tickers that are not plain symbols before touching the disk', async () => {
      await expect(provider.getMetadata('../TSLA')).rejects.toThrow('Invalid ticker "../TSLA"');
      await expect(provider.getMetadata('fixtures/TSLA')).rejects.toThrow(DataUnavailableError);
      await expect(provider.getMetadata('tsla')).rejects.toThrow(DataUnavailableError);
      await expect(
        provider.getSeries({
          ticker: '..\\TSLA',
          startDate: '2023-01-01',
          endDate: '2023-02-01',
          interval: Interval.D1,
        })
      ).rejects.toThrow(DataUnavailableError);
    });
  });
});

describe('YahooProvider (HTTP mode)', () => {
  it('should request the chart endpoint with epoch-second bounds', async () => {
    const { http, calls } = stubClient(() => ({ status: 200, data: chartBody }));
    const provider = new YahooProvider({ httpClient: http, chartBaseUrl: 'https://example.test/chart' });

    const bars = await provider.getSeries({
      ticker: 'MSFT',
      startDate: '2023-01-03',
      endDate: '2023-01-09',
      interval: Interval.D1,
    });

    expect(bars).toHaveLength(2);
    expect(calls).toHaveLength(1);
    expect(calls[0]?.url).toBe('https://example.test/chart/MSFT');
    expect(calls[0]?.params).toEqual({
      period1: 1672704000,
      period2: 1673222400,
      interval: '1d',
      includePrePost: false,
      events: 'div,splits',
    });
  });

  it('should request the summary modules for metadata', async () => {
    const { http, calls } = stubClient(() => ({
      status: 200,
      data: { quoteSummary: { result: [{ defaultKeyStatistics: { beta: { raw: 0.9 } } }], error: null } },
    }));
    const provider = new YahooProvider({ httpClient: http, summaryBaseUrl: 'https://example.test/summary' });

    const metadata = await provider.getMetadata('MSFT');

    expect(metadata).toEqual({ symbol: 'MSFT', beta: 0.9 });
    expect(calls[0]?.url).toBe('https://example.test/summary/MSFT');
    expect(calls[0]?.params).toEqual({ modules: 'summaryDetail,defaultKeyStatistics' });
  });

  it('should map HTTP 404 to DataUnavailableError', async () => {
    const { http } = stubClient(() => ({
      status: 404,
      data: { chart: { result: null, error: { code: 'Not Found', description: 'No data found' } } },
    }));
    const provider = new YahooProvider({ httpClient: http });

    await expect(
      provider.getSeries({
        ticker: 'ZZZZINVALID',
        startDate: '2023-01-01',
        endDate: '2023-06-01',
        interval: Interval.D1,
      })
    ).rejects.toThrow(DataUnavailableError);
  });

  it('should map server failures to ProviderRequestError with the status', async () => {
    const { http } = stubClient(() => ({ status: 503, data: 'unavailable' }));
    const provider = new YahooProvider({ httpClient: http });

    const error: unknown = await provider.getMetadata('MSFT').catch((err: unknown) => err);

    expect(error).toBeInstanceOf(ProviderRequestError);
    expect(error).toMatchObject({ code: 'PROVIDER_REQUEST_FAILED', data: { status: 503, ticker: 'MSFT' } });
  });

  it('should treat an error body as missing data', async () => {
    const { http } = stubClient(() => ({
      status: 200,
      data: { chart: { result: null, error: { code: 'Not Found', description: 'Delisted' } } },
    }));
    const provider = new YahooProvider({ httpClient: http });

    await expect(
      provider.getSeries({ ticker: 'OLD', startDate: '2023-01-01', endDate: '2023-06-01', interval: Interval.D1 })
    ).rejects.toThrow('Yahoo has no chart for "OLD": Delisted');
  });
});

describe('parseChartResponse', () => {
  it('should count skipped rows', () => {
    const { bars, skipped } = parseChartResponse(
      {
        chart: {
          result: [
            {
              timestamp: [1672756200, 1672842600],
              indicators: { quote: [{ open: [1, null], high: [2, null], low: [0.5, null], close: [1.5, null] }] },
            },
          ],
          error: null,
        },
      },
      'AAA'
    );

    expect(bars).toHaveLength(1);
    expect(skipped).toBe(1);
    expect(bars[0]?.volume).toBe(0);
  });

  it('should reject a result without timestamps', () => {
    expect(() =>
      parseChartResponse({ chart: { result: [{ indicators: { quote: [{}] } }], error: null } }, 'AAA')
    ).toThrow('Yahoo returned no bars for "AAA"');
  });
});
