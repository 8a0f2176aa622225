import { afterEach, beforeEach, describe, expect, test, vi } from 'vitest';

const yahoo = vi.hoisted(() => ({
  quoteSummary: vi.fn(),
  search: vi.fn(),
  chart: vi.fn(),
}));

vi.mock('yahoo-finance2', () => ({
  default: class {
    quoteSummary = yahoo.quoteSummary;
    search = yahoo.search;
    chart = yahoo.chart;
  },
}));

import { fetchCompanySnapshot, fetchHistory, fetchNews } from '../src/tools/market/yahoo-client.js';
import { MarketDataError } from '../src/utils/errors.js';

beforeEach(() => {
  yahoo.quoteSummary.mockReset();
  yahoo.search.mockReset();
  yahoo.chart.mockReset();
});

describe('fetchCompanySnapshot', () => {
  test('flattens the quote summary modules', async () => {
    yahoo.quoteSummary.mockResolvedValue({
      price: { longName: 'Apple Inc.', currency: 'USD', regularMarketPrice: 190, marketCap: 2900000000000 },
      summaryDetail: { previousClose: 188, fiftyTwoWeekLow: 164.08, trailingPE: 'n/a' },
      financialData: { currentPrice: 190.5, recommendationKey: 'buy', profitMargins: 0.25 },
      assetProfile: { sector: 'Technology', fullTimeEmployees: 164000 },
    });

    const snapshot = await fetchCompanySnapshot('AAPL');

    expect(yahoo.quoteSummary).toHaveBeenCalledWith('AAPL', {
      modules: ['price', 'summaryDetail', 'defaultKeyStatistics', 'financialData', 'assetProfile'],
    });
    expect(snapshot).toMatchObject({
      ticker: 'AAPL',
      longName: 'Apple Inc.',
      currency: 'USD',
      currentPrice: 190.5,
      regularMarketPrice: 190,
      previousClose: 188,
      marketCap: 2900000000000,
      fiftyTwoWeekLow: 164.08,
      profitMargins: 0.25,
      recommendationKey: 'buy',
      sector: 'Technology',
      fullTimeEmployees: 164000,
    });
    expect(snapshot?.trailingPE).toBeUndefined();
  });

  test('falls back to the short name', async () => {
    yahoo.quoteSummary.mockResolvedValue({ price: { shortName: 'Apple', regularMarketPrice: 190 } });

    expect((await fetchCompanySnapshot('AAPL'))?.longName).toBe('Apple');
  });

  test('an unknown symbol resolves to null', async () => {
    yahoo.quoteSummary.mockRejectedValue(new Error('Quote not found for symbol: ZZZZ1'));

    expect(await fetchCompanySnapshot('ZZZZ1')).toBeNull();
  });

  test('a response without the price module resolves to null', async () => {
    yahoo.quoteSummary.mockResolvedValue({ summaryDetail: { previousClose: 1 } });

    expect(await fetchCompanySnapshot('AAPL')).toBeNull();
  });

  test('other failures throw MarketDataError', async () => {
    yahoo.quoteSummary.mockRejectedValue(new Error('ETIMEDOUT'));

    const failure = fetchCompanySnapshot('AAPL');

    await expect(failure).rejects.toBeInstanceOf(MarketDataError);
    await expect(failure).rejects.toThrow('Failed to fetch data for AAPL: ETIMEDOUT');
  });
});

describe('fetchNews', () => {
  test('maps news items and epoch timestamps', async () => {
    yahoo.search.mockResolvedValue({
      news: [
        { title: 'First', publisher: 'Reuters', link: 'https://example.com/1', providerPublishTime: new Date('2026-10-15T00:00:00.000Z') },
        { title: 'Second', providerPublishTime: 1760486400 },
      ],
    });

    const items = await fetchNews('TSLA', 5);

    expect(yahoo.search).toHaveBeenCalledWith('TSLA', { newsCount: 5, quotesCount: 0 });
    expect(items).toEqual([
      { title: 'First', publisher: 'Reuters', link: 'https://example.com/1', publishedAt: new Date('2026-10-15T00:00:00.000Z') },
      { title: 'Second', publisher: undefined, link: undefined, publishedAt: new Date(1760486400 * 1000) },
    ]);
  });

  test('an unknown symbol resolves to no news', async () => {
    yahoo.search.mockRejectedValue(new Error('No data found, symbol may be delisted'));

    expect(await fetchNews('ZZZZ1')).toEqual([]);
  });
});

describe('fetchHistory', () => {
  test('keeps complete daily bars only', async () => {
    yahoo.chart.mockResolvedValue({
      quotes: [
        { date: new Date('2026-10-01T13:30:00.000Z'), open: 1, high: 2, low: 0.5, close: 1.5, volume: 100 },
        { date: new Date('2026-10-02T13:30:00.000Z'), open: null, high: 2, low: 0.5, close: 1.5, volume: 100 },
      ],
    });

    const bars = await fetchHistory('AAPL', '6mo');

    expect(yahoo.chart).toHaveBeenCalledWith('AAPL', { period1: expect.any(Date), interval: '1d' });
    expect(bars).toEqual([{ date: '2026-10-01', open: 1, high: 2, low: 0.5, close: 1.5, volume: 100 }]);
  });

  test('intraday bars keep the time of day', async () => {
    yahoo.chart.mockResolvedValue({
      quotes: [{ date: new Date('2026-10-01T14:35:00.000Z'), open: 1, high: 2, low: 0.5, close: 1.5, volume: 100 }],
    });

    const bars = await fetchHistory('AAPL', '1d');

    expect(yahoo.chart).toHaveBeenCalledWith('AAPL', { period1: expect.any(Date), interval: '5m' });
    expect(bars[0].date).toBe('2026-10-01T14:35');
  });

  describe('on a Monday before the open', () => {
    beforeEach(() => {
      vi.useFakeTimers({ toFake: ['Date'] });
      vi.setSystemTime(new Date('2026-10-19T12:00:00.000Z'));
    });

    afterEach(() => {
      vi.useRealTimers();
    });

    const bar = (date: string) => ({ date: new Date(date), open: 1, high: 2, low: 0.5, close: 1.5, volume: 100 });

    test('1d returns the last session', async () => {
      yahoo.chart.mockResolvedValue({
        quotes: [bar('2026-10-15T19:55:00.000Z'), bar('2026-10-16T13:30:00.000Z'), bar('2026-10-16T19:55:00.000Z')],
      });

      const bars = await fetchHistory('AAPL', '1d');

      expect(yahoo.chart).toHaveBeenCalledWith('AAPL', { period1: new Date('2026-10-12T12:00:00.000Z'), interval: '5m' });
      expect(bars.map((b) => b.date)).toEqual(['2026-10-16T13:30', '2026-10-16T19:55']);
    });

    test('5d returns the last five sessions', async () => {
      yahoo.chart.mockResolvedValue({
        quotes: ['09', '10', '13', '14', '15', '16'].map((day) => bar(`2026-10-${day}T14:00:00.000Z`)),
      });

      const bars = await fetchHistory('AAPL', '5d');

      expect(yahoo.chart).toHaveBeenCalledWith('AAPL', { period1: new Date('2026-10-05T12:00:00.000Z'), interval: '30m' });
      expect(bars.map((b) => b.date)).toEqual([
        '2026-10-10T14:00',
        '2026-10-13T14:00',
        '2026-10-14T14:00',
        '2026-10-15T14:00',
        '2026-10-16T14:00',
      ]);
    });
  });

  test('an unknown symbol resolves to an empty series', async () => {
    yahoo.chart.mockRejectedValue(new Error('Not Found'));

    expect(await fetchHistory('ZZZZ1', '6mo')).toEqual([]);
  });
});
