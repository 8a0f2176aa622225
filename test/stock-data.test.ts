import { beforeEach, describe, expect, test, vi } from 'vitest';
import { fetchCompanySnapshot, type CompanySnapshot } from '../src/tools/market/yahoo-client.js';
import { getStockPrice, lookupStockFundamentals, lookupStockPrice } from '../src/tools/market/stock-data.js';

vi.mock('../src/tools/market/yahoo-client.js', () => ({
  fetchCompanySnapshot: vi.fn(),
  fetchNews: vi.fn(),
  fetchHistory: vi.fn(),
}));

const snapshotMock = vi.mocked(fetchCompanySnapshot);

const APPLE: CompanySnapshot = {
  ticker: 'AAPL',
  longName: 'Apple Inc.',
  currency: 'USD',
  currentPrice: 190.5,
  previousClose: 188,
  marketCap: 2950000000000,
  fiftyTwoWeekLow: 164.08,
  fiftyTwoWeekHigh: 199.62,
};

beforeEach(() => {
  snapshotMock.mockReset();
});

describe('lookupStockPrice', () => {
  test('returns price metrics and a summary for a valid ticker', async () => {
    snapshotMock.mockResolvedValue(APPLE);

    const result = await lookupStockPrice('AAPL');

    expect(result).toEqual({
      kind: 'metrics',
      title: 'Current price for AAPL',
      entries: [
        {
          ticker: 'AAPL',
          name: 'Apple Inc.',
          metrics: {
            price: 190.5,
            previousClose: 188,
            change: 2.5,
            changePercent: 1.33,
            marketCap: 2950000000000,
            fiftyTwoWeekLow: 164.08,
            fiftyTwoWeekHigh: 199.62,
          },
          labels: { currency: 'USD' },
        },
      ],
      summary: [
        'Apple Inc. (AAPL)',
        'Current Price: $190.50',
        'Change: +$2.50 (+1.33%)',
        'Market Cap: $2950.00B',
        '52W Range: $164.08 - $199.62',
      ].join('\n'),
    });
  });

  test('lowercase and uppercase tickers produce identical lookups', async () => {
    snapshotMock.mockResolvedValue(APPLE);

    const lower = await lookupStockPrice('aapl');
    const upper = await lookupStockPrice('AAPL');

    expect(snapshotMock.mock.calls).toEqual([['AAPL'], ['AAPL']]);
    expect(lower).toEqual(upper);
  });

  test('falls back to the regular market price and reports missing fields as N/A', async () => {
    snapshotMock.mockResolvedValue({ ticker: 'XYZ', regularMarketPrice: 10, previousClose: 12.5 });

    const result = await lookupStockPrice('xyz');

    expect(result.kind).toBe('metrics');
    if (result.kind !== 'metrics') return;
    expect(result.summary.split('\n')).toEqual([
      'XYZ (XYZ)',
      'Current Price: $10.00',
      'Change: -$2.50 (-20.00%)',
      'Market Cap: N/A',
      '52W Range: N/A - N/A',
    ]);
    expect(result.entries[0].metrics.marketCap).toBeNull();
  });

  test('an unknown ticker yields a not_found result', async () => {
    snapshotMock.mockResolvedValue(null);

    expect(await lookupStockPrice('ZZZZ1')).toEqual({
      kind: 'error',
      code: 'not_found',
      message: 'No data found for ZZZZ1. The ticker symbol may be invalid.',
      ticker: 'ZZZZ1',
    });
  });

  test('a snapshot without any price yields a not_found result', async () => {
    snapshotMock.mockResolvedValue({ ticker: 'AAPL', longName: 'Apple Inc.' });

    expect(await lookupStockPrice('AAPL')).toEqual({
      kind: 'error',
      code: 'not_found',
      message: 'No price available for AAPL.',
      ticker: 'AAPL',
    });
  });

  test('a provider failure yields a provider_error result', async () => {
    snapshotMock.mockRejectedValue(new Error('socket hang up'));

    expect(await lookupStockPrice('AAPL')).toEqual({
      kind: 'error',
      code: 'provider_error',
      message: 'Error fetching price for AAPL: socket hang up',
      ticker: 'AAPL',
    });
  });

  test('the tool returns the serialized result', async () => {
    snapshotMock.mockResolvedValue(null);

    const raw = await getStockPrice.invoke({ ticker: 'zzzz1' });

    expect(JSON.parse(String(raw))).toEqual({
      kind: 'error',
      code: 'not_found',
      message: 'No data found for ZZZZ1. The ticker symbol may be invalid.',
      ticker: 'ZZZZ1',
    });
  });
});

describe('lookupStockFundamentals', () => {
  test('collects ratios by section', async () => {
    snapshotMock.mockResolvedValue({
      ...APPLE,
      trailingPE: 29.5,
      forwardPE: 26.1,
      profitMargins: 0.25,
      revenueGrowth: 0.06,
      totalRevenue: 383300000000,
      recommendationKey: 'buy',
      targetMeanPrice: 210,
    });

    const result = await lookupStockFundamentals('aapl');

    expect(result.kind).toBe('metrics');
    if (result.kind !== 'metrics') return;
    const [entry] = result.entries;
    expect(entry.metrics.trailingPE).toBe(29.5);
    expect(entry.metrics.profitMargin).toBe(0.25);
    expect(entry.metrics.pegRatio).toBeNull();
    expect(entry.metrics.targetMeanPrice).toBe(210);
    expect(entry.labels).toEqual({ recommendation: 'BUY' });

    const lines = result.summary.split('\n');
    expect(lines[0]).toBe('Fundamental Analysis for AAPL:');
    expect(lines).toContain('- P/E Ratio: 29.50');
    expect(lines).toContain('- Forward P/E: 26.10');
    expect(lines).toContain('- PEG Ratio: N/A');
    expect(lines).toContain('- Profit Margin: 25.00%');
    expect(lines).toContain('- Revenue Growth: 6.00%');
    expect(lines).toContain('- Total Revenue: $383.30B');
    expect(lines.slice(-3)).toEqual(['Analyst Info:', '- Recommendation: BUY', '- Target Price: $210.00']);
  });

  test('a snapshot with no ratio at all yields not_found', async () => {
    snapshotMock.mockResolvedValue({ ticker: 'AAPL', longName: 'Apple Inc.', currentPrice: 190 });

    expect(await lookupStockFundamentals('AAPL')).toEqual({
      kind: 'error',
      code: 'not_found',
      message: 'No fundamentals data available for AAPL.',
      ticker: 'AAPL',
    });
  });

  test('an unknown ticker yields not_found', async () => {
    snapshotMock.mockResolvedValue(null);

    const result = await lookupStockFundamentals('ZZZZ1');

    expect(result.kind).toBe('error');
    if (result.kind !== 'error') return;
    expect(result.code).toBe('not_found');
  });
});
