import { tool } from '@langchain/core/tools';
import { z } from 'zod';
import { errorResult, serializeToolResult, type MetricsEntry, type ToolResult } from '../types.js';
import { formatBillions, formatFixed, formatPercent, formatUsd } from './format.js';
import { lookupSnapshot, type SnapshotLookup } from './lookup.js';
import { parseTickerList } from './periods.js';
import type { CompanySnapshot } from './yahoo-client.js';

interface ComparedMetric {
  metric: string;
  label: string;
  read: (snap: CompanySnapshot) => number | undefined;
  format: (value: number) => string;
}

const COMPARED_METRICS: ComparedMetric[] = [
  { metric: 'price', label: 'Price', read: (s) => s.currentPrice ?? s.regularMarketPrice, format: formatUsd },
  { metric: 'marketCap', label: 'Market Cap', read: (s) => s.marketCap, format: (v) => formatBillions(v, 1) },
  { metric: 'trailingPE', label: 'P/E Ratio', read: (s) => s.trailingPE, format: (v) => formatFixed(v) },
  { metric: 'profitMargin', label: 'Profit Margin', read: (s) => s.profitMargins, format: formatPercent },
  { metric: 'revenueGrowth', label: 'Revenue Growth', read: (s) => s.revenueGrowth, format: formatPercent },
  { metric: 'returnOnEquity', label: 'ROE', read: (s) => s.returnOnEquity, format: formatPercent },
];

const METRIC_COLUMN = 20;
const VALUE_COLUMN = 12;

export const MIN_COMPARED_TICKERS = 2;

function toEntry(ticker: string, lookup: SnapshotLookup): MetricsEntry {
  const metrics: Record<string, number | null> = {};
  for (const m of COMPARED_METRICS) {
    metrics[m.metric] = lookup.ok ? (m.read(lookup.snapshot) ?? null) : null;
  }
  if (!lookup.ok) {
    return { ticker, name: ticker, metrics, labels: { status: lookup.error.code } };
  }
  return { ticker, name: lookup.snapshot.longName ?? ticker, metrics };
}

/** Fixed-width table, one column per ticker in input order. */
export function renderComparisonTable(entries: MetricsEntry[]): string {
  const header = `${'Metric'.padEnd(METRIC_COLUMN)} ${entries.map((e) => e.ticker.padStart(VALUE_COLUMN)).join(' ')}`;
  const rule = '-'.repeat(METRIC_COLUMN + (VALUE_COLUMN + 1) * entries.length);
  const rows = COMPARED_METRICS.map((m) => {
    const cells = entries.map((e) => {
      const value = e.metrics[m.metric];
      return (value === null || value === undefined ? 'N/A' : m.format(value)).padStart(VALUE_COLUMN);
    });
    return `${m.label.padEnd(METRIC_COLUMN)} ${cells.join(' ')}`;
  });
  return ['Stock Comparison:', '', header, rule, ...rows].join('\n');
}

export async function compareStocks(rawTickers: string | string[]): Promise<ToolResult> {
  const { tickers } = parseTickerList(rawTickers, undefined, '6mo');
  if (tickers.length < MIN_COMPARED_TICKERS) {
    return errorResult('invalid_input', 'Please provide at least 2 tickers');
  }

  const lookups = await Promise.all(tickers.map((ticker) => lookupSnapshot(ticker, 'comparison data')));

  const failures = lookups.filter((l): l is Extract<SnapshotLookup, { ok: false }> => !l.ok);
  if (failures.length === lookups.length) {
    const allMissing = failures.every((f) => f.error.code === 'not_found');
    return errorResult(
      allMissing ? 'not_found' : 'provider_error',
      allMissing ? `No data found for any of ${tickers.join(', ')}` : `Error comparing stocks: ${failures[0].error.message}`
    );
  }

  const entries = lookups.map((lookup, i) => toEntry(tickers[i], lookup));

  return {
    kind: 'metrics',
    title: `Comparison of ${tickers.join(', ')}`,
    entries,
    summary: renderComparisonTable(entries),
  };
}

// ============================================================================
// Tool Definition
// ============================================================================

export const compareStocksTool = tool(
  async ({ tickers }) => serializeToolResult(await compareStocks(tickers)),
  {
    name: 'compare_stocks',
    description: 'Compare key metrics of multiple stocks side by side (price, market cap, P/E, profit margin, revenue growth, ROE). Input is a list of at least 2 tickers.',
    schema: z.object({
      tickers: z.array(z.string()).describe('Ticker symbols to compare (e.g., ["AAPL", "MSFT", "GOOGL"])'),
    }),
  }
);
