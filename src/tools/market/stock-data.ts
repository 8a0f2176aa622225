import { tool } from '@langchain/core/tools';
import { z } from 'zod';
import { errorResult, serializeToolResult, type MetricsResult, type ToolResult } from '../types.js';
import { lookupSnapshot, type NumericSnapshotKey } from './lookup.js';
import { normalizeTicker } from './periods.js';
import { formatBillions, formatFixed, formatPercent, formatSigned, formatSignedUsd, formatUsd, orNA } from './format.js';

function round2(value: number): number {
  return Math.round(value * 100) / 100;
}

// ============================================================================
// Price
// ============================================================================

export async function lookupStockPrice(rawTicker: string): Promise<ToolResult> {
  const ticker = normalizeTicker(rawTicker);
  const lookup = await lookupSnapshot(ticker, 'price');
  if (!lookup.ok) return lookup.error;

  const snap = lookup.snapshot;
  const price = snap.currentPrice ?? snap.regularMarketPrice;
  if (price === undefined) {
    return errorResult('not_found', `No price available for ${ticker}.`, ticker);
  }

  const previousClose = snap.previousClose ?? price;
  const change = price - previousClose;
  const changePercent = previousClose ? (change / previousClose) * 100 : 0;
  const name = snap.longName ?? ticker;

  const summary = [
    `${name} (${ticker})`,
    `Current Price: ${formatUsd(price)}`,
    `Change: ${formatSignedUsd(change)} (${formatSigned(changePercent)}%)`,
    `Market Cap: ${orNA(snap.marketCap, (v) => formatBillions(v))}`,
    `52W Range: ${orNA(snap.fiftyTwoWeekLow, formatUsd)} - ${orNA(snap.fiftyTwoWeekHigh, formatUsd)}`,
  ].join('\n');

  const result: MetricsResult = {
    kind: 'metrics',
    title: `Current price for ${ticker}`,
    entries: [
      {
        ticker,
        name,
        metrics: {
          price,
          previousClose,
          change: round2(change),
          changePercent: round2(changePercent),
          marketCap: snap.marketCap ?? null,
          fiftyTwoWeekLow: snap.fiftyTwoWeekLow ?? null,
          fiftyTwoWeekHigh: snap.fiftyTwoWeekHigh ?? null,
        },
        labels: { currency: snap.currency ?? 'USD' },
      },
    ],
    summary,
  };
  return result;
}

// ============================================================================
// Fundamentals
// ============================================================================

interface FundamentalField {
  source: NumericSnapshotKey;
  metric: string;
  label: string;
  format: (value: number) => string;
}

const FUNDAMENTAL_SECTIONS: { heading: string; fields: FundamentalField[] }[] = [
  {
    heading: 'Valuation Metrics',
    fields: [
      { source: 'trailingPE', metric: 'trailingPE', label: 'P/E Ratio', format: (v) => formatFixed(v) },
      { source: 'forwardPE', metric: 'forwardPE', label: 'Forward P/E', format: (v) => formatFixed(v) },
      { source: 'pegRatio', metric: 'pegRatio', label: 'PEG Ratio', format: (v) => formatFixed(v) },
      { source: 'priceToBook', metric: 'priceToBook', label: 'Price/Book', format: (v) => formatFixed(v) },
      { source: 'priceToSales', metric: 'priceToSales', label: 'Price/Sales', format: (v) => formatFixed(v) },
    ],
  },
  {
    heading: 'Profitability',
    fields: [
      { source: 'profitMargins', metric: 'profitMargin', label: 'Profit Margin', format: formatPercent },
      { source: 'operatingMargins', metric: 'operatingMargin', label: 'Operating Margin', format: formatPercent },
      { source: 'returnOnEquity', metric: 'returnOnEquity', label: 'ROE', format: formatPercent },
      { source: 'returnOnAssets', metric: 'returnOnAssets', label: 'ROA', format: formatPercent },
    ],
  },
  {
    heading: 'Growth',
    fields: [
      { source: 'revenueGrowth', metric: 'revenueGrowth', label: 'Revenue Growth', format: formatPercent },
      { source: 'earningsGrowth', metric: 'earningsGrowth', label: 'Earnings Growth', format: formatPercent },
    ],
  },
  {
    heading: 'Financial Health',
    fields: [
      { source: 'totalRevenue', metric: 'totalRevenue', label: 'Total Revenue', format: (v) => formatBillions(v) },
      { source: 'freeCashflow', metric: 'freeCashflow', label: 'Free Cash Flow', format: (v) => formatBillions(v) },
      { source: 'debtToEquity', metric: 'debtToEquity', label: 'Debt/Equity', format: (v) => formatFixed(v) },
      { source: 'currentRatio', metric: 'currentRatio', label: 'Current Ratio', format: (v) => formatFixed(v) },
    ],
  },
];

export async function lookupStockFundamentals(rawTicker: string): Promise<ToolResult> {
  const ticker = normalizeTicker(rawTicker);
  const lookup = await lookupSnapshot(ticker, 'fundamentals');
  if (!lookup.ok) return lookup.error;

  const snap = lookup.snapshot;
  const metrics: Record<string, number | null> = {};
  const lines = [`Fundamental Analysis for ${ticker}:`];

  for (const section of FUNDAMENTAL_SECTIONS) {
    lines.push('', `${section.heading}:`);
    for (const field of section.fields) {
      const value = snap[field.source];
      metrics[field.metric] = value ?? null;
      lines.push(`- ${field.label}: ${orNA(value, field.format)}`);
    }
  }

  metrics.targetMeanPrice = snap.targetMeanPrice ?? null;
  const recommendation = snap.recommendationKey?.toUpperCase() ?? 'N/A';
  lines.push(
    '',
    'Analyst Info:',
    `- Recommendation: ${recommendation}`,
    `- Target Price: ${orNA(snap.targetMeanPrice, formatUsd)}`
  );

  if (Object.values(metrics).every((v) => v === null)) {
    return errorResult('not_found', `No fundamentals data available for ${ticker}.`, ticker);
  }

  return {
    kind: 'metrics',
    title: `Fundamentals for ${ticker}`,
    entries: [
      {
        ticker,
        name: snap.longName ?? ticker,
        metrics,
        labels: { recommendation },
      },
    ],
    summary: lines.join('\n'),
  };
}

// ============================================================================
// Tool Definitions
// ============================================================================

const TickerInputSchema = z.object({
  ticker: z.string().min(1).describe('Stock ticker symbol (e.g., AAPL)'),
});

export const getStockPrice = tool(
  async ({ ticker }) => serializeToolResult(await lookupStockPrice(ticker)),
  {
    name: 'get_stock_price',
    description: 'Get current stock price and basic information (change, market cap, 52-week range). Input is a stock ticker symbol (e.g., AAPL).',
    schema: TickerInputSchema,
  }
);

export const getStockFundamentals = tool(
  async ({ ticker }) => serializeToolResult(await lookupStockFundamentals(ticker)),
  {
    name: 'get_stock_fundamentals',
    description: 'Get detailed fundamental analysis: P/E ratios, profitability metrics, growth rates, financial health and analyst targets. Input is a stock ticker.',
    schema: TickerInputSchema,
  }
);
