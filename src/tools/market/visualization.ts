import { tool } from '@langchain/core/tools';
import { z } from 'zod';
import { buildCandlestickChart, buildComparisonChart, buildVolumeChart, type TickerSeries } from '../../charts/builders.js';
import type { ChartKind, ChartPayload } from '../../charts/schema.js';
import { errorMessage } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';
import { errorResult, serializeToolResult, type ChartResult, type ToolResult } from '../types.js';
import { MIN_COMPARED_TICKERS } from './comparison.js';
import { PeriodSchema, parseTickerArg, parseTickerList, type Period } from './periods.js';
import { fetchHistory, type PriceBar } from './yahoo-client.js';

type HistoryLookup = { ok: true; bars: PriceBar[] } | { ok: false; error: ToolResult };

async function loadHistory(ticker: string, period: Period, what: string): Promise<HistoryLookup> {
  try {
    return { ok: true, bars: await fetchHistory(ticker, period) };
  } catch (error) {
    logger.warn(`[Tools] history failed for ${ticker}`, { error: errorMessage(error) });
    return { ok: false, error: errorResult('provider_error', `Error creating ${what}: ${errorMessage(error)}`, ticker) };
  }
}

function chartResult(chartKind: ChartKind, tickers: string[], period: Period, payload: ChartPayload): ChartResult {
  return { kind: 'chart', chartKind, tickers, period, message: payload.message, figure: payload.figure };
}

export async function plotStockPrice(rawTicker: string, period?: Period): Promise<ToolResult> {
  const { ticker, period: resolved } = parseTickerArg(rawTicker, period, '6mo');
  const history = await loadHistory(ticker, resolved, 'price chart');
  if (!history.ok) return history.error;
  if (history.bars.length === 0) {
    return errorResult('not_found', `No price data found for ${ticker}`, ticker);
  }
  return chartResult('candlestick', [ticker], resolved, buildCandlestickChart(ticker, resolved, history.bars));
}

export async function plotMultipleStocks(rawTickers: string | string[], period?: Period): Promise<ToolResult> {
  const { tickers, period: resolved } = parseTickerList(rawTickers, period, '6mo');
  if (tickers.length < MIN_COMPARED_TICKERS) {
    return errorResult('invalid_input', 'Please provide at least 2 tickers');
  }

  const series: TickerSeries[] = [];
  for (const ticker of tickers) {
    const history = await loadHistory(ticker, resolved, 'comparison chart');
    if (!history.ok) return history.error;
    series.push({ ticker, bars: history.bars });
  }

  const plotted = series.filter((s) => s.bars.length > 0);
  if (plotted.length === 0) {
    return errorResult('not_found', `No price data found for ${tickers.join(', ')}`);
  }
  return chartResult(
    'comparison',
    plotted.map((s) => s.ticker),
    resolved,
    buildComparisonChart(plotted, resolved)
  );
}

export async function plotVolume(rawTicker: string, period?: Period): Promise<ToolResult> {
  const { ticker, period: resolved } = parseTickerArg(rawTicker, period, '3mo');
  const history = await loadHistory(ticker, resolved, 'volume chart');
  if (!history.ok) return history.error;
  if (history.bars.length === 0) {
    return errorResult('not_found', `No volume data found for ${ticker}`, ticker);
  }
  return chartResult('volume', [ticker], resolved, buildVolumeChart(ticker, resolved, history.bars));
}

// ============================================================================
// Tool Definitions
// ============================================================================

const periodArg = PeriodSchema.optional().describe('Time period: 1d, 5d, 1mo, 3mo, 6mo, 1y, 2y, 5y, 10y, ytd, max');

export const plotStockPriceTool = tool(
  async ({ ticker, period }) => serializeToolResult(await plotStockPrice(ticker, period)),
  {
    name: 'plot_stock_price',
    description: "Create a candlestick price chart for a stock (default period 6mo). Example: ticker 'AAPL', period '1y' for Apple's 1-year chart.",
    schema: z.object({
      ticker: z.string().min(1).describe("Stock ticker symbol, optionally as 'TICKER,PERIOD'"),
      period: periodArg,
    }),
  }
);

export const plotMultipleStocksTool = tool(
  async ({ tickers, period }) => serializeToolResult(await plotMultipleStocks(tickers, period)),
  {
    name: 'plot_multiple_stocks',
    description: "Create a comparison chart of multiple stocks' percentage return from the start of the period (default 6mo). Use when the user wants to compare stocks visually.",
    schema: z.object({
      tickers: z.array(z.string()).describe('At least 2 ticker symbols (e.g., ["NVDA", "AMD"])'),
      period: periodArg,
    }),
  }
);

export const plotVolumeTool = tool(
  async ({ ticker, period }) => serializeToolResult(await plotVolume(ticker, period)),
  {
    name: 'plot_volume',
    description: "Create a daily trading volume chart for a stock (default period 3mo). Example: ticker 'TSLA', period '3mo'.",
    schema: z.object({
      ticker: z.string().min(1).describe("Stock ticker symbol, optionally as 'TICKER,PERIOD'"),
      period: periodArg,
    }),
  }
);
