import YahooFinance from 'yahoo-finance2';
import { z } from 'zod';
import { logDebug } from '../../utils/logger.js';
import { MarketDataError, errorMessage } from '../../utils/errors.js';
import { historyWindow, type Period } from './periods.js';

// Only the fields the tools read are validated; a field that fails validation
// reads as missing.

let client: InstanceType<typeof YahooFinance> | null = null;

function getClient(): InstanceType<typeof YahooFinance> {
  if (!client) {
    client = new YahooFinance({ suppressNotices: ['yahooSurvey'] });
  }
  return client;
}

const NOT_FOUND_PATTERN = /not found|no data found|delisted|no fundamentals|invalid symbol|\b404\b/i;

function isNotFound(error: unknown): boolean {
  return NOT_FOUND_PATTERN.test(errorMessage(error));
}

// --- Schemas for the parts of each response we use ---

const num = z.number().finite().nullish().catch(null);
const str = z.string().nullish().catch(null);

const QuoteSummarySchema = z.object({
  price: z
    .object({
      longName: str,
      shortName: str,
      currency: str,
      regularMarketPrice: num,
      regularMarketPreviousClose: num,
      marketCap: num,
    })
    .nullish(),
  summaryDetail: z
    .object({
      previousClose: num,
      marketCap: num,
      fiftyTwoWeekLow: num,
      fiftyTwoWeekHigh: num,
      trailingPE: num,
      forwardPE: num,
      priceToSalesTrailing12Months: num,
    })
    .nullish(),
  defaultKeyStatistics: z
    .object({
      pegRatio: num,
      priceToBook: num,
      forwardPE: num,
    })
    .nullish(),
  financialData: z
    .object({
      currentPrice: num,
      profitMargins: num,
      operatingMargins: num,
      returnOnEquity: num,
      returnOnAssets: num,
      revenueGrowth: num,
      earningsGrowth: num,
      totalRevenue: num,
      freeCashflow: num,
      debtToEquity: num,
      currentRatio: num,
      recommendationKey: str,
      targetMeanPrice: num,
    })
    .nullish(),
  assetProfile: z
    .object({
      sector: str,
      industry: str,
      country: str,
      fullTimeEmployees: num,
      longBusinessSummary: str,
      website: str,
    })
    .nullish(),
});

const timestamp = z.union([
  z.date(),
  z.string().transform((s) => new Date(s)),
  // Epoch seconds
  z.number().transform((s) => new Date(s * 1000)),
]);

const SearchSchema = z.object({
  news: z
    .array(
      z.object({
        title: z.string(),
        publisher: str,
        link: str,
        providerPublishTime: timestamp.nullish().catch(null),
      })
    )
    .default([]),
});

const ChartSchema = z.object({
  quotes: z
    .array(
      z.object({
        date: timestamp,
        open: num,
        high: num,
        low: num,
        close: num,
        volume: num,
      })
    )
    .default([]),
});

// --- Public shapes ---

/** Flattened company snapshot, one key per field the tools read. */
export interface CompanySnapshot {
  ticker: string;
  longName?: string;
  currency?: string;
  currentPrice?: number;
  regularMarketPrice?: number;
  previousClose?: number;
  marketCap?: number;
  fiftyTwoWeekLow?: number;
  fiftyTwoWeekHigh?: number;
  trailingPE?: number;
  forwardPE?: number;
  pegRatio?: number;
  priceToBook?: number;
  priceToSales?: number;
  profitMargins?: number;
  operatingMargins?: number;
  returnOnEquity?: number;
  returnOnAssets?: number;
  revenueGrowth?: number;
  earningsGrowth?: number;
  totalRevenue?: number;
  freeCashflow?: number;
  debtToEquity?: number;
  currentRatio?: number;
  recommendationKey?: string;
  targetMeanPrice?: number;
  sector?: string;
  industry?: string;
  country?: string;
  fullTimeEmployees?: number;
  longBusinessSummary?: string;
  website?: string;
}

export interface NewsItem {
  title: string;
  publisher?: string;
  link?: string;
  publishedAt?: Date;
}

export interface PriceBar {
  date: string;
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

function defined<T>(value: T | null | undefined): T | undefined {
  return value ?? undefined;
}

function flattenSummary(ticker: string, summary: z.infer<typeof QuoteSummarySchema>): CompanySnapshot {
  const { price, summaryDetail: detail, defaultKeyStatistics: stats, financialData: fin, assetProfile: profile } = summary;
  return {
    ticker,
    longName: defined(price?.longName ?? price?.shortName),
    currency: defined(price?.currency),
    currentPrice: defined(fin?.currentPrice),
    regularMarketPrice: defined(price?.regularMarketPrice),
    previousClose: defined(detail?.previousClose ?? price?.regularMarketPreviousClose),
    marketCap: defined(price?.marketCap ?? detail?.marketCap),
    fiftyTwoWeekLow: defined(detail?.fiftyTwoWeekLow),
    fiftyTwoWeekHigh: defined(detail?.fiftyTwoWeekHigh),
    trailingPE: defined(detail?.trailingPE),
    forwardPE: defined(detail?.forwardPE ?? stats?.forwardPE),
    pegRatio: defined(stats?.pegRatio),
    priceToBook: defined(stats?.priceToBook),
    priceToSales: defined(detail?.priceToSalesTrailing12Months),
    profitMargins: defined(fin?.profitMargins),
    operatingMargins: defined(fin?.operatingMargins),
    returnOnEquity: defined(fin?.returnOnEquity),
    returnOnAssets: defined(fin?.returnOnAssets),
    revenueGrowth: defined(fin?.revenueGrowth),
    earningsGrowth: defined(fin?.earningsGrowth),
    totalRevenue: defined(fin?.totalRevenue),
    freeCashflow: defined(fin?.freeCashflow),
    debtToEquity: defined(fin?.debtToEquity),
    currentRatio: defined(fin?.currentRatio),
    recommendationKey: defined(fin?.recommendationKey),
    targetMeanPrice: defined(fin?.targetMeanPrice),
    sector: defined(profile?.sector),
    industry: defined(profile?.industry),
    country: defined(profile?.country),
    fullTimeEmployees: defined(profile?.fullTimeEmployees),
    longBusinessSummary: defined(profile?.longBusinessSummary),
    website: defined(profile?.website),
  };
}

// --- Core API Functions ---

/**
 * Company snapshot (price, valuation, profile) for one ticker.
 * Resolves to null when the provider has no such symbol.
 */
export async function fetchCompanySnapshot(ticker: string): Promise<CompanySnapshot | null> {
  logDebug(`[Yahoo] Fetching quote summary for ${ticker}...`);
  let raw: unknown;
  try {
    raw = await getClient().quoteSummary(ticker, {
      modules: ['price', 'summaryDetail', 'defaultKeyStatistics', 'financialData', 'assetProfile'],
    });
  } catch (error) {
    if (isNotFound(error)) {
      logDebug(`[Yahoo] No quote summary for ${ticker}: ${errorMessage(error)}`);
      return null;
    }
    logDebug(`[Yahoo] Error fetchCompanySnapshot: ${errorMessage(error)}`);
    throw new MarketDataError(ticker, `Failed to fetch data for ${ticker}: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = QuoteSummarySchema.safeParse(raw);
  if (!parsed.success || !parsed.data.price) {
    return null;
  }
  return flattenSummary(ticker, parsed.data);
}

/** Most recent news items for a ticker, newest first as the provider orders them. */
export async function fetchNews(ticker: string, count = 5): Promise<NewsItem[]> {
  logDebug(`[Yahoo] Fetching news for ${ticker} (count: ${count})...`);
  let raw: unknown;
  try {
    raw = await getClient().search(ticker, { newsCount: count, quotesCount: 0 });
  } catch (error) {
    if (isNotFound(error)) return [];
    logDebug(`[Yahoo] Error fetchNews: ${errorMessage(error)}`);
    throw new MarketDataError(ticker, `Failed to fetch news for ${ticker}: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = SearchSchema.safeParse(raw);
  if (!parsed.success) return [];

  return parsed.data.news.slice(0, count).map((item) => ({
    title: item.title,
    publisher: defined(item.publisher),
    link: defined(item.link),
    publishedAt: defined(item.providerPublishTime),
  }));
}

/**
 * Historical OHLCV bars for a period, oldest first. Bars with any missing
 * value are dropped; an unknown symbol yields an empty series.
 */
export async function fetchHistory(ticker: string, period: Period): Promise<PriceBar[]> {
  const { period1, interval, sessions } = historyWindow(period);
  logDebug(`[Yahoo] Fetching ${period} history for ${ticker} (interval: ${interval})...`);
  let raw: unknown;
  try {
    raw = await getClient().chart(ticker, { period1, interval });
  } catch (error) {
    if (isNotFound(error)) return [];
    logDebug(`[Yahoo] Error fetchHistory: ${errorMessage(error)}`);
    throw new MarketDataError(ticker, `Failed to fetch history for ${ticker}: ${errorMessage(error)}`, { cause: error });
  }

  const parsed = ChartSchema.safeParse(raw);
  if (!parsed.success) return [];

  const intraday = interval === '5m' || interval === '30m';
  const bars: PriceBar[] = [];
  for (const q of parsed.data.quotes) {
    if (q.open == null || q.high == null || q.low == null || q.close == null || q.volume == null) continue;
    if (Number.isNaN(q.date.getTime())) continue;
    const iso = q.date.toISOString();
    bars.push({
      date: intraday ? iso.slice(0, 16) : iso.slice(0, 10),
      open: q.open,
      high: q.high,
      low: q.low,
      close: q.close,
      volume: q.volume,
    });
  }

  const kept = sessions === undefined ? bars : lastSessions(bars, sessions);
  logDebug(`[Yahoo] History fetched. ${kept.length} bars.`);
  return kept;
}

/** Bars of the last `count` distinct trading dates, in order. */
function lastSessions(bars: PriceBar[], count: number): PriceBar[] {
  const dates = [...new Set(bars.map((bar) => bar.date.slice(0, 10)))].slice(-count);
  const keep = new Set(dates);
  return bars.filter((bar) => keep.has(bar.date.slice(0, 10)));
}
