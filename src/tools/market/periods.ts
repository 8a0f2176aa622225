import { z } from 'zod';

export const PERIODS = ['1d', '5d', '1mo', '3mo', '6mo', '1y', '2y', '5y', '10y', 'ytd', 'max'] as const;

export type Period = (typeof PERIODS)[number];

export const PeriodSchema = z.enum(PERIODS);

export function isPeriod(value: string): value is Period {
  return (PERIODS as readonly string[]).includes(value);
}

/** Tickers are looked up uppercased and without surrounding whitespace. */
export function normalizeTicker(ticker: string): string {
  return ticker.trim().toUpperCase();
}

/**
 * Split a "TICKER" or "TICKER,PERIOD" argument. A known period suffix wins over
 * the period argument; a suffix that is not a known period is ignored.
 */
export function parseTickerArg(raw: string, period: Period | undefined, fallback: Period): { ticker: string; period: Period } {
  const [head, suffix] = raw.split(',').map(part => part.trim());
  const inline = suffix && isPeriod(suffix) ? suffix : undefined;
  return { ticker: normalizeTicker(head), period: inline ?? period ?? fallback };
}

/**
 * Normalize a ticker list. Accepts an array or a comma-separated string; a
 * trailing entry that names a period is split off and wins over the period
 * argument.
 */
export function parseTickerList(raw: string | string[], period: Period | undefined, fallback: Period): { tickers: string[]; period: Period } {
  const parts = (Array.isArray(raw) ? raw : raw.split(','))
    .map(part => part.trim())
    .filter(part => part.length > 0);

  let inline: Period | undefined;
  const last = parts[parts.length - 1];
  if (last !== undefined && isPeriod(last)) {
    inline = last;
    parts.pop();
  }

  return { tickers: parts.map(normalizeTicker), period: inline ?? period ?? fallback };
}

export interface HistoryWindow {
  period1: Date;
  interval: '5m' | '30m' | '1d' | '1wk';
  /** Trading sessions to keep from the end of the series; intraday periods only. */
  sessions?: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

// Intraday periods count trading sessions, so their lookback spans weekends and holidays.
const SESSION_LOOKBACK_DAYS: Record<'1d' | '5d', { days: number; sessions: number; interval: '5m' | '30m' }> = {
  '1d': { days: 7, sessions: 1, interval: '5m' },
  '5d': { days: 14, sessions: 5, interval: '30m' },
};

const PERIOD_DAYS: Record<Exclude<Period, '1d' | '5d' | 'ytd' | 'max'>, number> = {
  '1mo': 30,
  '3mo': 91,
  '6mo': 182,
  '1y': 365,
  '2y': 730,
  '5y': 1826,
  '10y': 3652,
};

/**
 * Start date and bar interval for a history request ending at `now`.
 * Intraday bars for 1d/5d, weekly bars from 5y up, daily otherwise.
 * 1d and 5d fetch a wider window and name how many sessions to keep.
 */
export function historyWindow(period: Period, now: Date = new Date()): HistoryWindow {
  if (period === 'ytd') {
    return { period1: new Date(Date.UTC(now.getUTCFullYear(), 0, 1)), interval: '1d' };
  }
  if (period === 'max') {
    return { period1: new Date(0), interval: '1wk' };
  }

  if (period === '1d' || period === '5d') {
    const { days, sessions, interval } = SESSION_LOOKBACK_DAYS[period];
    return { period1: new Date(now.getTime() - days * DAY_MS), interval, sessions };
  }

  const interval = period === '5y' || period === '10y' ? '1wk' : '1d';
  return { period1: new Date(now.getTime() - PERIOD_DAYS[period] * DAY_MS), interval };
}
