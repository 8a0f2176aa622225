/**
 * Pure chart builders: a price series in, a figure plus caption out.
 * No I/O here; the visualization tools fetch the series and call these.
 */

import type { PriceBar } from '../tools/market/yahoo-client.js';
import type { Period } from '../tools/market/periods.js';
import { formatInteger } from '../tools/market/format.js';
import type { BarTrace, ChartPayload, LineTrace } from './schema.js';

export interface TickerSeries {
  ticker: string;
  bars: PriceBar[];
}

function assertBars(ticker: string, bars: PriceBar[]): void {
  if (bars.length === 0) {
    throw new RangeError(`Empty price series for ${ticker}`);
  }
}

/** Percentage return of each close relative to the first close, 2 decimals. */
export function percentReturns(bars: PriceBar[]): number[] {
  const first = bars[0]?.close;
  if (!first) return bars.map(() => 0);
  return bars.map((bar) => Math.round((bar.close / first - 1) * 10000) / 100);
}

export function averageVolume(bars: PriceBar[]): number {
  if (bars.length === 0) return 0;
  return bars.reduce((sum, bar) => sum + bar.volume, 0) / bars.length;
}

export function buildCandlestickChart(ticker: string, period: Period, bars: PriceBar[]): ChartPayload {
  assertBars(ticker, bars);
  return {
    message: `Created price chart for ${ticker} over ${period}. The chart shows opening, high, low, and closing prices.`,
    figure: {
      chartKind: 'candlestick',
      data: [
        {
          type: 'candlestick',
          name: ticker,
          x: bars.map((b) => b.date),
          open: bars.map((b) => b.open),
          high: bars.map((b) => b.high),
          low: bars.map((b) => b.low),
          close: bars.map((b) => b.close),
        },
      ],
      layout: {
        title: { text: `${ticker} Stock Price - ${period}` },
        xaxis: { title: { text: 'Date' }, rangeslider: { visible: false } },
        yaxis: { title: { text: 'Price (USD)' } },
        height: 500,
      },
    },
  };
}

/** One line per series; series without bars are skipped. */
export function buildComparisonChart(series: TickerSeries[], period: Period): ChartPayload {
  const plotted = series.filter((s) => s.bars.length > 0);
  if (plotted.length === 0) {
    throw new RangeError(`Empty price series for ${series.map((s) => s.ticker).join(', ')}`);
  }

  const traces = plotted.map((s): LineTrace => ({
    type: 'scatter',
    mode: 'lines',
    name: s.ticker,
    x: s.bars.map((b) => b.date),
    y: percentReturns(s.bars),
    line: { width: 2 },
  }));

  const names = plotted.map((s) => s.ticker).join(', ');
  return {
    message: `Created comparison chart for ${names} over ${period}. Shows percentage return from start of period.`,
    figure: {
      chartKind: 'comparison',
      data: traces,
      layout: {
        title: { text: `Stock Performance Comparison - ${period}` },
        xaxis: { title: { text: 'Date' } },
        yaxis: { title: { text: 'Return (%)' } },
        height: 500,
        hovermode: 'x unified',
      },
    },
  };
}

function barColor(bar: PriceBar): 'red' | 'green' {
  return bar.close < bar.open ? 'red' : 'green';
}

/** Daily volume bars, red on down days (close below open), green otherwise. */
export function buildVolumeChart(ticker: string, period: Period, bars: PriceBar[]): ChartPayload {
  assertBars(ticker, bars);
  const trace: BarTrace = {
    type: 'bar',
    name: 'Volume',
    x: bars.map((b) => b.date),
    y: bars.map((b) => b.volume),
    marker: { color: bars.map(barColor) },
  };

  return {
    message: `Created volume chart for ${ticker} over ${period}. Average daily volume: ${formatInteger(averageVolume(bars))} shares.`,
    figure: {
      chartKind: 'volume',
      data: [trace],
      layout: {
        title: { text: `${ticker} Trading Volume - ${period}` },
        xaxis: { title: { text: 'Date' } },
        yaxis: { title: { text: 'Volume' } },
        height: 400,
      },
    },
  };
}
