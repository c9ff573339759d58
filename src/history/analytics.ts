import { HistoryError } from "./errors.js";
import type { Analytics, Bar, PriceSeries } from "./types.js";

/** Split/dividend-adjusted close where upstream supplies one, the raw close otherwise. */
export function analysisClose(bar: Bar): number {
  return bar.adjClose ?? bar.close;
}

/**
 * Arithmetic mean of closes.
 * @param bars Non-empty bar list
 */
export function averageClose(bars: Bar[]): number {
  let sum = 0;
  for (const bar of bars) sum += analysisClose(bar);
  return sum / bars.length;
}

/**
 * Population standard deviation of closes (divides by N, not N-1).
 * Two passes: mean first, then squared deviations from it.
 */
export function closeVolatility(bars: Bar[], mean: number = averageClose(bars)): number {
  let sumSq = 0;
  for (const bar of bars) {
    const d = analysisClose(bar) - mean;
    sumSq += d * d;
  }
  return Math.sqrt(sumSq / bars.length);
}

/**
 * (last close - first close) / first close.
 * A single bar has no change. A zero first close has no defined ratio and also reports 0.
 */
export function totalReturn(bars: Bar[]): number {
  if (bars.length < 2) return 0;
  const first = analysisClose(bars[0]);
  const last = analysisClose(bars[bars.length - 1]);
  if (first === 0) return 0;
  return (last - first) / first;
}

/** Index of the first bar holding the extreme close (strict comparison keeps the earliest tie). */
function extremeIndex(bars: Bar[], better: (a: number, b: number) => boolean): number {
  let best = 0;
  for (let i = 1; i < bars.length; i++) {
    if (better(analysisClose(bars[i]), analysisClose(bars[best]))) best = i;
  }
  return best;
}

/**
 * Aggregate statistics over a price series.
 * Throws EmptySeries when there are no bars: callers must be able to tell
 * "no data" apart from "a metric that happens to be zero".
 */
export function computeAnalytics(series: PriceSeries): Analytics {
  const { bars } = series;
  if (bars.length === 0) {
    throw new HistoryError(
      "EmptySeries",
      `No price data for ${series.symbol} between ${series.range.start} and ${series.range.end}`,
    );
  }

  const mean = averageClose(bars);
  const maxIdx = extremeIndex(bars, (a, b) => a > b);
  const minIdx = extremeIndex(bars, (a, b) => a < b);

  return {
    barCount: bars.length,
    averageClose: mean,
    maxClose: analysisClose(bars[maxIdx]),
    minClose: analysisClose(bars[minIdx]),
    maxCloseDate: bars[maxIdx].date,
    minCloseDate: bars[minIdx].date,
    volatility: closeVolatility(bars, mean),
    totalReturn: totalReturn(bars),
    firstDate: bars[0].date,
    lastDate: bars[bars.length - 1].date,
  };
}
