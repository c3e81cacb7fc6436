import type { AggregateSummary, Ohlc, Series } from "@shared/types";

/**
 * Overall high, low and last close in a single pass.
 * Callers validate first; an empty series is a precondition violation.
 */
export function summarize<T extends Ohlc>(series: Series<T>): AggregateSummary {
  let high = -Infinity;
  let low = Infinity;
  let lastClose = NaN;

  for (const bar of series) {
    high = Math.max(high, bar.high);
    low = Math.min(low, bar.low);
    lastClose = bar.close;
  }

  return { high, low, lastClose, range: high - low };
}
