import type { Ohlc, Series } from "./types";
import type { BandPoint } from "./types/chart";

/**
 * Arithmetic mean. Empty input yields 0 so callers never see NaN from a
 * zero-length window.
 */
export function mean(values: readonly number[]): number {
  if (values.length === 0) return 0;

  let sum = 0;
  for (const value of values) {
    sum += value;
  }
  return sum / values.length;
}

/**
 * Sample standard deviation (n - 1 denominator).
 *
 * @returns 0 when there are fewer than two values
 */
export function sampleStdDev(values: readonly number[]): number {
  const n = values.length;
  if (n <= 1) return 0;

  const avg = mean(values);
  let squaredDiffSum = 0;
  for (const value of values) {
    const diff = value - avg;
    squaredDiffSum += diff * diff;
  }

  return Math.sqrt(squaredDiffSum / (n - 1));
}

/** Representative price of a bar: midpoint of its range. */
export function medianPrice(bar: Ohlc): number {
  return (bar.high + bar.low) / 2;
}

export function medianList(bars: Series): number[] {
  return bars.map(medianPrice);
}

/**
 * Bollinger Bands over the representative price.
 *
 * Band point `j` covers the trailing window `[j, j + periods)` and belongs to
 * bar `j + periods`, so a series needs more than `periods` bars to produce
 * anything.
 *
 * @param periods - Window length
 * @param deviations - Multiplier applied to the sample standard deviation
 */
export function bollingerBands<T extends Ohlc>(
  series: Series<T>,
  periods: number,
  deviations: number,
): BandPoint[] {
  if (periods <= 0) return [];

  const bands: BandPoint[] = [];

  for (let i = periods; i < series.length; i++) {
    const medians = medianList(series.slice(i - periods, i));
    const scaledStdDev = sampleStdDev(medians) * deviations;
    const movingAvg = mean(medians);

    bands.push({
      upper: movingAvg + scaledStdDev,
      median: movingAvg,
      lower: movingAvg - scaledStdDev,
    });
  }

  return bands;
}

/**
 * Calculate EMA (Exponential Moving Average) over a list of values.
 *
 * @returns Values aligned to the input (NaN for warmup period)
 *
 * Warmup: First (period-1) values will be NaN, seeded by the SMA of the first
 * `period` values at index period-1
 */
export function emaSeries(values: readonly number[], period: number): number[] {
  if (values.length === 0 || period <= 0) return [];

  const result: number[] = new Array<number>(values.length).fill(NaN);
  if (values.length < period) return result;

  const multiplier = 2 / (period + 1);
  let prev = mean(values.slice(0, period));
  result[period - 1] = prev;

  for (let i = period; i < values.length; i++) {
    const value = values[i];
    if (value === undefined) continue;
    prev = (value - prev) * multiplier + prev;
    result[i] = prev;
  }

  return result;
}
