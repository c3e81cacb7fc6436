/**
 * Anything exposing the four OHLC prices is a bar.
 */
export interface Ohlc {
  open: number;
  high: number;
  low: number;
  close: number;
}

/** Oldest first; bar `i` sits at `i * timeUnits` seconds. */
export type Series<T extends Ohlc = Ohlc> = readonly T[];

export interface AggregateSummary {
  high: number;
  low: number;
  lastClose: number;
  range: number;
}
