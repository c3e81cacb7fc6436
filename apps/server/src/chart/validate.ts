import type { Ohlc, Series } from "@shared/types";

import { DataValidationError, type BarViolation } from "./errors";

/**
 * First relation the bar breaks, checked in a fixed order, or null.
 */
export function findViolation(bar: Ohlc): BarViolation | null {
  if (bar.open > bar.high) return "open>high";
  if (bar.close > bar.high) return "close>high";
  if (bar.low > bar.high) return "low>high";
  if (bar.open < bar.low) return "open<low";
  if (bar.close < bar.low) return "close<low";
  return null;
}

/**
 * Throws on an empty series or on the first bar where
 * low <= open <= high and low <= close <= high does not hold.
 * Later bars are not examined.
 */
export function validateSeries<T extends Ohlc>(series: Series<T>): void {
  if (series.length === 0) {
    throw new DataValidationError("empty");
  }

  series.forEach((bar, index) => {
    const violation = findViolation(bar);
    if (violation) {
      throw new DataValidationError(violation, index);
    }
  });
}
