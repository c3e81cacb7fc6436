/**
 * Fractional digits needed to print multiples of `interval` exactly
 * (capped at 8).
 */
export function decimalsFor(interval: number): number {
  for (let digits = 0; digits < 8; digits++) {
    const scaled = interval * 10 ** digits;
    const whole = Math.round(scaled);
    if (whole !== 0 && Math.abs(scaled - whole) <= 1e-9 * Math.abs(scaled)) {
      return digits;
    }
  }
  return 8;
}

export function formatValue(value: number, decimals: number, prefix = "", suffix = ""): string {
  return `${prefix}${value.toFixed(decimals)}${suffix}`;
}
