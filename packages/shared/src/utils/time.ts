/**
 * Elapsed-time formatting for chart axis labels
 */

const UNITS: ReadonlyArray<readonly [suffix: string, seconds: number]> = [
  ['d', 86400],
  ['h', 3600],
  ['m', 60],
  ['s', 1],
];

/**
 * Format an elapsed duration using its two largest non-zero units.
 *
 * @example
 * formatElapsed(0);      // "0s"
 * formatElapsed(5400);   // "1h30m"
 * formatElapsed(90061);  // "1d1h"
 */
export function formatElapsed(seconds: number): string {
  let remaining = Math.max(0, Math.floor(seconds));
  if (remaining === 0) return '0s';

  const parts: string[] = [];
  for (const [suffix, size] of UNITS) {
    if (parts.length === 2) break;
    const count = Math.floor(remaining / size);
    if (count > 0) {
      parts.push(`${count}${suffix}`);
      remaining -= count * size;
    } else if (parts.length > 0) {
      // stop at the first gap so "1d0h5m" never reads as "1d5m"
      break;
    }
  }

  return parts.join('');
}
