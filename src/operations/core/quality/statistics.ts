/**
 * Per-line ASCII statistics for quality strings
 */

import type { AsciiHistogram, LineBounds } from "../../../types";

/**
 * Compute the ASCII range and value histogram of one quality line
 *
 * The line is not validated: any characters are counted by char code.
 *
 * @param line - Quality string without its trailing newline
 * @returns Bounds and histogram, or undefined for an empty line
 *
 * @example
 * ```typescript
 * const bounds = computeLineBounds('DLXYXXRXWYYTPMLUUQWTXTRSXSWMDMTRNDNSMJFJFFRMV');
 * console.log(bounds?.min, bounds?.max); // 68 89
 * ```
 */
export function computeLineBounds(line: string): LineBounds | undefined {
  if (line.length === 0) {
    return undefined;
  }

  let min = Number.POSITIVE_INFINITY;
  let max = Number.NEGATIVE_INFINITY;
  const histogram = new Map<number, number>();

  for (let i = 0; i < line.length; i++) {
    const ascii = line.charCodeAt(i);
    if (ascii < min) min = ascii;
    if (ascii > max) max = ascii;
    histogram.set(ascii, (histogram.get(ascii) ?? 0) + 1);
  }

  return { min, max, histogram };
}

/**
 * The `n` most frequent ASCII codes of a histogram
 *
 * Codes are ordered by descending count; equal counts are ordered by
 * ascending code so the ranking never depends on insertion order.
 */
export function mostFrequentCodes(histogram: AsciiHistogram, n: number): number[] {
  return [...histogram.entries()]
    .sort(([codeA, countA], [codeB, countB]) => countB - countA || codeA - codeB)
    .slice(0, Math.max(0, n))
    .map(([code]) => code);
}
