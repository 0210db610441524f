/**
 * Trend Sampler
 *
 * Reduces a rolling series of arbitrary length to a short, evenly spaced
 * sequence for charts and side-by-side comparison.
 */

import type { TrendSample } from './types.js';
import { roundTo } from './utils.js';

const TREND_DECIMALS = 3;

/**
 * Pick evenly spaced indices across [0, count - 1], first and last included
 *
 * @param count - Number of defined positions in the series
 * @param points - Maximum number of indices to return
 * @returns Every index when count < points, otherwise exactly `points` indices
 *
 * @example
 * ```ts
 * sampleIndices(5, 3);  // [0, 2, 4]
 * sampleIndices(2, 20); // [0, 1]
 * ```
 */
export function sampleIndices(count: number, points: number): number[] {
  if (count <= 0 || points <= 0) return [];

  if (count < points) {
    return Array.from({ length: count }, (_, i) => i);
  }

  if (points === 1) return [0];

  const last = count - 1;
  return Array.from({ length: points }, (_, i) => Math.round((i * last) / (points - 1)));
}

/**
 * Sample the realized and expected series at the same positions
 *
 * Positions where either ratio is undefined are dropped before sampling,
 * so both trends always have the same length and the differential trend is
 * the elementwise difference of the other two.
 */
export function sampleTrend(
  woba: readonly (number | null)[],
  xwoba: readonly (number | null)[],
  points: number
): TrendSample {
  const definedWoba: number[] = [];
  const definedXwoba: number[] = [];

  const length = Math.min(woba.length, xwoba.length);
  for (let i = 0; i < length; i++) {
    const realized = woba[i];
    const expected = xwoba[i];
    if (realized === null || expected === null) continue;
    definedWoba.push(realized);
    definedXwoba.push(expected);
  }

  const indices = sampleIndices(definedWoba.length, points);
  const trendWoba = indices.map((i) => roundTo(definedWoba[i], TREND_DECIMALS));
  const trendXwoba = indices.map((i) => roundTo(definedXwoba[i], TREND_DECIMALS));
  const trendDiff = trendWoba.map((value, i) => roundTo(value - trendXwoba[i], TREND_DECIMALS));

  return { trendWoba, trendXwoba, trendDiff };
}
