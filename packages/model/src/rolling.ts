/**
 * Rolling Window Aggregator
 *
 * Trailing-window wOBA and xwOBA over the most recent N plate appearances,
 * per batter and per window size.
 */

import type {
  BatterRolling,
  EngineConfig,
  PlateAppearance,
  ProgressCallback,
  RollingSeries,
  WindowResult,
} from './types.js';
import { sampleTrend } from './trend.js';
import { safeRound } from './utils.js';

/**
 * Trailing sum over exactly `window` consecutive values
 *
 * Positions before the first full window are null; there is no partial-window output.
 */
export function rollingSums(values: readonly number[], window: number): (number | null)[] {
  const sums: (number | null)[] = new Array<number | null>(values.length).fill(null);
  let running = 0;

  for (let i = 0; i < values.length; i++) {
    running += values[i];
    if (i >= window) {
      running -= values[i - window];
    }
    if (i >= window - 1) {
      sums[i] = running;
    }
  }

  return sums;
}

function ratio(numerator: number | null, denominator: number | null): number | null {
  if (numerator === null || denominator === null || denominator === 0) return null;
  return numerator / denominator;
}

/**
 * Rolling wOBA, xwOBA and their differential at every position
 *
 * Both ratios share the same trailing wOBA denominator.
 */
export function computeRollingSeries(
  pas: readonly PlateAppearance[],
  window: number
): RollingSeries {
  const wobaSums = rollingSums(pas.map((pa) => pa.wobaValue), window);
  const denomSums = rollingSums(pas.map((pa) => pa.wobaDenom), window);
  const xwobaSums = rollingSums(pas.map((pa) => pa.xwobaValue), window);

  const woba: (number | null)[] = [];
  const xwoba: (number | null)[] = [];
  const diff: (number | null)[] = [];

  for (let i = 0; i < pas.length; i++) {
    const realized = ratio(wobaSums[i], denomSums[i]);
    const expected = ratio(xwobaSums[i], denomSums[i]);
    woba.push(realized);
    xwoba.push(expected);
    diff.push(realized !== null && expected !== null ? realized - expected : null);
  }

  return { woba, xwoba, diff };
}

function latest(series: readonly (number | null)[]): number | null {
  return series.length > 0 ? series[series.length - 1] : null;
}

/**
 * Headline figures and trends for one window
 */
export function computeWindowResult(
  pas: readonly PlateAppearance[],
  window: number,
  trendPoints: number
): WindowResult {
  const series = computeRollingSeries(pas, window);

  return {
    rollingWoba: safeRound(latest(series.woba), 3),
    rollingXwoba: safeRound(latest(series.xwoba), 3),
    diffRollingOba: safeRound(latest(series.diff), 3),
    ...sampleTrend(series.woba, series.xwoba, trendPoints),
  };
}

/**
 * Rolling results for a single batter
 *
 * @param pas - The batter's plate appearances in chronological order
 * @returns null when the batter has fewer than `minPa` plate appearances
 *   or no configured window fits
 */
export function computeBatterRolling(
  batterId: number,
  pas: readonly PlateAppearance[],
  config: Pick<EngineConfig, 'rollingWindows' | 'trendPoints' | 'minPa'>
): BatterRolling | null {
  const totalPa = pas.length;
  if (totalPa < config.minPa) return null;

  const windows: Record<string, WindowResult> = {};
  for (const window of config.rollingWindows) {
    if (totalPa < window) continue;
    windows[String(window)] = computeWindowResult(pas, window, config.trendPoints);
  }

  if (Object.keys(windows).length === 0) return null;

  return { batterId, totalPa, windows };
}

/**
 * Rolling results for every batter
 *
 * Each batter depends only on its own plate appearances; progress is reported
 * through `onProgress` and never feeds back into the results.
 */
export function computeRollingMetrics(
  grouped: ReadonlyMap<number, readonly PlateAppearance[]>,
  config: EngineConfig,
  onProgress?: ProgressCallback
): Map<number, BatterRolling> {
  const results = new Map<number, BatterRolling>();
  const total = grouped.size;
  let processed = 0;

  for (const [batterId, pas] of grouped) {
    const rolling = computeBatterRolling(batterId, pas, config);
    if (rolling) {
      results.set(batterId, rolling);
    }

    processed++;
    if (onProgress && (processed % config.progressInterval === 0 || processed === total)) {
      onProgress(processed, total);
    }
  }

  return results;
}
