import { describe, it, expect, vi } from 'vitest';
import {
  rollingSums,
  computeRollingSeries,
  computeBatterRolling,
  computeRollingMetrics,
} from './rolling.js';
import { preprocessEvents } from './preprocess.js';
import { resolveConfig } from './config.js';
import { makeBatterEvents } from '../test/helpers/events.js';
import type { PlateAppearance } from './types.js';

function plateAppearances(...args: Parameters<typeof makeBatterEvents>): PlateAppearance[] {
  const grouped = preprocessEvents(makeBatterEvents(...args));
  return grouped.get(args[0]) ?? [];
}

describe('rollingSums', () => {
  it('should only produce full windows', () => {
    expect(rollingSums([1, 2, 3, 4], 2)).toEqual([null, 3, 5, 7]);
    expect(rollingSums([1, 2, 3], 3)).toEqual([null, null, 6]);
  });

  it('should be all null when the window is longer than the series', () => {
    expect(rollingSums([1, 2], 3)).toEqual([null, null]);
  });
});

describe('computeRollingSeries', () => {
  it('should divide both sums by the same trailing weight', () => {
    const pas = plateAppearances(1, 4, {
      woba: (i) => [0.9, 0, 0.7, 0][i],
      xwoba: (i) => [0.5, 0.1, null, 0.2][i],
      denom: (i) => [1, 1, 1, 0][i],
    });

    const series = computeRollingSeries(pas, 2);

    expect(series.woba[0]).toBeNull();
    expect(series.woba[1]).toBeCloseTo(0.45, 10);
    expect(series.xwoba[1]).toBeCloseTo(0.3, 10);
    expect(series.diff[1]).toBeCloseTo(0.15, 10);
    // Position 2: the walk (0.7) has no estimate, so it counts as its own expected value
    expect(series.woba[2]).toBeCloseTo(0.35, 10);
    expect(series.xwoba[2]).toBeCloseTo(0.4, 10);
    // Position 3: weights 1 + 0
    expect(series.woba[3]).toBeCloseTo(0.7, 10);
    expect(series.xwoba[3]).toBeCloseTo(0.9, 10);
  });

  it('should leave ratios undefined when the weight sum is zero', () => {
    const pas = plateAppearances(1, 3, { woba: () => 0, denom: () => 0 });
    const series = computeRollingSeries(pas, 2);

    expect(series.woba).toEqual([null, null, null]);
    expect(series.xwoba).toEqual([null, null, null]);
    expect(series.diff).toEqual([null, null, null]);
  });

  it('should use exactly the last `window` plate appearances', () => {
    const woba = (i: number) => ((i * 37) % 11) / 10;
    const xwoba = (i: number) => (i % 3 === 0 ? null : ((i * 13) % 7) / 10);
    const denom = (i: number) => (i % 9 === 0 ? 0 : 1);
    const pas = plateAppearances(1, 137, { woba, xwoba, denom });

    const window = 100;
    const series = computeRollingSeries(pas, window);

    const tail = pas.slice(-window);
    const wobaSum = tail.reduce((sum, pa) => sum + pa.wobaValue, 0);
    const xwobaSum = tail.reduce((sum, pa) => sum + pa.xwobaValue, 0);
    const denomSum = tail.reduce((sum, pa) => sum + pa.wobaDenom, 0);

    const last = pas.length - 1;
    expect(series.woba[last]).toBeCloseTo(wobaSum / denomSum, 10);
    expect(series.xwoba[last]).toBeCloseTo(xwobaSum / denomSum, 10);
    expect(series.diff[last]).toBeCloseTo(wobaSum / denomSum - xwobaSum / denomSum, 10);
  });
});

describe('computeBatterRolling', () => {
  const config = resolveConfig();

  it('should match the alternating 60 PA scenario', () => {
    const pas = plateAppearances(1, 60, {
      woba: (i) => (i % 2 === 0 ? 0.3 : 0),
      xwoba: () => 0.31,
    });

    const rolling = computeBatterRolling(1, pas, config);

    expect(rolling).not.toBeNull();
    expect(rolling!.totalPa).toBe(60);
    expect(Object.keys(rolling!.windows)).toEqual(['50']);

    const window = rolling!.windows['50'];
    expect(window.rollingWoba).toBe(0.15);
    expect(window.rollingXwoba).toBe(0.31);
    expect(window.diffRollingOba).toBe(-0.16);
    // 11 full windows (positions 49..59)
    expect(window.trendWoba).toHaveLength(11);
    expect(window.trendXwoba).toEqual(new Array(11).fill(0.31));
  });

  it('should exclude batters below the minimum', () => {
    const pas = plateAppearances(1, 49, { woba: () => 0.3 });
    expect(computeBatterRolling(1, pas, config)).toBeNull();
  });

  it('should include a batter with exactly the minimum', () => {
    const pas = plateAppearances(1, 50, { woba: () => 0.3 });
    const rolling = computeBatterRolling(1, pas, config);

    expect(rolling).not.toBeNull();
    expect(Object.keys(rolling!.windows)).toEqual(['50']);
    expect(rolling!.windows['50'].trendWoba).toEqual([0.3]);
  });

  it('should cap trends at the configured number of points', () => {
    const pas = plateAppearances(1, 300, { woba: (i) => (i % 4) / 10, xwoba: () => 0.2 });
    const rolling = computeBatterRolling(1, pas, config);

    expect(Object.keys(rolling!.windows)).toEqual(['50', '100', '250']);
    for (const window of Object.values(rolling!.windows)) {
      expect(window.trendWoba).toHaveLength(20);
      expect(window.trendXwoba).toHaveLength(20);
      expect(window.trendDiff).toHaveLength(20);
    }
  });

  it('should report absent headline values instead of zero', () => {
    const pas = plateAppearances(1, 60, { woba: () => 0, denom: () => 0 });
    const rolling = computeBatterRolling(1, pas, config);

    expect(rolling!.windows['50']).toEqual({
      rollingWoba: null,
      rollingXwoba: null,
      diffRollingOba: null,
      trendWoba: [],
      trendXwoba: [],
      trendDiff: [],
    });
  });

  it('should return null when no configured window fits', () => {
    const pas = plateAppearances(1, 60, { woba: () => 0.3 });
    const rolling = computeBatterRolling(1, pas, { ...config, rollingWindows: [100, 250] });
    expect(rolling).toBeNull();
  });
});

describe('computeRollingMetrics', () => {
  it('should compute one entry per qualified batter', () => {
    const grouped = preprocessEvents([
      ...makeBatterEvents(1, 60, { woba: () => 0.3 }),
      ...makeBatterEvents(2, 10, { woba: () => 0.3 }),
      ...makeBatterEvents(3, 120, { woba: () => 0.4, xwoba: () => 0.35 }),
    ]);

    const results = computeRollingMetrics(grouped, resolveConfig());

    expect([...results.keys()].sort()).toEqual([1, 3]);
    expect(Object.keys(results.get(3)!.windows)).toEqual(['50', '100']);
    expect(results.get(3)!.windows['100'].diffRollingOba).toBe(0.05);
  });

  it('should report progress without affecting results', () => {
    const grouped = preprocessEvents([
      ...makeBatterEvents(1, 50, { woba: () => 0.3 }),
      ...makeBatterEvents(2, 50, { woba: () => 0.3 }),
      ...makeBatterEvents(3, 50, { woba: () => 0.3 }),
    ]);
    const config = resolveConfig({ progressInterval: 2 });
    const onProgress = vi.fn();

    const withProgress = computeRollingMetrics(grouped, config, onProgress);
    const withoutProgress = computeRollingMetrics(grouped, config);

    expect(onProgress.mock.calls).toEqual([
      [2, 3],
      [3, 3],
    ]);
    expect(withProgress).toEqual(withoutProgress);
  });
});
