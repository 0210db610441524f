import { describe, it, expect } from 'vitest';
import type { PlayerDataOutput, PlayerRecord } from '@underrated/model';
import { toPlayerDataJson, toPlayerJson } from './serialize.js';

const base: PlayerRecord = {
  playerId: 100001,
  name: 'Jane Doe',
  team: 'SEA',
  pa: 612,
  battingAvg: 0.281,
  woba: 0.362,
  xwoba: 0.348,
  diffSeason: 0.014,
  xba: 0.265,
  xslg: 0.455,
  diffRollingOba: -0.014,
};

describe('toPlayerJson', () => {
  it('should map season fields to their output keys', () => {
    expect(toPlayerJson(base)).toEqual({
      player_id: 100001,
      name: 'Jane Doe',
      team: 'SEA',
      pa: 612,
      batting_avg: 0.281,
      wOBA: 0.362,
      xwOBA: 0.348,
      diff_season: 0.014,
      xBA: 0.265,
      xSLG: 0.455,
      diff_rolling_OBA: -0.014,
    });
  });

  it('should leave out batted-ball and rolling keys when the blocks are absent', () => {
    const json = toPlayerJson(base);
    expect('exit_velocity' in json).toBe(false);
    expect('rolling' in json).toBe(false);
    expect('total_pa_events' in json).toBe(false);
  });

  it('should keep null batted-ball values when the block exists', () => {
    const json = toPlayerJson({
      ...base,
      battedBall: {
        exitVelocity: 91.3,
        launchAngle: null,
        hardHitPct: 48.2,
        barrelPct: 11.5,
        maxExitVelocity: 114.2,
      },
    });
    expect(json.exit_velocity).toBe(91.3);
    expect('launch_angle' in json).toBe(true);
    expect(json.launch_angle).toBeNull();
    expect(json.hard_hit_pct).toBe(48.2);
    expect(json.barrel_pct).toBe(11.5);
    expect(json.max_exit_velocity).toBe(114.2);
  });

  it('should map every rolling window', () => {
    const json = toPlayerJson({
      ...base,
      totalPaEvents: 120,
      diffRollingOba: -0.05,
      rolling: {
        '50': {
          rollingWoba: 0.3,
          rollingXwoba: 0.35,
          diffRollingOba: -0.05,
          trendWoba: [0.31, 0.3],
          trendXwoba: [0.33, 0.35],
          trendDiff: [-0.02, -0.05],
        },
        '100': {
          rollingWoba: 0.32,
          rollingXwoba: 0.34,
          diffRollingOba: -0.02,
          trendWoba: [0.32],
          trendXwoba: [0.34],
          trendDiff: [-0.02],
        },
      },
    });

    expect(json.total_pa_events).toBe(120);
    expect(json.rolling).toEqual({
      '50': {
        rolling_woba: 0.3,
        rolling_xwoba: 0.35,
        diff_rolling_OBA: -0.05,
        trend_woba: [0.31, 0.3],
        trend_xwoba: [0.33, 0.35],
        trend_diff: [-0.02, -0.05],
      },
      '100': {
        rolling_woba: 0.32,
        rolling_xwoba: 0.34,
        diff_rolling_OBA: -0.02,
        trend_woba: [0.32],
        trend_xwoba: [0.34],
        trend_diff: [-0.02],
      },
    });
  });
});

describe('toPlayerDataJson', () => {
  it('should map run metadata and keep player order', () => {
    const output: PlayerDataOutput = {
      generatedAt: '2024-09-30T12:00:00.000Z',
      season: 2024,
      totalPlayers: 2,
      minPa: 50,
      rollingWindows: [50, 100, 250],
      players: [base, { ...base, playerId: 100002, diffRollingOba: 0.01 }],
    };

    const json = toPlayerDataJson(output);

    expect(json.generated_at).toBe('2024-09-30T12:00:00.000Z');
    expect(json.season).toBe(2024);
    expect(json.total_players).toBe(2);
    expect(json.min_pa).toBe(50);
    expect(json.rolling_windows).toEqual([50, 100, 250]);
    expect(json.players.map((p) => p.player_id)).toEqual([100001, 100002]);
  });
});
