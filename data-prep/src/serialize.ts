/**
 * JSON layout of player_data.json, as read by the dashboard
 */

import type { PlayerDataOutput, PlayerRecord, WindowResult } from '@underrated/model';

export interface WindowJson {
  rolling_woba: number | null;
  rolling_xwoba: number | null;
  diff_rolling_OBA: number | null;
  trend_woba: number[];
  trend_xwoba: number[];
  trend_diff: number[];
}

export interface PlayerJson {
  player_id: number;
  name: string;
  team: string;
  pa: number;
  batting_avg: number | null;
  wOBA: number | null;
  xwOBA: number | null;
  diff_season: number | null;
  xBA: number | null;
  xSLG: number | null;
  exit_velocity?: number | null;
  launch_angle?: number | null;
  hard_hit_pct?: number | null;
  barrel_pct?: number | null;
  max_exit_velocity?: number | null;
  rolling?: Record<string, WindowJson>;
  total_pa_events?: number;
  diff_rolling_OBA: number;
}

export interface PlayerDataJson {
  generated_at: string;
  season: number;
  total_players: number;
  min_pa: number;
  rolling_windows: number[];
  players: PlayerJson[];
}

function toWindowJson(window: WindowResult): WindowJson {
  return {
    rolling_woba: window.rollingWoba,
    rolling_xwoba: window.rollingXwoba,
    diff_rolling_OBA: window.diffRollingOba,
    trend_woba: window.trendWoba,
    trend_xwoba: window.trendXwoba,
    trend_diff: window.trendDiff,
  };
}

export function toPlayerJson(player: PlayerRecord): PlayerJson {
  const json: PlayerJson = {
    player_id: player.playerId,
    name: player.name,
    team: player.team,
    pa: player.pa,
    batting_avg: player.battingAvg,
    wOBA: player.woba,
    xwOBA: player.xwoba,
    diff_season: player.diffSeason,
    xBA: player.xba,
    xSLG: player.xslg,
    diff_rolling_OBA: player.diffRollingOba,
  };

  if (player.battedBall) {
    json.exit_velocity = player.battedBall.exitVelocity;
    json.launch_angle = player.battedBall.launchAngle;
    json.hard_hit_pct = player.battedBall.hardHitPct;
    json.barrel_pct = player.battedBall.barrelPct;
    json.max_exit_velocity = player.battedBall.maxExitVelocity;
  }

  if (player.rolling) {
    const rolling: Record<string, WindowJson> = {};
    for (const [window, result] of Object.entries(player.rolling)) {
      rolling[window] = toWindowJson(result);
    }
    json.rolling = rolling;
    json.total_pa_events = player.totalPaEvents;
  }

  return json;
}

export function toPlayerDataJson(output: PlayerDataOutput): PlayerDataJson {
  return {
    generated_at: output.generatedAt,
    season: output.season,
    total_players: output.totalPlayers,
    min_pa: output.minPa,
    rolling_windows: output.rollingWindows,
    players: output.players.map(toPlayerJson),
  };
}
