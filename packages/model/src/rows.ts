/**
 * Leaderboard row normalization
 *
 * Provider leaderboards arrive as loosely typed rows keyed by column name.
 * These functions turn them into explicit records, with every missing or
 * unparseable numeric cell as null.
 */

import type { BattedBallStats, RawValue, SeasonExpectedStats } from './types.js';
import { parseOptionalInteger, parseOptionalNumber, parseText } from './utils.js';

/** The expected-stats leaderboard stores the name in a single combined column */
export const NAME_COLUMN = 'last_name, first_name';

export type LeaderboardRow = Record<string, RawValue>;

/**
 * Parse one row of the expected-statistics leaderboard
 *
 * @returns null when the row has no usable player_id
 */
export function parseSeasonExpectedRow(row: LeaderboardRow): SeasonExpectedStats | null {
  const playerId = parseOptionalInteger(row.player_id);
  if (playerId === null) return null;

  return {
    playerId,
    name: parseText(row[NAME_COLUMN]),
    pa: parseOptionalInteger(row.pa) ?? 0,
    ba: parseOptionalNumber(row.ba),
    woba: parseOptionalNumber(row.woba),
    estWoba: parseOptionalNumber(row.est_woba),
    estWobaMinusWobaDiff: parseOptionalNumber(row.est_woba_minus_woba_diff),
    estBa: parseOptionalNumber(row.est_ba),
    estSlg: parseOptionalNumber(row.est_slg),
  };
}

/**
 * Parse one row of the exit velocity & barrels leaderboard
 *
 * @returns null when the row has no usable player_id
 */
export function parseBattedBallRow(row: LeaderboardRow): BattedBallStats | null {
  const playerId = parseOptionalInteger(row.player_id);
  if (playerId === null) return null;

  return {
    playerId,
    avgHitSpeed: parseOptionalNumber(row.avg_hit_speed),
    avgHitAngle: parseOptionalNumber(row.avg_hit_angle),
    ev95Percent: parseOptionalNumber(row.ev95percent),
    brlPercent: parseOptionalNumber(row.brl_percent),
    maxHitSpeed: parseOptionalNumber(row.max_hit_speed),
  };
}

export function parseSeasonExpectedRows(rows: LeaderboardRow[]): SeasonExpectedStats[] {
  const parsed: SeasonExpectedStats[] = [];
  for (const row of rows) {
    const stats = parseSeasonExpectedRow(row);
    if (stats) parsed.push(stats);
  }
  return parsed;
}

export function parseBattedBallRows(rows: LeaderboardRow[]): BattedBallStats[] {
  const parsed: BattedBallStats[] = [];
  for (const row of rows) {
    const stats = parseBattedBallRow(row);
    if (stats) parsed.push(stats);
  }
  return parsed;
}
