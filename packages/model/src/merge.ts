/**
 * Merge & Ranking Engine
 *
 * Combines season expected stats, batted-ball quality, rolling windows and
 * team affiliation into one record per qualified batter, then ranks them.
 */

import type {
  BattedBallBlock,
  BattedBallStats,
  BatterRolling,
  EngineConfig,
  PlayerRecord,
  SeasonExpectedStats,
  WindowResult,
} from './types.js';
import { formatNameFirstLast, safeRound } from './utils.js';

export interface MergeInput {
  expectedStats: readonly SeasonExpectedStats[];
  /** null when the batted-ball leaderboard could not be obtained */
  battedBall: readonly BattedBallStats[] | null;
  rolling: ReadonlyMap<number, BatterRolling>;
  teams: ReadonlyMap<number, string>;
}

/**
 * First window in preference order with a defined headline differential
 */
export function selectPrimaryDiff(
  windows: Readonly<Record<string, WindowResult>>,
  order: readonly number[]
): number | null {
  for (const window of order) {
    const result = windows[String(window)];
    if (result && result.diffRollingOba !== null) {
      return result.diffRollingOba;
    }
  }
  return null;
}

/**
 * Season differential in wOBA - xwOBA convention
 *
 * The provider reports xwOBA - wOBA. This is the only place the sign is flipped.
 */
export function seasonFallbackDiff(stats: SeasonExpectedStats): number | null {
  if (stats.estWobaMinusWobaDiff === null) return null;
  return safeRound(-stats.estWobaMinusWobaDiff, 3);
}

function toBattedBallBlock(stats: BattedBallStats): BattedBallBlock {
  return {
    exitVelocity: safeRound(stats.avgHitSpeed, 1),
    launchAngle: safeRound(stats.avgHitAngle, 1),
    hardHitPct: safeRound(stats.ev95Percent, 1),
    barrelPct: safeRound(stats.brlPercent, 1),
    maxExitVelocity: safeRound(stats.maxHitSpeed, 1),
  };
}

/**
 * Build a single merged record
 */
export function buildPlayerRecord(
  stats: SeasonExpectedStats,
  battedBall: BattedBallStats | undefined,
  rolling: BatterRolling | undefined,
  team: string | undefined,
  primaryWindowOrder: readonly number[]
): PlayerRecord {
  const rollingDiff = rolling ? selectPrimaryDiff(rolling.windows, primaryWindowOrder) : null;
  const diffRollingOba = rollingDiff ?? seasonFallbackDiff(stats) ?? 0;

  return {
    playerId: stats.playerId,
    name: formatNameFirstLast(stats.name),
    team: team ?? '',
    pa: stats.pa,
    battingAvg: safeRound(stats.ba, 3),
    woba: safeRound(stats.woba, 3),
    xwoba: safeRound(stats.estWoba, 3),
    diffSeason: safeRound(stats.estWobaMinusWobaDiff, 3),
    xba: safeRound(stats.estBa, 3),
    xslg: safeRound(stats.estSlg, 3),
    ...(battedBall ? { battedBall: toBattedBallBlock(battedBall) } : {}),
    ...(rolling ? { rolling: rolling.windows, totalPaEvents: rolling.totalPa } : {}),
    diffRollingOba,
  };
}

/**
 * Merge every qualified batter into an output record (unranked)
 */
export function buildPlayerRecords(
  input: MergeInput,
  config: Pick<EngineConfig, 'minPa' | 'primaryWindowOrder'>
): PlayerRecord[] {
  const battedBallById = new Map<number, BattedBallStats>();
  for (const row of input.battedBall ?? []) {
    // First row wins when the leaderboard repeats a player
    if (!battedBallById.has(row.playerId)) {
      battedBallById.set(row.playerId, row);
    }
  }

  const records: PlayerRecord[] = [];
  for (const stats of input.expectedStats) {
    if (stats.pa < config.minPa) continue;

    records.push(
      buildPlayerRecord(
        stats,
        battedBallById.get(stats.playerId),
        input.rolling.get(stats.playerId),
        input.teams.get(stats.playerId),
        config.primaryWindowOrder
      )
    );
  }

  return records;
}

/**
 * Sort by primary differential, ascending. Returns a new array.
 */
export function rankPlayers(records: readonly PlayerRecord[]): PlayerRecord[] {
  return [...records].sort((a, b) => a.diffRollingOba - b.diffRollingOba);
}
