/**
 * End-to-end run: raw events and leaderboards in, ranked player data out
 */

import type {
  BattedBallStats,
  BatterRolling,
  EngineConfig,
  PlayerDataOutput,
  ProgressCallback,
  RawPitchEvent,
  SeasonExpectedStats,
} from './types.js';
import { resolveConfig } from './config.js';
import { batterTeams, groupByBatter, toOrderedPlateAppearances } from './preprocess.js';
import { computeRollingMetrics } from './rolling.js';
import { buildPlayerRecords, rankPlayers } from './merge.js';

export interface PlayerDataInput {
  season: number;
  expectedStats: readonly SeasonExpectedStats[];
  /** null when the batted-ball leaderboard could not be obtained */
  battedBall: readonly BattedBallStats[] | null;
  /** null when pitch-level data could not be obtained; output is then season-only */
  events: readonly RawPitchEvent[] | null;
}

export interface PlayerDataOptions {
  config?: Partial<EngineConfig>;
  onProgress?: ProgressCallback;
  /** Clock for generatedAt (default: current time) */
  now?: () => Date;
}

/**
 * Build the ranked player dataset for a season
 *
 * @throws Error only for an invalid config
 *
 * @example
 * ```ts
 * const output = buildPlayerData(
 *   { season: 2024, expectedStats, battedBall, events },
 *   { onProgress: (done, total) => console.log(`${done}/${total}`) }
 * );
 * console.log(output.players[0].name); // most underperforming batter
 * ```
 */
export function buildPlayerData(
  input: PlayerDataInput,
  options: PlayerDataOptions = {}
): PlayerDataOutput {
  const config = resolveConfig(options.config);
  const now = options.now ?? (() => new Date());

  let rolling = new Map<number, BatterRolling>();
  let teams = new Map<number, string>();

  if (input.events) {
    // One parse and sort serves both the team lookup and the rolling series
    const ordered = toOrderedPlateAppearances(input.events);
    teams = batterTeams(ordered);
    rolling = computeRollingMetrics(groupByBatter(ordered), config, options.onProgress);
  }

  const players = rankPlayers(
    buildPlayerRecords(
      {
        expectedStats: input.expectedStats,
        battedBall: input.battedBall,
        rolling,
        teams,
      },
      config
    )
  );

  return {
    generatedAt: now().toISOString(),
    season: input.season,
    totalPlayers: players.length,
    minPa: config.minPa,
    rollingWindows: [...config.rollingWindows],
    players,
  };
}
