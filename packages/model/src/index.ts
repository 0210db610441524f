/**
 * @underrated/model - Rolling wOBA/xwOBA differential engine
 *
 * Turns pitch-level Statcast rows into per-batter rolling differentials
 * (actual minus expected outcome quality), merges them with season
 * leaderboards, and ranks the result.
 */

// Core types
export type {
  RawValue,
  RawPitchEvent,
  PlateAppearance,
  RollingSeries,
  TrendSample,
  WindowResult,
  BatterRolling,
  SeasonExpectedStats,
  BattedBallStats,
  BattedBallBlock,
  PlayerRecord,
  PlayerDataOutput,
  EngineConfig,
  ProgressCallback,
} from './types.js';

// Configuration
export { DEFAULT_CONFIG, resolveConfig } from './config.js';

// Pipeline
export { buildPlayerData } from './pipeline.js';
export type { PlayerDataInput, PlayerDataOptions } from './pipeline.js';

// Stages
export {
  comparePlateAppearances,
  toPlateAppearance,
  toOrderedPlateAppearances,
  groupByBatter,
  preprocessEvents,
  battingTeam,
  batterTeams,
  extractBatterTeams,
} from './preprocess.js';
export {
  rollingSums,
  computeRollingSeries,
  computeWindowResult,
  computeBatterRolling,
  computeRollingMetrics,
} from './rolling.js';
export { sampleIndices, sampleTrend } from './trend.js';
export {
  selectPrimaryDiff,
  seasonFallbackDiff,
  buildPlayerRecord,
  buildPlayerRecords,
  rankPlayers,
} from './merge.js';
export type { MergeInput } from './merge.js';

// Leaderboard rows
export {
  NAME_COLUMN,
  parseSeasonExpectedRow,
  parseSeasonExpectedRows,
  parseBattedBallRow,
  parseBattedBallRows,
} from './rows.js';
export type { LeaderboardRow } from './rows.js';

// Utility functions
export {
  parseOptionalNumber,
  parseOptionalInteger,
  roundTo,
  safeRound,
  formatNameFirstLast,
} from './utils.js';
