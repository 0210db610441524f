/**
 * Core types for the rolling wOBA/xwOBA differential engine
 */

/**
 * A single untyped cell as it arrives from the provider (CSV text, JSON number, or missing)
 */
export type RawValue = string | number | null | undefined;

/**
 * One pitch row from the Statcast search export.
 * Column names follow the provider so rows can be passed through untouched.
 */
export interface RawPitchEvent {
  batter?: RawValue;
  game_date?: RawValue;
  at_bat_number?: RawValue;
  /** Plate appearance outcome; empty for pitches that did not end the PA */
  events?: RawValue;
  woba_value?: RawValue;
  woba_denom?: RawValue;
  estimated_woba_using_speedangle?: RawValue;
  inning_topbot?: RawValue;
  home_team?: RawValue;
  away_team?: RawValue;
}

/**
 * A plate-appearance-ending event after cleaning
 */
export interface PlateAppearance {
  batterId: number;
  /** YYYY-MM-DD */
  gameDate: string;
  atBatNumber: number;
  wobaValue: number;
  /** 0 or 1 */
  wobaDenom: number;
  /** Batted-ball expected value; null for strikeouts, walks and HBP */
  estimatedWoba: number | null;
  /** estimatedWoba when present, otherwise wobaValue */
  xwobaValue: number;
  inningTopBot: string;
  homeTeam: string;
  awayTeam: string;
}

/**
 * Per-position rolling series for one window size
 */
export interface RollingSeries {
  woba: (number | null)[];
  xwoba: (number | null)[];
  diff: (number | null)[];
}

/**
 * Down-sampled trend sequences. All three arrays share one index selection.
 */
export interface TrendSample {
  trendWoba: number[];
  trendXwoba: number[];
  trendDiff: number[];
}

/**
 * Headline figures and trends for one window size
 */
export interface WindowResult extends TrendSample {
  rollingWoba: number | null;
  rollingXwoba: number | null;
  /** rollingWoba - rollingXwoba */
  diffRollingOba: number | null;
}

/**
 * Rolling results for one batter, keyed by window size ("50", "100", ...)
 */
export interface BatterRolling {
  batterId: number;
  totalPa: number;
  windows: Record<string, WindowResult>;
}

/**
 * Season-level expected statistics for one batter
 */
export interface SeasonExpectedStats {
  playerId: number;
  /** Combined "Last, First" */
  name: string;
  pa: number;
  ba: number | null;
  woba: number | null;
  estWoba: number | null;
  /** Provider convention: xwOBA - wOBA */
  estWobaMinusWobaDiff: number | null;
  estBa: number | null;
  estSlg: number | null;
}

/**
 * Season-level batted-ball quality for one batter
 */
export interface BattedBallStats {
  playerId: number;
  avgHitSpeed: number | null;
  avgHitAngle: number | null;
  ev95Percent: number | null;
  brlPercent: number | null;
  maxHitSpeed: number | null;
}

export interface BattedBallBlock {
  exitVelocity: number | null;
  launchAngle: number | null;
  hardHitPct: number | null;
  barrelPct: number | null;
  maxExitVelocity: number | null;
}

/**
 * Merged, ranked output record
 */
export interface PlayerRecord {
  readonly playerId: number;
  /** "First Last" */
  readonly name: string;
  readonly team: string;
  readonly pa: number;
  readonly battingAvg: number | null;
  readonly woba: number | null;
  readonly xwoba: number | null;
  /** Provider convention (xwOBA - wOBA), passed through as-is */
  readonly diffSeason: number | null;
  readonly xba: number | null;
  readonly xslg: number | null;
  readonly battedBall?: Readonly<BattedBallBlock>;
  readonly rolling?: Readonly<Record<string, WindowResult>>;
  readonly totalPaEvents?: number;
  /** Primary differential (wOBA - xwOBA) used for ranking */
  readonly diffRollingOba: number;
}

/**
 * Complete result of one pipeline run
 */
export interface PlayerDataOutput {
  generatedAt: string;
  season: number;
  totalPlayers: number;
  minPa: number;
  rollingWindows: number[];
  players: PlayerRecord[];
}

/**
 * Engine configuration
 */
export interface EngineConfig {
  /** Window sizes in plate appearances */
  rollingWindows: number[];
  /** Maximum length of each trend sequence */
  trendPoints: number;
  /** Batters below this many PA are excluded everywhere */
  minPa: number;
  /** Preference order for the primary differential */
  primaryWindowOrder: number[];
  /** Batters between progress notifications */
  progressInterval: number;
}

/**
 * Progress channel for the per-batter loop
 */
export type ProgressCallback = (processed: number, total: number) => void;
