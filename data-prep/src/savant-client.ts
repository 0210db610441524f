/**
 * Baseball Savant CSV client
 *
 * Fetches season leaderboards and pitch-level Statcast rows, with an
 * optional on-disk response cache.
 */

import { parse } from 'csv-parse/sync';
import {
  parseBattedBallRows,
  parseSeasonExpectedRows,
  type BattedBallStats,
  type RawPitchEvent,
  type SeasonExpectedStats,
} from '@underrated/model';
import type { ResponseCache } from './response-cache.js';
import { dateChunks } from './season.js';

export const SAVANT_BASE_URL = 'https://baseballsavant.mlb.com';

/** Days per pitch-level request; the search export truncates large responses */
export const PITCH_CHUNK_DAYS = 3;

export type FetchLike = (url: string) => Promise<Response>;

/** Columns the engine reads from the search export; the rest (~90) are dropped */
const PITCH_COLUMNS = [
  'batter',
  'game_date',
  'at_bat_number',
  'events',
  'woba_value',
  'woba_denom',
  'estimated_woba_using_speedangle',
  'inning_topbot',
  'home_team',
  'away_team',
] as const satisfies readonly (keyof RawPitchEvent)[];

export type CsvRow = Record<string, string>;

/**
 * Where the export command gets its inputs
 */
export interface PlayerDataSource {
  fetchExpectedStats(year: number, minPa?: number): Promise<SeasonExpectedStats[]>;
  fetchExitVeloBarrels(year: number, minBbe?: number): Promise<BattedBallStats[]>;
  fetchPitchLevel(start: string, end: string, chunkDays?: number): Promise<RawPitchEvent[]>;
}

export interface SavantClientOptions {
  fetch?: FetchLike;
  cache?: ResponseCache | null;
  baseUrl?: string;
}

/**
 * Parse Savant CSV text into rows keyed by header
 */
export function parseCsv(text: string): CsvRow[] {
  const rows: CsvRow[] = parse(text, {
    columns: true,
    bom: true,
    skip_empty_lines: true,
    relax_column_count: true,
  });
  return rows;
}

/**
 * Keep only the columns the engine reads
 */
export function toRawPitchEvent(row: CsvRow): RawPitchEvent {
  const event: RawPitchEvent = {};
  for (const column of PITCH_COLUMNS) {
    event[column] = row[column];
  }
  return event;
}

export class SavantClient implements PlayerDataSource {
  private readonly fetchImpl: FetchLike;
  private readonly cache: ResponseCache | null;
  private readonly baseUrl: string;

  constructor(options: SavantClientOptions = {}) {
    this.fetchImpl = options.fetch ?? ((url: string) => fetch(url));
    this.cache = options.cache ?? null;
    this.baseUrl = options.baseUrl ?? SAVANT_BASE_URL;
  }

  /**
   * Expected-statistics leaderboard: wOBA, xwOBA, xBA, xSLG per batter
   */
  async fetchExpectedStats(year: number, minPa: number = 1): Promise<SeasonExpectedStats[]> {
    const url = this.buildUrl('/leaderboard/expected_statistics', {
      type: 'batter',
      year: String(year),
      position: '',
      team: '',
      min: String(minPa),
      csv: 'true',
    });
    return parseSeasonExpectedRows(await this.fetchCsv(url, `expected stats ${year}`));
  }

  /**
   * Exit velocity & barrels leaderboard
   */
  async fetchExitVeloBarrels(year: number, minBbe: number = 1): Promise<BattedBallStats[]> {
    const url = this.buildUrl('/leaderboard/statcast', {
      type: 'batter',
      year: String(year),
      position: '',
      team: '',
      min: String(minBbe),
      csv: 'true',
    });
    return parseBattedBallRows(await this.fetchCsv(url, `exit velocity ${year}`));
  }

  /**
   * Regular-season pitch-level rows between two dates (inclusive), fetched in chunks
   */
  async fetchPitchLevel(
    start: string,
    end: string,
    chunkDays: number = PITCH_CHUNK_DAYS
  ): Promise<RawPitchEvent[]> {
    const events: RawPitchEvent[] = [];

    for (const chunk of dateChunks(start, end, chunkDays)) {
      const url = this.buildUrl('/statcast_search/csv', {
        all: 'true',
        type: 'details',
        player_type: 'batter',
        hfGT: 'R|',
        game_date_gt: chunk.start,
        game_date_lt: chunk.end,
      });
      const rows = await this.fetchCsv(url, `pitches ${chunk.start}..${chunk.end}`);
      for (const row of rows) {
        events.push(toRawPitchEvent(row));
      }
    }

    return events;
  }

  buildUrl(pathname: string, params: Record<string, string>): string {
    const url = new URL(pathname, this.baseUrl);
    for (const [key, value] of Object.entries(params)) {
      url.searchParams.set(key, value);
    }
    return url.toString();
  }

  private async fetchCsv(url: string, label: string): Promise<CsvRow[]> {
    const cached = this.cache?.get(url);
    if (cached != null) {
      return parseCsv(cached);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url);
    } catch (error) {
      throw new Error(`Failed to fetch ${label}: ${error instanceof Error ? error.message : String(error)}`);
    }

    if (!response.ok) {
      throw new Error(`Savant request failed (${response.status}): ${url}`);
    }

    const body = await response.text();
    this.cache?.set(url, body);
    return parseCsv(body);
  }
}
