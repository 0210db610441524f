/**
 * Season detection and date ranges for Statcast queries
 */

/** Used when neither the current nor the previous season has data */
export const FALLBACK_SEASON = 2024;

/** A season counts as available once the leaderboard lists more batters than this */
export const MIN_SEASON_BATTERS = 50;

export interface DateRange {
  /** YYYY-MM-DD, inclusive */
  start: string;
  /** YYYY-MM-DD, inclusive */
  end: string;
}

/**
 * Local calendar date as YYYY-MM-DD
 */
export function formatDate(date: Date): string {
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  return `${date.getFullYear()}-${month}-${day}`;
}

export interface DetectedSeason<T> {
  year: number;
  /** Leaderboard rows that qualified the season; null for the fallback */
  rows: T[] | null;
}

/**
 * Pick the most recent season with data: this year, then last year, then the fallback
 *
 * @param fetchExpected - Loads the expected-stats leaderboard for a year
 */
export async function determineSeason<T>(
  fetchExpected: (year: number) => Promise<T[]>,
  today: Date = new Date()
): Promise<DetectedSeason<T>> {
  const year = today.getFullYear();

  for (const tryYear of [year, year - 1]) {
    console.log(`[INFO] Trying season ${tryYear}...`);
    try {
      const rows = await fetchExpected(tryYear);
      if (rows.length > MIN_SEASON_BATTERS) {
        console.log(`[INFO] Found ${rows.length} batters for ${tryYear}`);
        return { year: tryYear, rows };
      }
    } catch (error) {
      console.warn(`[WARN] No data for ${tryYear}: ${error instanceof Error ? error.message : String(error)}`);
    }
  }

  console.log(`[INFO] Falling back to ${FALLBACK_SEASON}`);
  return { year: FALLBACK_SEASON, rows: null };
}

/**
 * Approximate regular-season window, cut off at today
 */
export function getSeasonDates(year: number, today: Date = new Date()): DateRange {
  const start = `${year}-03-20`;
  const seasonEnd = `${year}-10-05`;
  const todayStr = formatDate(today);
  return { start, end: seasonEnd < todayStr ? seasonEnd : todayStr };
}

function addDays(date: string, days: number): string {
  const d = new Date(`${date}T00:00:00Z`);
  d.setUTCDate(d.getUTCDate() + days);
  return d.toISOString().slice(0, 10);
}

/**
 * Split an inclusive date range into consecutive chunks of at most `days` days
 *
 * The search export caps rows per request, so a season is fetched in pieces.
 */
export function dateChunks(start: string, end: string, days: number): DateRange[] {
  if (days < 1) {
    throw new Error(`Chunk size must be at least 1 day, got ${days}`);
  }

  const chunks: DateRange[] = [];
  let chunkStart = start;
  while (chunkStart <= end) {
    const chunkEnd = addDays(chunkStart, days - 1);
    chunks.push({ start: chunkStart, end: chunkEnd < end ? chunkEnd : end });
    chunkStart = addDays(chunkStart, days);
  }
  return chunks;
}
