/**
 * Export ranked rolling wOBA/xwOBA differentials to player_data.json
 *
 * Usage: export-player-data [year] [outputPath] [cachePath]
 */

import * as fs from 'fs';
import * as path from 'path';
import { pathToFileURL } from 'url';
import {
  buildPlayerData,
  DEFAULT_CONFIG,
  type BattedBallStats,
  type EngineConfig,
  type RawPitchEvent,
  type SeasonExpectedStats,
} from '@underrated/model';
import { ResponseCache } from './response-cache.js';
import { SavantClient, type PlayerDataSource } from './savant-client.js';
import { determineSeason, getSeasonDates } from './season.js';
import { toPlayerDataJson, type PlayerDataJson } from './serialize.js';

const DEFAULT_CACHE_TTL_HOURS = 24;

export interface ExportOptions {
  /** Season to export; detected from the leaderboards when absent */
  year?: number;
  outputPath: string;
  client: PlayerDataSource;
  today?: Date;
  config?: Partial<EngineConfig>;
}

function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Fetch every input, run the engine and write the JSON file
 *
 * Batted-ball and pitch-level failures degrade the output; an expected-stats
 * failure rejects.
 */
export async function exportPlayerData(options: ExportOptions): Promise<PlayerDataJson> {
  const { client, outputPath } = options;
  const today = options.today ?? new Date();
  const minPa = options.config?.minPa ?? DEFAULT_CONFIG.minPa;

  let year: number;
  let detectedRows: SeasonExpectedStats[] | null = null;
  if (options.year !== undefined) {
    year = options.year;
  } else {
    const detected = await determineSeason((y) => client.fetchExpectedStats(y), today);
    year = detected.year;
    detectedRows = detected.rows;
  }
  console.log(`\n📦 Exporting ${year} season to ${outputPath}...\n`);

  console.log('  📊 Expected statistics...');
  let expectedStats: SeasonExpectedStats[];
  try {
    // Detection already loaded this leaderboard unless it fell back
    expectedStats = detectedRows ?? (await client.fetchExpectedStats(year));
  } catch (error) {
    throw new Error(`Failed to load expected statistics for ${year}: ${errorMessage(error)}`);
  }
  console.log(`    ✓ ${expectedStats.length} batters`);

  console.log('  📊 Exit velocity & barrels...');
  let battedBall: BattedBallStats[] | null = null;
  try {
    battedBall = await client.fetchExitVeloBarrels(year);
    console.log(`    ✓ ${battedBall.length} batters`);
  } catch (error) {
    console.warn(`[WARN] Could not fetch exit velocity data: ${errorMessage(error)}`);
  }

  const { start, end } = getSeasonDates(year, today);
  console.log(`  ⚾ Pitch-level data ${start} to ${end}...`);
  let events: RawPitchEvent[] | null = null;
  try {
    events = await client.fetchPitchLevel(start, end);
    console.log(`    ✓ ${events.length} pitches`);
  } catch (error) {
    console.warn(`[WARN] Could not fetch pitch-level data: ${errorMessage(error)}`);
    console.warn('[WARN] Using season-level stats only (no rolling windows)');
  }

  console.log('  📈 Rolling metrics...');
  const output = buildPlayerData(
    { season: year, expectedStats, battedBall, events },
    {
      config: options.config,
      now: () => today,
      onProgress: (processed, total) => {
        console.log(`    Processed ${processed}/${total} batters`);
      },
    }
  );
  const withRolling = output.players.filter((p) => p.rolling).length;
  console.log(`    ✓ ${withRolling} batters with ${minPa}+ PA and rolling windows`);

  const json = toPlayerDataJson(output);
  fs.mkdirSync(path.dirname(outputPath), { recursive: true });
  fs.writeFileSync(outputPath, JSON.stringify(json, null, 2));

  console.log(`\n✅ Saved ${json.total_players} players to ${outputPath}`);
  console.log(`   Season: ${json.season}`);
  console.log(`   Generated: ${json.generated_at}`);

  return json;
}

/**
 * Cache lifetime from SAVANT_CACHE_TTL_HOURS, in milliseconds
 */
export function cacheTtlMs(env: NodeJS.ProcessEnv = process.env): number {
  const raw = env.SAVANT_CACHE_TTL_HOURS;
  const hours = raw === undefined || raw.trim() === '' ? NaN : Number(raw);
  return (Number.isFinite(hours) && hours >= 0 ? hours : DEFAULT_CACHE_TTL_HOURS) * 60 * 60 * 1000;
}

// CLI
async function main() {
  const year = parseInt(process.argv[2]) || undefined;
  const outputPath = process.argv[3] || 'data/player_data.json';
  const cachePath = process.argv[4] || '.cache/savant.sqlite';

  const cache = new ResponseCache(cachePath, cacheTtlMs());
  console.log(`[Cache] ${cache.size()} stored responses in ${cachePath}`);

  try {
    await exportPlayerData({
      year,
      outputPath,
      client: new SavantClient({ cache }),
    });
  } finally {
    cache.close();
  }
}

if (process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href) {
  main().catch((error: unknown) => {
    console.error(`[ERROR] ${errorMessage(error)}`);
    process.exit(1);
  });
}
