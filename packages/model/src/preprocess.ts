/**
 * Event Preprocessor
 *
 * Turns raw pitch rows into time-ordered plate appearances grouped by batter,
 * and derives each batter's most recent team.
 */

import type { PlateAppearance, RawPitchEvent } from './types.js';
import { parseOptionalInteger, parseOptionalNumber, parseText } from './utils.js';

/**
 * Ordering for plate appearances: game date, then at-bat number within the game.
 * This is the only valid rolling-window order.
 */
export function comparePlateAppearances(a: PlateAppearance, b: PlateAppearance): number {
  if (a.gameDate !== b.gameDate) {
    return a.gameDate < b.gameDate ? -1 : 1;
  }
  return a.atBatNumber - b.atBatNumber;
}

function endsPlateAppearance(event: RawPitchEvent): boolean {
  const marker = parseText(event.events);
  return marker !== '' && marker.toLowerCase() !== 'null';
}

/**
 * Convert a raw pitch row into a plate appearance
 *
 * @returns null for pitches that did not end a PA, or rows without a batter id
 */
export function toPlateAppearance(event: RawPitchEvent): PlateAppearance | null {
  if (!endsPlateAppearance(event)) return null;

  const batterId = parseOptionalInteger(event.batter);
  if (batterId === null) return null;

  const wobaValue = parseOptionalNumber(event.woba_value) ?? 0;
  const estimatedWoba = parseOptionalNumber(event.estimated_woba_using_speedangle);

  return {
    batterId,
    gameDate: parseText(event.game_date),
    atBatNumber: parseOptionalNumber(event.at_bat_number) ?? 0,
    wobaValue,
    wobaDenom: parseOptionalNumber(event.woba_denom) ?? 0,
    estimatedWoba,
    // Non-batted-ball outcomes (K, BB, HBP) have no expected value of their own
    xwobaValue: estimatedWoba ?? wobaValue,
    inningTopBot: parseText(event.inning_topbot),
    homeTeam: parseText(event.home_team),
    awayTeam: parseText(event.away_team),
  };
}

/**
 * Keep only plate-appearance-ending events, in chronological order
 */
export function toOrderedPlateAppearances(events: readonly RawPitchEvent[]): PlateAppearance[] {
  const pas: PlateAppearance[] = [];
  for (const event of events) {
    const pa = toPlateAppearance(event);
    if (pa) pas.push(pa);
  }
  return pas.sort(comparePlateAppearances);
}

/**
 * Split chronologically ordered plate appearances into per-batter groups
 *
 * Groups keep the input order, so ordered input gives ordered groups.
 */
export function groupByBatter(
  ordered: readonly PlateAppearance[]
): Map<number, PlateAppearance[]> {
  const grouped = new Map<number, PlateAppearance[]>();

  for (const pa of ordered) {
    const group = grouped.get(pa.batterId);
    if (group) {
      group.push(pa);
    } else {
      grouped.set(pa.batterId, [pa]);
    }
  }

  return grouped;
}

/**
 * Group plate appearances by batter, each group in chronological order
 */
export function preprocessEvents(events: readonly RawPitchEvent[]): Map<number, PlateAppearance[]> {
  return groupByBatter(toOrderedPlateAppearances(events));
}

/**
 * Team the batter was hitting for: top of the inning is the away team
 */
export function battingTeam(pa: PlateAppearance): string {
  return pa.inningTopBot.toLowerCase() === 'top' ? pa.awayTeam : pa.homeTeam;
}

/**
 * Most recent team per batter from chronologically ordered plate appearances
 */
export function batterTeams(ordered: readonly PlateAppearance[]): Map<number, string> {
  const teams = new Map<number, string>();
  // Later plate appearances overwrite earlier ones
  for (const pa of ordered) {
    teams.set(pa.batterId, battingTeam(pa));
  }
  return teams;
}

/**
 * Derive each batter's most recent team from their last plate appearance
 */
export function extractBatterTeams(events: readonly RawPitchEvent[]): Map<number, string> {
  return batterTeams(toOrderedPlateAppearances(events));
}
