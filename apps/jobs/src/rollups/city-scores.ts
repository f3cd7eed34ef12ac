/**
 * City Score Aggregator
 *
 * One row per (date, city): the day's weighted score plus win/loss counts.
 * The "latest" view is the subset on the most recent date.
 */

import { compareText } from '../ledger/ledger-builder';
import type { City, Team, TeamGameResult } from '../store/schemas';
import type { TableRecord } from '../store/table-io';
import { teamCityIndex } from './rollup-engine';

export interface CityScore {
  date: string;
  cityId: string;
  cityName: string;
  score: number;
  wins: number;
  losses: number;
  playoffWins: number;
  playoffLosses: number;
}

export const CITY_SCORE_COLUMNS = [
  'date',
  'city_id',
  'city_name',
  'score',
  'wins',
  'losses',
  'playoff_wins',
  'playoff_losses',
] as const;

/**
 * Date ascending, score descending, city id ascending
 */
export function compareCityScores(a: CityScore, b: CityScore): number {
  return compareText(a.date, b.date) || b.score - a.score || compareText(a.cityId, b.cityId);
}

export function computeCityScores(
  ledger: readonly TeamGameResult[],
  teams: readonly Team[],
  cities: readonly City[]
): { all: CityScore[]; latest: CityScore[] } {
  const cityOf = teamCityIndex(teams);
  const cityNames = new Map<string, string>();
  for (const city of cities) {
    if (!cityNames.has(city.cityId)) cityNames.set(city.cityId, city.cityName);
  }

  const scores = new Map<string, CityScore>();
  for (const row of ledger) {
    const cityId = cityOf.get(row.teamId);
    if (!cityId) continue;

    const key = `${row.date}\u0000${cityId}`;
    let entry = scores.get(key);
    if (!entry) {
      entry = {
        date: row.date,
        cityId,
        cityName: cityNames.get(cityId) ?? '',
        score: 0,
        wins: 0,
        losses: 0,
        playoffWins: 0,
        playoffLosses: 0,
      };
      scores.set(key, entry);
    }

    entry.score += row.weightedScore;
    const playoff = row.seasonType === 'playoff';
    if (row.result === 'W') {
      entry.wins++;
      if (playoff) entry.playoffWins++;
    } else if (row.result === 'L') {
      entry.losses++;
      if (playoff) entry.playoffLosses++;
    }
  }

  const all = [...scores.values()].sort(compareCityScores);
  const latestDate = all.length ? all[all.length - 1].date : undefined;
  const latest = all.filter(score => score.date === latestDate);

  return { all, latest };
}

export function cityScoreRecord(score: CityScore): TableRecord {
  return {
    date: score.date,
    city_id: score.cityId,
    city_name: score.cityName,
    score: String(score.score),
    wins: String(score.wins),
    losses: String(score.losses),
    playoff_wins: String(score.playoffWins),
    playoff_losses: String(score.playoffLosses),
  };
}
