/**
 * Daily city series with trailing calendar-day sums.
 *
 * Each city's days are filled in from its first to its last game date, so a
 * day without games enters the window as zero instead of being skipped.
 */

import { eachDay } from '../ledger/calendar';
import { compareText } from '../ledger/ledger-builder';
import type { Team, TeamGameResult } from '../store/schemas';
import type { TableRecord } from '../store/table-io';
import { groupSums, RollupSums, teamCityIndex } from './rollup-engine';

export const DEFAULT_ROLLING_WINDOW = 7;

export interface CityDailyRow {
  date: string;
  cityId: string;
  indexSum: number;
  weightedSum: number;
  games: number;
  indexSum7d: number;
  weightedSum7d: number;
  games7d: number;
}

export interface RollingOptions {
  /** Trailing window in calendar days, counting the day itself */
  window?: number;
  /** Drop ledger rows dated before this day (YYYY-MM-DD) */
  since?: string;
}

export const CITY_DAILY_COLUMNS = [
  'date',
  'city_id',
  'index_sum',
  'weighted_sum',
  'games',
  'index_sum_7d',
  'weighted_sum_7d',
  'games_7d',
] as const;

const ZERO: RollupSums = { indexScoreSum: 0, weightedScoreSum: 0, games: 0 };

export function cityDailyRolling(
  ledger: readonly TeamGameResult[],
  teams: readonly Team[],
  options: RollingOptions = {}
): CityDailyRow[] {
  const window = options.window ?? DEFAULT_ROLLING_WINDOW;
  if (!Number.isInteger(window) || window < 1) {
    throw new RangeError(`Rolling window must be a positive integer, got ${window}`);
  }

  const since = options.since;
  const rows = since ? ledger.filter(row => row.date >= since) : ledger;
  const cityOf = teamCityIndex(teams);

  // (city, date) groups, sorted by city then date
  const byCity = new Map<string, Map<string, RollupSums>>();
  for (const { key: [cityId, date], sums } of groupSums(rows, row => {
    const cityId = cityOf.get(row.teamId);
    return cityId ? [cityId, row.date] : null;
  })) {
    const days = byCity.get(cityId) ?? new Map<string, RollupSums>();
    days.set(date, sums);
    byCity.set(cityId, days);
  }

  const out: CityDailyRow[] = [];
  for (const cityId of [...byCity.keys()].sort(compareText)) {
    const days = byCity.get(cityId);
    if (!days) continue;
    const dates = [...days.keys()];
    const calendar = eachDay(dates[0], dates[dates.length - 1]);
    const daily = calendar.map(date => days.get(date) ?? ZERO);

    daily.forEach((sums, i) => {
      const trailing = daily.slice(Math.max(0, i - window + 1), i + 1);
      out.push({
        date: calendar[i],
        cityId,
        indexSum: sums.indexScoreSum,
        weightedSum: sums.weightedScoreSum,
        games: sums.games,
        indexSum7d: trailing.reduce((acc, s) => acc + s.indexScoreSum, 0),
        weightedSum7d: trailing.reduce((acc, s) => acc + s.weightedScoreSum, 0),
        games7d: trailing.reduce((acc, s) => acc + s.games, 0),
      });
    });
  }
  return out;
}

export function cityDailyRecord(row: CityDailyRow): TableRecord {
  return {
    date: row.date,
    city_id: row.cityId,
    index_sum: String(row.indexSum),
    weighted_sum: String(row.weightedSum),
    games: String(row.games),
    index_sum_7d: String(row.indexSum7d),
    weighted_sum_7d: String(row.weightedSum7d),
    games_7d: String(row.games7d),
  };
}
