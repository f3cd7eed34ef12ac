/**
 * Rollup Engine
 *
 * Weekly and monthly sums of the ledger per team and per city. Every rollup
 * is a pure group-by over the ledger and is rebuilt from scratch each run.
 */

import type { TeamGameResult, Team } from '../store/schemas';
import { compareText } from '../ledger/ledger-builder';
import type { TableRecord } from '../store/table-io';

export type RollupPeriod = 'week' | 'month';

export interface RollupSums {
  indexScoreSum: number;
  weightedScoreSum: number;
  games: number;
}

export interface TeamRollupRow extends RollupSums {
  league: string;
  teamId: string;
  periodStart: string;
}

export interface CityRollupRow extends RollupSums {
  cityId: string;
  periodStart: string;
}

type LedgerSlice = Pick<TeamGameResult, 'indexScore' | 'weightedScore'>;

export function periodColumn(period: RollupPeriod): 'week_start' | 'month_start' {
  return period === 'week' ? 'week_start' : 'month_start';
}

export function periodStartOf(row: Pick<TeamGameResult, 'weekStart' | 'monthStart'>, period: RollupPeriod): string {
  return period === 'week' ? row.weekStart : row.monthStart;
}

/**
 * Team → city lookup; teams with a blank city are left out
 */
export function teamCityIndex(teams: readonly Team[]): Map<string, string> {
  const index = new Map<string, string>();
  for (const team of teams) {
    const cityId = team.cityId.trim();
    if (cityId && !index.has(team.teamId)) {
      index.set(team.teamId, cityId);
    }
  }
  return index;
}

function compareKeys(a: readonly string[], b: readonly string[]): number {
  for (let i = 0; i < Math.min(a.length, b.length); i++) {
    const diff = compareText(a[i], b[i]);
    if (diff !== 0) return diff;
  }
  return a.length - b.length;
}

/**
 * Sum rows per group key. Rows whose key is null are dropped. Groups come
 * back sorted by their key parts.
 */
export function groupSums<T extends LedgerSlice>(
  rows: readonly T[],
  keyOf: (row: T) => string[] | null
): { key: string[]; sums: RollupSums }[] {
  const groups = new Map<string, { key: string[]; sums: RollupSums }>();

  for (const row of rows) {
    const key = keyOf(row);
    if (!key) continue;
    const id = key.join('\u0000');
    let group = groups.get(id);
    if (!group) {
      group = { key, sums: { indexScoreSum: 0, weightedScoreSum: 0, games: 0 } };
      groups.set(id, group);
    }
    group.sums.indexScoreSum += row.indexScore;
    group.sums.weightedScoreSum += row.weightedScore;
    group.sums.games += 1;
  }

  return [...groups.values()].sort((a, b) => compareKeys(a.key, b.key));
}

export function teamRollup(ledger: readonly TeamGameResult[], period: RollupPeriod): TeamRollupRow[] {
  return groupSums(ledger, row => [row.league, row.teamId, periodStartOf(row, period)]).map(
    ({ key: [league, teamId, periodStart], sums }) => ({ league, teamId, periodStart, ...sums })
  );
}

export function cityRollup(
  ledger: readonly TeamGameResult[],
  teams: readonly Team[],
  period: RollupPeriod
): CityRollupRow[] {
  const cityOf = teamCityIndex(teams);
  return groupSums(ledger, row => {
    const cityId = cityOf.get(row.teamId);
    return cityId ? [cityId, periodStartOf(row, period)] : null;
  }).map(({ key: [cityId, periodStart], sums }) => ({ cityId, periodStart, ...sums }));
}

function sumsRecord(sums: RollupSums): TableRecord {
  return {
    index_score_sum: String(sums.indexScoreSum),
    weighted_score_sum: String(sums.weightedScoreSum),
    games: String(sums.games),
  };
}

export function teamRollupColumns(period: RollupPeriod): string[] {
  return ['league', 'team_id', periodColumn(period), 'index_score_sum', 'weighted_score_sum', 'games'];
}

export function cityRollupColumns(period: RollupPeriod): string[] {
  return ['city_id', periodColumn(period), 'index_score_sum', 'weighted_score_sum', 'games'];
}

export function teamRollupRecord(row: TeamRollupRow, period: RollupPeriod): TableRecord {
  return { league: row.league, team_id: row.teamId, [periodColumn(period)]: row.periodStart, ...sumsRecord(row) };
}

export function cityRollupRecord(row: CityRollupRow, period: RollupPeriod): TableRecord {
  return { city_id: row.cityId, [periodColumn(period)]: row.periodStart, ...sumsRecord(row) };
}
