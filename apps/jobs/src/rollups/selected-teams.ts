/**
 * Monthly series for a hand-picked set of teams, one per league, summed
 * together ("how did my teams do this month").
 */

import { slugify } from '../../lib/name-normalizer';
import { monthEnd } from '../ledger/calendar';
import type { League, Team, TeamGameResult } from '../store/schemas';
import { LEAGUES } from '../store/schemas';
import type { TableRecord } from '../store/table-io';
import { groupSums } from './rollup-engine';

export type TeamSelection = Record<League, string>;

export interface SelectedMonthRow {
  monthEnd: string;
  month: string;
  totalIndexScore: number;
  games: number;
}

export const SELECTED_MONTHLY_COLUMNS = ['month_end', 'month', 'total_index_score', 'games'] as const;

/**
 * Find the team a selection token names. Accepts a team id, a league code
 * ("NYK"), a full team name or an alternate name, case-insensitively.
 */
export function resolveSelection(league: League, token: string, teams: readonly Team[]): Team | undefined {
  const wanted = token.trim();
  const lowered = wanted.toLowerCase();
  const candidates = teams.filter(t => t.league === league);

  return (
    candidates.find(t => t.teamId === wanted) ??
    candidates.find(t => t.teamId === `${league}_${wanted}`) ??
    candidates.find(t => t.teamId === `${league}_${slugify(wanted)}`) ??
    candidates.find(t => t.teamName.toLowerCase() === lowered) ??
    candidates.find(t => t.altNames.toLowerCase() === lowered)
  );
}

export function selectTeamsMonthly(
  ledger: readonly TeamGameResult[],
  teams: readonly Team[],
  selection: TeamSelection
): SelectedMonthRow[] {
  const picked = new Set<string>();
  for (const league of LEAGUES) {
    const team = resolveSelection(league, selection[league], teams);
    if (team) {
      picked.add(team.teamId);
    } else {
      console.warn(`[ROLLUPS] No ${league} team matches "${selection[league]}"`);
    }
  }

  return groupSums(ledger, row => (picked.has(row.teamId) ? [row.monthStart] : null)).map(
    ({ key: [month], sums }) => ({
      monthEnd: monthEnd(month),
      month,
      totalIndexScore: sums.indexScoreSum,
      games: sums.games,
    })
  );
}

export function selectedMonthRecord(row: SelectedMonthRow): TableRecord {
  return {
    month_end: row.monthEnd,
    month: row.month,
    total_index_score: String(row.totalIndexScore),
    games: String(row.games),
  };
}

/**
 * Default output name: monthly_<yyyymmdd>_nhl-<tok>_mlb-<tok>_nba-<tok>_nfl-<tok>.csv
 */
export function selectedMonthlyFileName(selection: TeamSelection, today: string): string {
  const token = (value: string): string =>
    value
      .trim()
      .toLowerCase()
      .replace(/[^a-z0-9]+/g, '-')
      .replace(/^-+|-+$/g, '');
  const stamp = today.replace(/-/g, '');
  return (
    `monthly_${stamp}_nhl-${token(selection.nhl)}_mlb-${token(selection.mlb)}` +
    `_nba-${token(selection.nba)}_nfl-${token(selection.nfl)}.csv`
  );
}
