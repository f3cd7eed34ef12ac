/**
 * Data Tree Layout
 *
 * Every file the pipeline reads or writes, relative to one data directory
 * (HAPPINESS_DATA_DIR, default `<cwd>/data`).
 */

import * as path from 'path';
import type { League } from '../store/schemas';

export interface DataPaths {
  dataDir: string;
  rawDir: string;
  processedDir: string;
  outputsDir: string;
  dailyDir: string;

  cities: string;
  teams: string;
  games: string;
  ledger: string;

  teamRollupWeekly: string;
  teamRollupMonthly: string;
  cityRollupWeekly: string;
  cityRollupMonthly: string;
  cityScores: string;
  cityScoresLatest: string;
  cityDaily: string;
  teamCityMap: string;
}

/** Default raw feed file per league, under `raw/` */
export const RAW_FEED_FILES: Record<League, string> = {
  nhl: 'nhl_games.csv',
  nfl: 'nfl_games.csv',
  nba: 'nba_games.csv',
  mlb: 'mlb_games.csv',
};

/** Default team→city reference table for code-based leagues, under `raw/` */
export const REFERENCE_FILES: Partial<Record<League, string>> = {
  nba: 'nba_teams.csv',
  mlb: 'mlb_current_names.csv',
};

export function resolveDataPaths(dataDir?: string): DataPaths {
  const root = path.resolve(dataDir || process.env.HAPPINESS_DATA_DIR || path.join(process.cwd(), 'data'));
  const rawDir = path.join(root, 'raw');
  const processedDir = path.join(root, 'processed');
  const outputsDir = path.join(root, 'outputs');

  return {
    dataDir: root,
    rawDir,
    processedDir,
    outputsDir,
    dailyDir: path.join(root, 'daily'),

    cities: path.join(processedDir, 'cities.csv'),
    teams: path.join(processedDir, 'teams.csv'),
    games: path.join(processedDir, 'games.csv'),
    ledger: path.join(processedDir, 'team_game_results.csv'),

    teamRollupWeekly: path.join(outputsDir, 'team_rollup_weekly.csv'),
    teamRollupMonthly: path.join(outputsDir, 'team_rollup_monthly.csv'),
    cityRollupWeekly: path.join(outputsDir, 'city_rollup_weekly.csv'),
    cityRollupMonthly: path.join(outputsDir, 'city_rollup_monthly.csv'),
    cityScores: path.join(outputsDir, 'city_scores.csv'),
    cityScoresLatest: path.join(outputsDir, 'city_scores_latest.csv'),
    cityDaily: path.join(outputsDir, 'city_daily_7d.csv'),
    teamCityMap: path.join(root, 'team_city_map.json'),
  };
}

export function rawFeedPath(paths: DataPaths, league: League): string {
  return path.join(paths.rawDir, RAW_FEED_FILES[league]);
}

export function referencePath(paths: DataPaths, league: League): string | undefined {
  const file = REFERENCE_FILES[league];
  return file ? path.join(paths.rawDir, file) : undefined;
}
