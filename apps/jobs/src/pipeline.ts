/**
 * Pipeline stages
 *
 * Each stage reads whole tables, transforms them and writes whole tables.
 * Stages share nothing in memory; everything flows through the files under
 * the data directory.
 */

import * as fs from 'fs';
import * as path from 'path';
import { LeagueNicknames, loadNicknames } from './config/nicknames';
import { DataPaths, rawFeedPath, resolveDataPaths } from './config/paths';
import { loadScoringWeights, ScoringWeights } from './config/scoring-weights';
import { ingestLeagueFeed, IngestReport } from './ingest/load-league';
import { ensureCanonicalTables } from './ingest/seed';
import { appendSnapshot, ensureSnapshot, SnapshotAppendResult } from './ingest/snapshot';
import { buildLedger } from './ledger/ledger-builder';
import { yesterdayInEastern } from './ledger/calendar';
import { CITY_DAILY_COLUMNS, cityDailyRecord, cityDailyRolling } from './rollups/city-daily';
import { CITY_SCORE_COLUMNS, cityScoreRecord, computeCityScores } from './rollups/city-scores';
import {
  cityRollup,
  cityRollupColumns,
  cityRollupRecord,
  RollupPeriod,
  teamRollup,
  teamRollupColumns,
  teamRollupRecord,
} from './rollups/rollup-engine';
import {
  SELECTED_MONTHLY_COLUMNS,
  selectedMonthlyFileName,
  selectedMonthRecord,
  selectTeamsMonthly,
  TeamSelection,
} from './rollups/selected-teams';
import { buildTeamCityMap, writeTeamCityMap } from './rollups/team-city-map';
import {
  CITY_TABLE,
  GAME_TABLE,
  League,
  LEAGUES,
  LEDGER_TABLE,
  partitionDated,
  Team,
  TEAM_TABLE,
  TeamGameResult,
} from './store/schemas';
import { readTyped, writeTable, writeTyped } from './store/table-io';

export interface PipelineContext {
  paths: DataPaths;
  weights: ScoringWeights;
  nicknames: LeagueNicknames;
  verbose?: boolean;
}

export interface ContextOptions {
  dataDir?: string;
  scoringConfig?: string;
  nicknamesConfig?: string;
  verbose?: boolean;
}

/**
 * Load configuration once for a run
 */
export function createContext(options: ContextOptions = {}): PipelineContext {
  return {
    paths: resolveDataPaths(options.dataDir),
    weights: loadScoringWeights(options.scoringConfig),
    nicknames: loadNicknames(options.nicknamesConfig),
    verbose: options.verbose,
  };
}

export function runSeed(ctx: PipelineContext): string[] {
  return ensureCanonicalTables(ctx.paths);
}

export function runIngest(ctx: PipelineContext, league: League, feedPath?: string, referencePath?: string): IngestReport {
  return ingestLeagueFeed({
    league,
    feedPath: feedPath ?? rawFeedPath(ctx.paths, league),
    referencePath,
    paths: ctx.paths,
    nicknames: ctx.nicknames,
    verbose: ctx.verbose,
  });
}

export function runSnapshot(ctx: PipelineContext, date: string = yesterdayInEastern()): SnapshotAppendResult {
  const snapshot = ensureSnapshot(ctx.paths, date);
  return appendSnapshot(snapshot, ctx.paths.games);
}

export function runLedger(ctx: PipelineContext): number {
  const games = readTyped(ctx.paths.games, GAME_TABLE, { required: true, description: 'canonical games table' });
  const { dated, undated } = partitionDated(games);
  if (undated.length) {
    console.warn(`[LEDGER] Skipped ${undated.length} game(s) without a readable date`);
  }

  const ledger = buildLedger(dated, ctx.weights);
  writeTyped(ctx.paths.ledger, LEDGER_TABLE, ledger);

  console.log(`[LEDGER] ${dated.length} games → ${ledger.length} team-game rows`);
  return ledger.length;
}

function readLedger(paths: DataPaths): TeamGameResult[] {
  return readTyped(paths.ledger, LEDGER_TABLE, { required: true, description: 'team game ledger' });
}

function readTeams(paths: DataPaths): Team[] {
  return readTyped(paths.teams, TEAM_TABLE, { required: true, description: 'canonical teams table' });
}

export function runRollups(ctx: PipelineContext, options: { since?: string } = {}): void {
  const ledger = readLedger(ctx.paths);
  const teams = readTeams(ctx.paths);

  const periods: { period: RollupPeriod; team: string; city: string }[] = [
    { period: 'week', team: ctx.paths.teamRollupWeekly, city: ctx.paths.cityRollupWeekly },
    { period: 'month', team: ctx.paths.teamRollupMonthly, city: ctx.paths.cityRollupMonthly },
  ];

  for (const { period, team, city } of periods) {
    const teamRows = teamRollup(ledger, period);
    writeTable(team, teamRollupColumns(period), teamRows.map(row => teamRollupRecord(row, period)));

    const cityRows = cityRollup(ledger, teams, period);
    writeTable(city, cityRollupColumns(period), cityRows.map(row => cityRollupRecord(row, period)));

    console.log(`[ROLLUPS] ${period}: ${teamRows.length} team rows, ${cityRows.length} city rows`);
  }

  const daily = cityDailyRolling(ledger, teams, { since: options.since });
  writeTable(ctx.paths.cityDaily, CITY_DAILY_COLUMNS, daily.map(cityDailyRecord));
  console.log(`[ROLLUPS] city daily: ${daily.length} rows${options.since ? ` since ${options.since}` : ''}`);
}

export function runCityScores(ctx: PipelineContext): void {
  const ledger = readLedger(ctx.paths);
  const teams = readTeams(ctx.paths);
  const cities = readTyped(ctx.paths.cities, CITY_TABLE, { required: true, description: 'canonical cities table' });

  const { all, latest } = computeCityScores(ledger, teams, cities);
  writeTable(ctx.paths.cityScores, CITY_SCORE_COLUMNS, all.map(cityScoreRecord));
  writeTable(ctx.paths.cityScoresLatest, CITY_SCORE_COLUMNS, latest.map(cityScoreRecord));

  const latestDate = latest.length ? latest[0].date : 'no date';
  console.log(`[CITY_SCORES] ${all.length} city-days, ${latest.length} on ${latestDate}`);
}

export function runTeamCityMap(ctx: PipelineContext): void {
  const map = buildTeamCityMap(readTeams(ctx.paths));
  writeTeamCityMap(ctx.paths.teamCityMap, map);

  const count = Object.values(map).reduce((acc, teams) => acc + Object.keys(teams).length, 0);
  console.log(`[ROLLUPS] team→city map: ${count} teams → ${ctx.paths.teamCityMap}`);
}

export function runMonthlyTeams(
  ctx: PipelineContext,
  selection: TeamSelection,
  outPath?: string,
  today: string = new Date().toISOString().slice(0, 10)
): string {
  const rows = selectTeamsMonthly(readLedger(ctx.paths), readTeams(ctx.paths), selection);
  const target = outPath ?? path.join(ctx.paths.outputsDir, selectedMonthlyFileName(selection, today));
  writeTable(target, SELECTED_MONTHLY_COLUMNS, rows.map(selectedMonthRecord));

  console.log(`[ROLLUPS] selected teams: ${rows.length} monthly rows → ${target}`);
  return target;
}

/**
 * Every stage in order, ingesting each league whose raw feed is present
 */
export function runAll(ctx: PipelineContext, options: { since?: string } = {}): IngestReport[] {
  runSeed(ctx);

  const reports: IngestReport[] = [];
  for (const league of LEAGUES) {
    const feed = rawFeedPath(ctx.paths, league);
    if (!fs.existsSync(feed)) {
      console.log(`[INGEST] No ${league} feed at ${feed}, skipping`);
      continue;
    }
    reports.push(runIngest(ctx, league, feed));
  }

  runLedger(ctx);
  runRollups(ctx, options);
  runCityScores(ctx);
  runTeamCityMap(ctx);
  return reports;
}
