#!/usr/bin/env node

/**
 * City Happiness CLI
 *
 * Command: happiness <stage> [options]
 *
 * Runs one pipeline stage (or all of them) against the data directory.
 */

import * as dotenv from 'dotenv';
import { Command, InvalidArgumentError } from 'commander';
import { normalizeDate } from './src/ledger/calendar';
import { errMsg } from './src/errors';
import {
  ContextOptions,
  createContext,
  runAll,
  runCityScores,
  runIngest,
  runLedger,
  runMonthlyTeams,
  runRollups,
  runSeed,
  runSnapshot,
  runTeamCityMap,
} from './src/pipeline';
import { isLeague } from './src/store/schemas';

dotenv.config();

type GlobalOptions = {
  dataDir?: string;
  scoring?: string;
  nicknames?: string;
  verbose?: boolean;
};

function parseDateOption(value: string): string {
  const date = normalizeDate(value);
  if (!date) {
    throw new InvalidArgumentError(`Invalid date "${value}" (expected YYYY-MM-DD).`);
  }
  return date;
}

function contextOptions(program: Command): ContextOptions {
  const opts = program.opts<GlobalOptions>();
  return {
    dataDir: opts.dataDir,
    scoringConfig: opts.scoring,
    nicknamesConfig: opts.nicknames,
    verbose: opts.verbose,
  };
}

/**
 * Wrap a stage so any failure is reported once and exits non-zero
 */
function stage(name: string, fn: () => void): void {
  try {
    console.log(`\n📥 ${name}...`);
    fn();
    console.log(`✅ ${name} complete`);
  } catch (error) {
    console.error(`❌ ${name} failed: ${errMsg(error)}`);
    process.exit(1);
  }
}

export function buildProgram(): Command {
  const program = new Command();

  program
    .name('happiness')
    .description('City and team happiness index pipeline')
    .option('--data-dir <dir>', 'Data directory (default: HAPPINESS_DATA_DIR or ./data)')
    .option('--scoring <file>', 'Scoring weights YAML/JSON (default: SCORING_CONFIG_PATH or bundled)')
    .option('--nicknames <file>', 'Nickname table YAML (default: NICKNAMES_CONFIG_PATH or bundled)')
    .option('--verbose', 'Log every entity the resolver registers');

  program
    .command('seed')
    .description('Create empty canonical tables where missing')
    .action(() => stage('Seed', () => runSeed(createContext(contextOptions(program)))));

  program
    .command('ingest <league> [feed]')
    .description('Ingest a raw league feed (nhl, nfl, nba, mlb) into the canonical tables')
    .option('--reference <file>', 'Team reference table for nba/mlb')
    .action((league: string, feed: string | undefined, options: { reference?: string }) =>
      stage(`Ingest ${league}`, () => {
        const key = league.toLowerCase();
        if (!isLeague(key)) {
          throw new Error(`Unknown league "${league}" (expected nhl, nfl, nba or mlb)`);
        }
        runIngest(createContext(contextOptions(program)), key, feed, options.reference);
      })
    );

  program
    .command('snapshot')
    .description('Append a daily games snapshot (default: yesterday, US/Eastern)')
    .option('--date <date>', 'Snapshot date (YYYY-MM-DD)', parseDateOption)
    .action((options: { date?: string }) =>
      stage('Snapshot', () => {
        runSnapshot(createContext(contextOptions(program)), options.date);
      })
    );

  program
    .command('ledger')
    .description('Rebuild the team-game ledger from the games table')
    .action(() => stage('Ledger', () => runLedger(createContext(contextOptions(program)))));

  program
    .command('rollups')
    .description('Rebuild weekly/monthly rollups and the daily rolling city series')
    .option('--since <date>', 'Only include ledger rows on or after this date in the daily series', parseDateOption)
    .action((options: { since?: string }) =>
      stage('Rollups', () => runRollups(createContext(contextOptions(program)), { since: options.since }))
    );

  program
    .command('city-scores')
    .description('Rebuild daily city scores and the latest snapshot')
    .action(() => stage('City scores', () => runCityScores(createContext(contextOptions(program)))));

  program
    .command('team-city-map')
    .description('Write the team→city JSON map')
    .action(() => stage('Team city map', () => runTeamCityMap(createContext(contextOptions(program)))));

  program
    .command('monthly-teams')
    .description('Monthly totals for one selected team per league')
    .requiredOption('--nhl <team>', "NHL team (e.g. 'New York Rangers')")
    .requiredOption('--nfl <team>', "NFL team (e.g. 'New York Giants')")
    .requiredOption('--nba <team>', "NBA abbreviation (e.g. 'NYK')")
    .requiredOption('--mlb <team>', "MLB team code (e.g. 'NYN')")
    .option('--out <file>', 'Output CSV path (default: outputs/monthly_<date>_<teams>.csv)')
    .action((options: { nhl: string; nfl: string; nba: string; mlb: string; out?: string }) =>
      stage('Monthly teams', () => {
        const { nhl, nfl, nba, mlb, out } = options;
        runMonthlyTeams(createContext(contextOptions(program)), { nhl, nfl, nba, mlb }, out);
      })
    );

  program
    .command('run')
    .description('Seed, ingest every raw feed present, then rebuild all outputs')
    .option('--since <date>', 'Cutoff for the daily rolling series', parseDateOption)
    .action((options: { since?: string }) =>
      stage('Pipeline', () => {
        const reports = runAll(createContext(contextOptions(program)), { since: options.since });
        const unresolved = reports.reduce((acc, r) => acc + r.unresolved.length, 0);
        if (unresolved > 0) {
          console.warn(`⚠️  ${unresolved} team token(s) resolved to placeholder identities`);
        }
      })
    );

  return program;
}

if (require.main === module) {
  buildProgram().parse(process.argv);
}
