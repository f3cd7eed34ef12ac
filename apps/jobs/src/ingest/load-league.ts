/**
 * League Loader
 *
 * One ingestion stage: read a raw feed, resolve its teams, merge the new
 * rows into the canonical tables and write them back.
 */

import { AdapterFactory } from '../../adapters/AdapterFactory';
import { EntityResolver, UnresolvedEntity } from '../../adapters/EntityResolver';
import type { LeagueNicknames } from '../config/nicknames';
import type { DataPaths } from '../config/paths';
import type { League } from '../store/schemas';
import { readTable, requireColumns } from '../store/table-io';
import { loadCanonicalTables, mergeCanonical, MergeReport, writeCanonicalTables } from './ingestion-merger';

export interface IngestOptions {
  league: League;
  feedPath: string;
  /** Reference table for code-based leagues; defaults to the one under `raw/` */
  referencePath?: string;
  paths: DataPaths;
  nicknames: LeagueNicknames;
  verbose?: boolean;
}

export interface IngestReport {
  league: League;
  feedRows: number;
  skippedRows: number;
  merge: MergeReport;
  unresolved: UnresolvedEntity[];
}

export function ingestLeagueFeed(options: IngestOptions): IngestReport {
  const { league, paths } = options;
  const adapter = new AdapterFactory(paths).createAdapter(league, options.referencePath);

  const feed = readTable(options.feedPath, { required: true, description: `${league} feed` });
  requireColumns(`${league} feed`, feed.columns, adapter.requiredColumns);

  const canonical = loadCanonicalTables(paths);
  const resolver = new EntityResolver(
    { cities: canonical.cities, teams: canonical.teams },
    { nicknames: options.nicknames, verbose: options.verbose }
  );

  const { games, skipped } = adapter.transform(feed, resolver);
  const { tables, report } = mergeCanonical(canonical, {
    cities: resolver.pendingCities(),
    teams: resolver.pendingTeams(),
    games,
  });
  writeCanonicalTables(paths, tables);

  console.log(
    `[INGEST] ${adapter.getName()}: +${report.cities.added} cities, +${report.teams.added} teams, ` +
      `+${report.games.added} games (${report.games.skipped} duplicate, ${skipped} skipped rows)`
  );
  if (resolver.unresolved.length) {
    console.warn(`[INGEST] ${resolver.unresolved.length} ${league} team(s) resolved to placeholders`);
  }

  return {
    league,
    feedRows: feed.records.length,
    skippedRows: skipped,
    merge: report,
    unresolved: [...resolver.unresolved],
  };
}
