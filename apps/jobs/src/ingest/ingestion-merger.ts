/**
 * Ingestion Merger
 *
 * Folds newly resolved entities and games into the canonical tables.
 * Canonical rows are append-only: a key already on disk keeps its stored
 * row, and duplicates inside a batch keep their first occurrence.
 */

import type { DataPaths } from '../config/paths';
import { CITY_TABLE, City, GAME_TABLE, Game, TEAM_TABLE, Team } from '../store/schemas';
import { ReadTableOptions, readTyped, writeTyped } from '../store/table-io';

export interface CanonicalTables {
  cities: City[];
  teams: Team[];
  games: Game[];
}

export interface MergeCounts {
  added: number;
  skipped: number;
}

export interface MergeResult<T> extends MergeCounts {
  rows: T[];
}

export interface MergeReport {
  cities: MergeCounts;
  teams: MergeCounts;
  games: MergeCounts;
}

/**
 * Keep-first append of `incoming` onto `existing`, keyed by `key`
 */
export function mergeByKey<T>(existing: readonly T[], incoming: readonly T[], key: (row: T) => string): MergeResult<T> {
  const seen = new Set<string>();
  const rows: T[] = [];

  for (const row of existing) {
    const k = key(row);
    if (seen.has(k)) continue;
    seen.add(k);
    rows.push(row);
  }

  let added = 0;
  let skipped = 0;
  for (const row of incoming) {
    const k = key(row);
    if (seen.has(k)) {
      skipped++;
      continue;
    }
    seen.add(k);
    rows.push(row);
    added++;
  }

  return { rows, added, skipped };
}

export function mergeCanonical(
  tables: CanonicalTables,
  batch: CanonicalTables
): { tables: CanonicalTables; report: MergeReport } {
  const cities = mergeByKey(tables.cities, batch.cities, c => c.cityId);
  const teams = mergeByKey(tables.teams, batch.teams, t => t.teamId);
  const games = mergeByKey(tables.games, batch.games, g => g.gameId);

  return {
    tables: { cities: cities.rows, teams: teams.rows, games: games.rows },
    report: {
      cities: { added: cities.added, skipped: cities.skipped },
      teams: { added: teams.added, skipped: teams.skipped },
      games: { added: games.added, skipped: games.skipped },
    },
  };
}

/**
 * Load cities, teams and games. Absent tables read as empty unless
 * `required` is set.
 */
export function loadCanonicalTables(paths: DataPaths, options: ReadTableOptions = {}): CanonicalTables {
  return {
    cities: readTyped(paths.cities, CITY_TABLE, options),
    teams: readTyped(paths.teams, TEAM_TABLE, options),
    games: readTyped(paths.games, GAME_TABLE, options),
  };
}

export function writeCanonicalTables(paths: DataPaths, tables: CanonicalTables): void {
  writeTyped(paths.cities, CITY_TABLE, tables.cities);
  writeTyped(paths.teams, TEAM_TABLE, tables.teams);
  writeTyped(paths.games, GAME_TABLE, tables.games);
}
