/**
 * Canonical table seeding: header-only cities, teams and games tables for a
 * fresh data directory. Existing tables are left untouched.
 */

import * as fs from 'fs';
import type { DataPaths } from '../config/paths';
import { CITY_TABLE, GAME_TABLE, TEAM_TABLE } from '../store/schemas';
import { writeTable } from '../store/table-io';

export function ensureCanonicalTables(paths: DataPaths): string[] {
  const created: string[] = [];
  const tables = [
    { filePath: paths.cities, columns: CITY_TABLE.columns },
    { filePath: paths.teams, columns: TEAM_TABLE.columns },
    { filePath: paths.games, columns: GAME_TABLE.columns },
  ];

  for (const { filePath, columns } of tables) {
    if (fs.existsSync(filePath)) continue;
    writeTable(filePath, columns, []);
    created.push(filePath);
  }

  if (created.length) {
    console.log(`[SEED] Created ${created.length} canonical table(s) in ${paths.processedDir}`);
  } else {
    console.log('[SEED] Canonical tables already present');
  }
  return created;
}
