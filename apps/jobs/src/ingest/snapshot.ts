/**
 * Daily snapshots
 *
 * A snapshot is a Game-schema CSV for one day (`daily/<date>.csv`).
 * Appending it adds only the game ids the canonical table has not seen;
 * rows without a readable date are dropped and counted.
 */

import * as fs from 'fs';
import * as path from 'path';
import type { DataPaths } from '../config/paths';
import { yesterdayInEastern } from '../ledger/calendar';
import { GAME_TABLE, partitionDated } from '../store/schemas';
import { readTyped, writeTable, writeTyped } from '../store/table-io';
import { MergeCounts, mergeByKey } from './ingestion-merger';

export function snapshotPath(paths: DataPaths, date: string): string {
  return path.join(paths.dailyDir, `${date}.csv`);
}

/**
 * Create a header-only snapshot for `date` (default: yesterday, US/Eastern)
 * unless one exists. Returns the snapshot path.
 */
export function ensureSnapshot(paths: DataPaths, date: string = yesterdayInEastern()): string {
  const filePath = snapshotPath(paths, date);
  if (!fs.existsSync(filePath)) {
    writeTable(filePath, GAME_TABLE.columns, []);
    console.log(`[SNAPSHOT] Created empty snapshot ${filePath}`);
  }
  return filePath;
}

export interface SnapshotAppendResult extends MergeCounts {
  /** Snapshot rows dropped for an unreadable date */
  invalid: number;
}

export function appendSnapshot(snapshotFile: string, gamesFile: string): SnapshotAppendResult {
  const incoming = readTyped(snapshotFile, GAME_TABLE, { required: true, description: 'daily snapshot' });
  const { dated, undated } = partitionDated(incoming);
  if (undated.length) {
    console.warn(
      `[SNAPSHOT] Skipped ${undated.length} row(s) without a readable date: ${undated.map(g => g.gameId).join(', ')}`
    );
  }

  const existing = readTyped(gamesFile, GAME_TABLE);
  const merged = mergeByKey(existing, dated, g => g.gameId);
  writeTyped(gamesFile, GAME_TABLE, merged.rows);

  console.log(`[SNAPSHOT] ${path.basename(snapshotFile)}: +${merged.added} games, ${merged.skipped} already known`);
  return { added: merged.added, skipped: merged.skipped, invalid: undated.length };
}
