/**
 * Shared transform for feeds that name teams as "City Nickname" strings
 * and carry both final scores (NHL, NFL).
 */

import { slugify } from '../lib/name-normalizer';
import { normalizeDate } from '../src/ledger/calendar';
import { winnerFromScores } from '../src/scoring/outcome-scorer';
import type { Game, NameBasedLeague, SeasonType } from '../src/store/schemas';
import type { RawTable, TableRecord } from '../src/store/table-io';
import type { EntityResolver } from './EntityResolver';
import { FeedTransformResult, LeagueFeedAdapter, winningTeamId } from './LeagueFeedAdapter';

export interface NamedGameRow {
  rawDate: string;
  homeName: string;
  awayName: string;
  homeScore: number | null;
  awayScore: number | null;
  seasonType: SeasonType;
}

export abstract class NameBasedFeedAdapter implements LeagueFeedAdapter {
  abstract readonly league: NameBasedLeague;
  abstract readonly requiredColumns: readonly string[];

  abstract getName(): string;

  /**
   * Pull one game's fields out of a feed record
   */
  protected abstract readRow(record: TableRecord): NamedGameRow;

  transform(feed: RawTable, resolver: EntityResolver): FeedTransformResult {
    const games: Game[] = [];
    let skipped = 0;

    for (const record of feed.records) {
      const row = this.readRow(record);
      const date = normalizeDate(row.rawDate);
      const homeName = row.homeName.trim();
      const awayName = row.awayName.trim();

      if (!date || !homeName || !awayName) {
        skipped++;
        continue;
      }

      const home = resolver.resolveByName(this.league, homeName);
      const away = resolver.resolveByName(this.league, awayName);
      const winner = winnerFromScores(row.homeScore, row.awayScore);

      games.push({
        gameId: `${this.league}_${date}_${slugify(awayName)}_${slugify(homeName)}`,
        date,
        league: this.league,
        seasonType: row.seasonType,
        homeTeamId: home.teamId,
        awayTeamId: away.teamId,
        homeScore: row.homeScore,
        awayScore: row.awayScore,
        winningTeamId: winningTeamId(winner, home.teamId, away.teamId),
      });
    }

    if (skipped > 0) {
      console.warn(`[${this.league.toUpperCase()}] Skipped ${skipped} feed rows without a date or team`);
    }
    return { games, skipped };
  }
}
