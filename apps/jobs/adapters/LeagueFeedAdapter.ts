/**
 * League Feed Adapter Interface
 *
 * Defines the contract for turning one league's raw feed table into
 * canonical games. Entity registration happens through the stage's
 * EntityResolver, so an adapter never touches the canonical tables itself.
 */

import type { RawTable } from '../src/store/table-io';
import type { Game, League } from '../src/store/schemas';
import type { EntityResolver } from './EntityResolver';

export interface FeedTransformResult {
  games: Game[];
  /** Feed rows that could not form a game (blank team, unreadable date) */
  skipped: number;
}

export interface LeagueFeedAdapter {
  readonly league: League;

  /**
   * Columns the raw feed must carry; checked before any row is read
   */
  readonly requiredColumns: readonly string[];

  /**
   * Build canonical games from the feed, resolving every team token
   */
  transform(feed: RawTable, resolver: EntityResolver): FeedTransformResult;

  /**
   * Get the name of this adapter
   */
  getName(): string;
}

/**
 * Canonical winning_team_id for a game, given the decided winner side
 */
export function winningTeamId(
  winner: 'home' | 'away' | null,
  homeTeamId: string,
  awayTeamId: string
): string {
  if (winner === 'home') return homeTeamId;
  if (winner === 'away') return awayTeamId;
  return '';
}
