/**
 * NBA feed: one row per team per game (TEAM_ABBREVIATION, GAME_ID,
 * MATCHUP, WL, PTS). Rows are paired by GAME_ID; home and away come from a
 * majority vote over the MATCHUP strings ("GSW @ POR" puts the row's team
 * away, "BKN vs. PHI" puts it at home).
 */

import { normalizeDate } from '../src/ledger/calendar';
import { decideWinner, WinnerSide } from '../src/scoring/outcome-scorer';
import type { Game, SeasonType } from '../src/store/schemas';
import { parseScore, RawTable, readTable, requireColumns, TableRecord } from '../src/store/table-io';
import type { CodeReference, EntityResolver } from './EntityResolver';
import { FeedTransformResult, LeagueFeedAdapter, winningTeamId } from './LeagueFeedAdapter';

export const NBA_ROSTER_COLUMNS = ['teamId', 'abbreviation', 'teamName', 'location'] as const;

/** SEASON_ID prefix the league uses for postseason games */
const PLAYOFF_SEASON_PREFIX = '4';

export interface MatchupSides {
  home: string;
  away: string;
}

/**
 * Read the roster reference (teamId, abbreviation, teamName, simpleName,
 * location) keyed by abbreviation, or by teamId when the abbreviation is blank
 */
export function readNbaRoster(filePath: string): Map<string, CodeReference> {
  const table = readTable(filePath, { required: true, description: 'NBA team roster' });
  requireColumns('NBA team roster', table.columns, NBA_ROSTER_COLUMNS);

  const roster = new Map<string, CodeReference>();
  for (const record of table.records) {
    const abbreviation = record.abbreviation.trim();
    const numericId = record.teamId.trim();
    const teamKey = abbreviation || numericId;
    if (!teamKey) continue;

    const location = record.location.trim();
    roster.set(teamKey, {
      teamKey,
      teamName: `${location} ${record.teamName.trim()}`.trim(),
      cityName: location,
      state: '',
      disambiguate: false,
      altNames: numericId,
    });
  }
  return roster;
}

export function parseMatchup(matchup: string): MatchupSides | null {
  const text = matchup.trim();

  const at = text.split('@');
  if (at.length === 2) {
    const [away, home] = at.map(s => s.trim());
    return away && home ? { home, away } : null;
  }

  const vs = text.split(/\s+vs\.?\s+/i);
  if (vs.length === 2) {
    const [home, away] = vs.map(s => s.trim());
    return away && home ? { home, away } : null;
  }

  return null;
}

/**
 * Most frequent value; ties go to the first one seen
 */
function mode(values: readonly string[]): string | undefined {
  const counts = new Map<string, number>();
  for (const value of values) {
    counts.set(value, (counts.get(value) ?? 0) + 1);
  }

  let best: string | undefined;
  let bestCount = 0;
  for (const [value, count] of counts) {
    if (count > bestCount) {
      best = value;
      bestCount = count;
    }
  }
  return best;
}

export class NbaFeedAdapter implements LeagueFeedAdapter {
  readonly league = 'nba';
  readonly requiredColumns = ['TEAM_ABBREVIATION', 'GAME_ID', 'GAME_DATE', 'MATCHUP', 'WL', 'PTS'] as const;

  constructor(private readonly roster: ReadonlyMap<string, CodeReference>) {}

  getName(): string {
    return 'NBA team game logs';
  }

  transform(feed: RawTable, resolver: EntityResolver): FeedTransformResult {
    // The whole roster is registered up front, played or not
    for (const ref of this.roster.values()) {
      resolver.registerReference('nba', ref);
    }

    const byGame = new Map<string, TableRecord[]>();
    let skipped = 0;
    for (const record of feed.records) {
      const gameKey = record.GAME_ID.trim();
      if (!gameKey) {
        skipped++;
        continue;
      }
      const rows = byGame.get(gameKey);
      if (rows) {
        rows.push(record);
      } else {
        byGame.set(gameKey, [record]);
      }
    }

    const games: Game[] = [];
    for (const [gameKey, rows] of byGame) {
      const game = this.buildGame(gameKey, rows, resolver);
      if (game) {
        games.push(game);
      } else {
        skipped += rows.length;
      }
    }

    if (skipped > 0) {
      console.warn(`[NBA] Skipped ${skipped} feed rows without a game id, date or readable matchup`);
    }
    return { games, skipped };
  }

  private buildGame(gameKey: string, rows: readonly TableRecord[], resolver: EntityResolver): Game | null {
    const sides = rows.map(r => parseMatchup(r.MATCHUP)).filter((s): s is MatchupSides => s !== null);
    const homeCode = mode(sides.map(s => s.home));
    const awayCode = mode(sides.map(s => s.away));
    const date = rows.map(r => normalizeDate(r.GAME_DATE)).find((d): d is string => d !== null);

    if (!homeCode || !awayCode || !date) {
      return null;
    }

    const codeOf = (r: TableRecord): string => r.TEAM_ABBREVIATION.trim();
    const homeRow = rows.find(r => codeOf(r) === homeCode);
    const awayRow = rows.find(r => codeOf(r) === awayCode);
    const homeScore = homeRow ? parseScore(homeRow.PTS) : null;
    const awayScore = awayRow ? parseScore(awayRow.PTS) : null;

    const seasonType: SeasonType = rows.some(r => (r.SEASON_ID ?? '').trim().startsWith(PLAYOFF_SEASON_PREFIX))
      ? 'playoff'
      : 'regular';

    const home = resolver.resolveByCode('nba', homeCode, this.roster);
    const away = resolver.resolveByCode('nba', awayCode, this.roster);
    const winner = decideWinner(homeScore, awayScore, this.winnerIndicator(rows, homeCode, awayCode));

    return {
      gameId: `nba_${gameKey}`,
      date,
      league: 'nba',
      seasonType,
      homeTeamId: home.teamId,
      awayTeamId: away.teamId,
      homeScore,
      awayScore,
      winningTeamId: winningTeamId(winner, home.teamId, away.teamId),
    };
  }

  /**
   * Winner side from the per-team WL flags: a W row names the winner,
   * otherwise an L row names the loser
   */
  private winnerIndicator(rows: readonly TableRecord[], homeCode: string, awayCode: string): WinnerSide | null {
    const sideOf = (r: TableRecord): WinnerSide | null => {
      const code = r.TEAM_ABBREVIATION.trim();
      if (code === homeCode) return 'home';
      if (code === awayCode) return 'away';
      return null;
    };
    const flag = (r: TableRecord): string => r.WL.trim().toUpperCase();

    const winRow = rows.find(r => flag(r) === 'W' && sideOf(r) !== null);
    if (winRow) return sideOf(winRow);

    const lossRow = rows.find(r => flag(r) === 'L' && sideOf(r) !== null);
    if (lossRow) return sideOf(lossRow) === 'home' ? 'away' : 'home';

    return null;
  }
}
