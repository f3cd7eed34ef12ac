/**
 * Ledger Builder
 *
 * Expands each canonical game into two team-perspective rows and orders the
 * ledger by (date, league, game_id, team_id). Downstream consumers diff the
 * ledger file between runs, so the order must be stable.
 */

import { DEFAULT_SCORING_WEIGHTS, ScoringWeights } from '../config/scoring-weights';
import { OutcomeInput, WinnerSide, scoreOutcome } from '../scoring/outcome-scorer';
import type { Game, TeamGameResult } from '../store/schemas';
import { monthStart, weekStart } from './calendar';

/**
 * Map a game's winning_team_id back onto a side. An id that matches neither
 * team yields null, so the game scores as undecided instead of a double loss.
 */
export function winnerSideOf(game: Game): WinnerSide | null {
  if (!game.winningTeamId) return null;
  if (game.winningTeamId === game.homeTeamId) return 'home';
  if (game.winningTeamId === game.awayTeamId) return 'away';
  return null;
}

export function buildTeamGameResults(
  game: Game,
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): [TeamGameResult, TeamGameResult] {
  const input: OutcomeInput = {
    seasonType: game.seasonType,
    homeScore: game.homeScore,
    awayScore: game.awayScore,
    winner: winnerSideOf(game),
  };
  const scored = scoreOutcome(input, weights);

  const shared = {
    gameId: game.gameId,
    date: game.date,
    league: game.league,
    seasonType: game.seasonType,
    weekStart: weekStart(game.date),
    monthStart: monthStart(game.date),
  };

  const home: TeamGameResult = {
    ...shared,
    teamId: game.homeTeamId,
    opponentTeamId: game.awayTeamId,
    isHome: true,
    teamScore: game.homeScore,
    opponentScore: game.awayScore,
    ...scored.home,
  };

  const away: TeamGameResult = {
    ...shared,
    teamId: game.awayTeamId,
    opponentTeamId: game.homeTeamId,
    isHome: false,
    teamScore: game.awayScore,
    opponentScore: game.homeScore,
    ...scored.away,
  };

  return [home, away];
}

export function compareText(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

export function compareLedgerRows(a: TeamGameResult, b: TeamGameResult): number {
  return (
    compareText(a.date, b.date) ||
    compareText(a.league, b.league) ||
    compareText(a.gameId, b.gameId) ||
    compareText(a.teamId, b.teamId)
  );
}

export function buildLedger(
  games: readonly Game[],
  weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS
): TeamGameResult[] {
  const rows = games.flatMap(game => buildTeamGameResults(game, weights));
  return rows.sort(compareLedgerRows);
}
