/**
 * Outcome Scorer
 *
 * Turns a final score into signed outcomes for both sides of a game:
 * +1 for the winner, -1 for the loser, scaled by the configured weight for
 * the season type. Incomplete games and ties score 0 for both sides.
 */

import { DEFAULT_SCORING_WEIGHTS, ScoringWeights, weightFor } from '../config/scoring-weights';
import type { IndexScore, ResultFlag, SeasonType } from '../store/schemas';

export type WinnerSide = 'home' | 'away';

export interface OutcomeInput {
  seasonType: SeasonType;
  homeScore: number | null;
  awayScore: number | null;
  /** Which side the feed says won; authoritative whenever the scores differ */
  winner: WinnerSide | null;
}

export interface Outcome {
  result: ResultFlag;
  indexScore: IndexScore;
  weightedScore: number;
}

export interface ScoredGame {
  home: Outcome;
  away: Outcome;
  /** False when the game counts as played but carries no weight */
  decided: boolean;
}

export const NEUTRAL_OUTCOME: Readonly<Outcome> = { result: '', indexScore: 0, weightedScore: 0 };

/**
 * Winner implied by the scores alone; null for ties and missing scores
 */
export function winnerFromScores(homeScore: number | null, awayScore: number | null): WinnerSide | null {
  if (homeScore === null || awayScore === null || homeScore === awayScore) {
    return null;
  }
  return homeScore > awayScore ? 'home' : 'away';
}

/**
 * Final winner for a game: the feed's indicator, but only when both scores
 * are known and not level.
 */
export function decideWinner(
  homeScore: number | null,
  awayScore: number | null,
  indicator: WinnerSide | null
): WinnerSide | null {
  if (homeScore === null || awayScore === null || homeScore === awayScore) {
    return null;
  }
  return indicator;
}

function decided(seasonType: SeasonType, outcome: 'win' | 'loss', weights: ScoringWeights): Outcome {
  const indexScore: IndexScore = outcome === 'win' ? 1 : -1;
  return {
    result: outcome === 'win' ? 'W' : 'L',
    indexScore,
    // `|| 0` folds -0 (a zero weight on a loss) into 0
    weightedScore: indexScore * Math.abs(weightFor(weights, seasonType, outcome)) || 0,
  };
}

export function scoreOutcome(input: OutcomeInput, weights: ScoringWeights = DEFAULT_SCORING_WEIGHTS): ScoredGame {
  const winner = decideWinner(input.homeScore, input.awayScore, input.winner);
  if (winner === null) {
    return { home: { ...NEUTRAL_OUTCOME }, away: { ...NEUTRAL_OUTCOME }, decided: false };
  }

  return {
    home: decided(input.seasonType, winner === 'home' ? 'win' : 'loss', weights),
    away: decided(input.seasonType, winner === 'away' ? 'win' : 'loss', weights),
    decided: true,
  };
}
