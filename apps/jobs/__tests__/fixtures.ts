import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import { monthStart, weekStart } from '../src/ledger/calendar';
import type { Game, IndexScore, Team, TeamGameResult } from '../src/store/schemas';

export const BUNDLED_NICKNAMES = path.join(__dirname, '../config/nicknames.yml');
export const BUNDLED_SCORING = path.join(__dirname, '../config/scoring.yml');

export function makeTempDir(): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), 'happiness-'));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}

export function writeFile(filePath: string, content: string): string {
  fs.mkdirSync(path.dirname(filePath), { recursive: true });
  fs.writeFileSync(filePath, content, 'utf8');
  return filePath;
}

/**
 * A decided regular-season game; the higher score wins unless overridden
 */
export function game(overrides: Partial<Game> & Pick<Game, 'gameId' | 'date' | 'homeTeamId' | 'awayTeamId'>): Game {
  const homeScore = overrides.homeScore === undefined ? 3 : overrides.homeScore;
  const awayScore = overrides.awayScore === undefined ? 1 : overrides.awayScore;
  let winningTeamId = '';
  if (homeScore !== null && awayScore !== null && homeScore !== awayScore) {
    winningTeamId = homeScore > awayScore ? overrides.homeTeamId : overrides.awayTeamId;
  }
  return {
    league: 'nhl',
    seasonType: 'regular',
    winningTeamId,
    ...overrides,
    homeScore,
    awayScore,
  };
}

export function team(teamId: string, cityId: string, cityName: string, extra: Partial<Team> = {}): Team {
  return {
    teamId,
    teamName: teamId,
    league: teamId.split('_')[0],
    cityId,
    cityName,
    startDate: '',
    endDate: '',
    altNames: '',
    ...extra,
  };
}

/**
 * One ledger row; the result flag follows the sign of the index score
 */
export function ledgerRow(
  teamId: string,
  date: string,
  indexScore: IndexScore,
  weightedScore: number,
  extra: Partial<TeamGameResult> = {}
): TeamGameResult {
  return {
    gameId: `${teamId}_${date}`,
    date,
    league: teamId.split('_')[0],
    seasonType: 'regular',
    teamId,
    opponentTeamId: 'opponent',
    isHome: true,
    teamScore: null,
    opponentScore: null,
    result: indexScore === 1 ? 'W' : indexScore === -1 ? 'L' : '',
    indexScore,
    weightedScore,
    weekStart: weekStart(date),
    monthStart: monthStart(date),
    ...extra,
  };
}

export function silenceConsole(): void {
  jest.spyOn(console, 'log').mockImplementation(() => undefined);
  jest.spyOn(console, 'warn').mockImplementation(() => undefined);
}
