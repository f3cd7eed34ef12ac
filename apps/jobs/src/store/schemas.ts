/**
 * Canonical Table Schemas
 *
 * Domain row types plus the column layout each one is persisted under.
 * Column order is part of the contract with downstream renderers.
 */

import { normalizeDate } from '../ledger/calendar';
import { TableSpec, formatNumber, parseScore } from './table-io';

export type League = 'nhl' | 'nfl' | 'nba' | 'mlb';
export type NameBasedLeague = 'nhl' | 'nfl';
export type CodeBasedLeague = 'nba' | 'mlb';

export const LEAGUES: readonly League[] = ['nhl', 'nfl', 'nba', 'mlb'];

export function isLeague(value: string): value is League {
  return (LEAGUES as readonly string[]).includes(value);
}

export type SeasonType = 'regular' | 'playoff';
export type ResultFlag = 'W' | 'L' | '';
export type IndexScore = 1 | -1 | 0;

export function toSeasonType(raw: string): SeasonType {
  return raw.trim().toLowerCase() === 'playoff' ? 'playoff' : 'regular';
}

export function toIndexScore(raw: string): IndexScore {
  const value = parseScore(raw);
  if (value === null || value === 0) return 0;
  return value > 0 ? 1 : -1;
}

function toResultFlag(raw: string): ResultFlag {
  const value = raw.trim().toUpperCase();
  return value === 'W' || value === 'L' ? value : '';
}

function toNumber(raw: string | undefined): number {
  const value = Number((raw ?? '').trim());
  return Number.isFinite(value) ? value : 0;
}

export interface City {
  cityId: string;
  cityName: string;
  state: string;
  country: string;
  slug: string;
}

export interface Team {
  teamId: string;
  teamName: string;
  league: string;
  cityId: string;
  cityName: string;
  startDate: string;
  endDate: string;
  altNames: string;
}

export interface Game {
  gameId: string;
  date: string;
  league: string;
  seasonType: SeasonType;
  homeTeamId: string;
  awayTeamId: string;
  homeScore: number | null;
  awayScore: number | null;
  winningTeamId: string;
}

/**
 * Split off games whose date could not be read
 */
export function partitionDated(games: readonly Game[]): { dated: Game[]; undated: Game[] } {
  const dated: Game[] = [];
  const undated: Game[] = [];
  for (const game of games) {
    (game.date ? dated : undated).push(game);
  }
  return { dated, undated };
}

export interface TeamGameResult {
  gameId: string;
  date: string;
  league: string;
  seasonType: SeasonType;
  teamId: string;
  opponentTeamId: string;
  isHome: boolean;
  teamScore: number | null;
  opponentScore: number | null;
  result: ResultFlag;
  indexScore: IndexScore;
  weightedScore: number;
  weekStart: string;
  monthStart: string;
}

export const CITY_TABLE: TableSpec<City> = {
  name: 'cities.csv',
  columns: ['city_id', 'city_name', 'state', 'country', 'slug'],
  toRecord: c => ({
    city_id: c.cityId,
    city_name: c.cityName,
    state: c.state,
    country: c.country,
    slug: c.slug,
  }),
  fromRecord: r => ({
    cityId: r.city_id,
    cityName: r.city_name,
    state: r.state,
    country: r.country,
    slug: r.slug,
  }),
};

export const TEAM_TABLE: TableSpec<Team> = {
  name: 'teams.csv',
  columns: ['team_id', 'team_name', 'league', 'city_id', 'city_name', 'start_date', 'end_date', 'alt_names'],
  toRecord: t => ({
    team_id: t.teamId,
    team_name: t.teamName,
    league: t.league,
    city_id: t.cityId,
    city_name: t.cityName,
    start_date: t.startDate,
    end_date: t.endDate,
    alt_names: t.altNames,
  }),
  fromRecord: r => ({
    teamId: r.team_id,
    teamName: r.team_name,
    league: r.league,
    cityId: r.city_id,
    cityName: r.city_name,
    startDate: r.start_date,
    endDate: r.end_date,
    altNames: r.alt_names,
  }),
};

export const GAME_TABLE: TableSpec<Game> = {
  name: 'games.csv',
  columns: [
    'game_id',
    'date',
    'league',
    'season_type',
    'home_team_id',
    'away_team_id',
    'home_score',
    'away_score',
    'winning_team_id',
  ],
  toRecord: g => ({
    game_id: g.gameId,
    date: g.date,
    league: g.league,
    season_type: g.seasonType,
    home_team_id: g.homeTeamId,
    away_team_id: g.awayTeamId,
    home_score: formatNumber(g.homeScore),
    away_score: formatNumber(g.awayScore),
    winning_team_id: g.winningTeamId,
  }),
  fromRecord: r => ({
    gameId: r.game_id.trim(),
    // Blank when the cell is not a readable date; callers drop such rows
    date: normalizeDate(r.date) ?? '',
    league: r.league.trim().toLowerCase(),
    seasonType: toSeasonType(r.season_type),
    homeTeamId: r.home_team_id.trim(),
    awayTeamId: r.away_team_id.trim(),
    homeScore: parseScore(r.home_score),
    awayScore: parseScore(r.away_score),
    winningTeamId: r.winning_team_id.trim(),
  }),
};

export const LEDGER_TABLE: TableSpec<TeamGameResult> = {
  name: 'team_game_results.csv',
  columns: [
    'game_id',
    'date',
    'league',
    'season_type',
    'team_id',
    'opponent_team_id',
    'is_home',
    'team_score',
    'opponent_score',
    'result',
    'index_score',
    'weighted_score',
    'week_start',
    'month_start',
  ],
  toRecord: row => ({
    game_id: row.gameId,
    date: row.date,
    league: row.league,
    season_type: row.seasonType,
    team_id: row.teamId,
    opponent_team_id: row.opponentTeamId,
    is_home: row.isHome ? 'true' : 'false',
    team_score: formatNumber(row.teamScore),
    opponent_score: formatNumber(row.opponentScore),
    result: row.result,
    index_score: String(row.indexScore),
    weighted_score: String(row.weightedScore),
    week_start: row.weekStart,
    month_start: row.monthStart,
  }),
  fromRecord: r => ({
    gameId: r.game_id,
    date: r.date,
    league: r.league,
    seasonType: toSeasonType(r.season_type),
    teamId: r.team_id,
    opponentTeamId: r.opponent_team_id,
    isHome: r.is_home.trim().toLowerCase() === 'true',
    teamScore: parseScore(r.team_score),
    opponentScore: parseScore(r.opponent_score),
    result: toResultFlag(r.result),
    indexScore: toIndexScore(r.index_score),
    weightedScore: toNumber(r.weighted_score),
    weekStart: r.week_start,
    monthStart: r.month_start,
  }),
};
