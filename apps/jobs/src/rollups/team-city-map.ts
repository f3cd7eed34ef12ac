/**
 * Team → city name lookup grouped by league, for renderers that label
 * team series with their city.
 */

import { compareText } from '../ledger/ledger-builder';
import type { Team } from '../store/schemas';
import { LEAGUES } from '../store/schemas';
import { writeFileAtomic } from '../store/table-io';

export type TeamCityMap = Record<string, Record<string, string>>;

export function buildTeamCityMap(teams: readonly Team[]): TeamCityMap {
  const byLeague = new Map<string, Team[]>();
  for (const team of teams) {
    const league = team.league.toLowerCase();
    const list = byLeague.get(league) ?? [];
    list.push(team);
    byLeague.set(league, list);
  }

  // Known leagues first, in their usual order; anything else after, by name
  const known: readonly string[] = LEAGUES;
  const leagues = [
    ...LEAGUES.filter(l => byLeague.has(l)),
    ...[...byLeague.keys()].filter(l => !known.includes(l)).sort(compareText),
  ];

  const map: TeamCityMap = {};
  for (const league of leagues) {
    const entries: Record<string, string> = {};
    const sorted = [...(byLeague.get(league) ?? [])].sort((a, b) => compareText(a.teamId, b.teamId));
    for (const team of sorted) {
      if (!(team.teamId in entries)) entries[team.teamId] = team.cityName;
    }
    map[league] = entries;
  }
  return map;
}

export function writeTeamCityMap(filePath: string, map: TeamCityMap): void {
  writeFileAtomic(filePath, JSON.stringify(map, null, 2) + '\n');
}
