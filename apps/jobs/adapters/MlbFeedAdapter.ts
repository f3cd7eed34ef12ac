/**
 * MLB feed: game-info rows keyed by retro team codes (VT visitor, HT home).
 * `Game Winner` is 1 when the visitor won and 0 when the home side did.
 */

import { cityIdFor } from '../lib/name-normalizer';
import { normalizeDate } from '../src/ledger/calendar';
import { decideWinner, WinnerSide } from '../src/scoring/outcome-scorer';
import type { Game } from '../src/store/schemas';
import { parseScore, RawTable, readRows } from '../src/store/table-io';
import type { CodeReference, EntityResolver } from './EntityResolver';
import { FeedTransformResult, LeagueFeedAdapter, winningTeamId } from './LeagueFeedAdapter';

/**
 * Read the headerless team-names reference. Column 1 holds the retro code
 * and the last two columns hold city and state; a later row for the same
 * code replaces an earlier one.
 *
 * A city name listed under more than one state gets the state appended to
 * its city id.
 */
export function readMlbTeamNames(filePath: string): Map<string, CodeReference> {
  const rows = readRows(filePath, { required: true, description: 'MLB team names' }) ?? [];

  const latest = new Map<string, { city: string; state: string }>();
  for (const row of rows) {
    if (row.length < 3) continue;
    const code = row[1].trim();
    if (!code) continue;
    latest.set(code, { city: row[row.length - 2].trim(), state: row[row.length - 1].trim() });
  }

  const statesByCity = new Map<string, Set<string>>();
  for (const { city, state } of latest.values()) {
    if (!city || !state) continue;
    const key = cityIdFor(city);
    const states = statesByCity.get(key) ?? new Set<string>();
    states.add(state.toLowerCase());
    statesByCity.set(key, states);
  }

  const names = new Map<string, CodeReference>();
  for (const [code, { city, state }] of latest) {
    names.set(code, {
      teamKey: code,
      teamName: `${city} ${code}`.trim(),
      cityName: city,
      state,
      disambiguate: (statesByCity.get(cityIdFor(city))?.size ?? 0) > 1,
      altNames: code,
    });
  }
  return names;
}

function winnerFlag(raw: string): WinnerSide | null {
  const flag = parseScore(raw);
  if (flag === 1) return 'away';
  if (flag === 0) return 'home';
  return null;
}

export class MlbFeedAdapter implements LeagueFeedAdapter {
  readonly league = 'mlb';
  readonly requiredColumns = ['Date', 'VT', 'HT', 'VT Score', 'HT Score', 'Game Winner'] as const;

  constructor(private readonly names: ReadonlyMap<string, CodeReference>) {}

  getName(): string {
    return 'MLB game info';
  }

  transform(feed: RawTable, resolver: EntityResolver): FeedTransformResult {
    const codes = new Set<string>();
    for (const record of feed.records) {
      for (const code of [record.VT.trim(), record.HT.trim()]) {
        if (code) codes.add(code);
      }
    }
    // Register in code order so the team table does not depend on feed order
    for (const code of [...codes].sort()) {
      resolver.resolveByCode('mlb', code, this.names);
    }

    const games: Game[] = [];
    let skipped = 0;

    for (const record of feed.records) {
      const date = normalizeDate(record.Date);
      const visitor = record.VT.trim();
      const host = record.HT.trim();
      if (!date || !visitor || !host) {
        skipped++;
        continue;
      }

      const away = resolver.resolveByCode('mlb', visitor, this.names);
      const home = resolver.resolveByCode('mlb', host, this.names);
      const awayScore = parseScore(record['VT Score']);
      const homeScore = parseScore(record['HT Score']);
      const winner = decideWinner(homeScore, awayScore, winnerFlag(record['Game Winner']));

      const gameNumber = parseScore(record['Game Number']);
      const suffix = gameNumber !== null && gameNumber > 0 ? `_g${gameNumber}` : '';

      games.push({
        gameId: `mlb_${date}_${visitor}_${host}${suffix}`,
        date,
        league: 'mlb',
        seasonType: 'regular',
        homeTeamId: home.teamId,
        awayTeamId: away.teamId,
        homeScore,
        awayScore,
        winningTeamId: winningTeamId(winner, home.teamId, away.teamId),
      });
    }

    if (skipped > 0) {
      console.warn(`[MLB] Skipped ${skipped} feed rows without a date or team code`);
    }
    return { games, skipped };
  }
}
