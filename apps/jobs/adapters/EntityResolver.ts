/**
 * Entity Resolver
 *
 * Maps raw per-league team tokens onto canonical Team and City identities.
 * One resolver is built per ingestion stage from the tables already on disk;
 * it registers each identity it has not seen before and never rewrites a
 * stored one.
 *
 * Missing mappings degrade to a placeholder identity (tagged as such and
 * collected in `unresolved`) so every game is still counted.
 */

import { cityIdFor, slugify, splitCityTeam } from '../lib/name-normalizer';
import type { LeagueNicknames } from '../src/config/nicknames';
import type { City, CodeBasedLeague, League, NameBasedLeague, Team } from '../src/store/schemas';

export type ResolutionStatus = 'resolved' | 'placeholder';

export interface ResolvedTeam {
  teamId: string;
  teamName: string;
  league: League;
  cityId: string;
  cityName: string;
  status: ResolutionStatus;
  reason?: string;
}

export interface UnresolvedEntity {
  league: League;
  token: string;
  teamId: string;
  reason: string;
}

/**
 * One row of a code-based league's team→city reference table
 */
export interface CodeReference {
  /** Suffix for the team id (`<league>_<teamKey>`) */
  teamKey: string;
  teamName: string;
  cityName: string;
  state: string;
  /** Append the state to the city id (same city name in several states) */
  disambiguate: boolean;
  altNames: string;
}

export interface EntityResolverOptions {
  nicknames: LeagueNicknames;
  verbose?: boolean;
}

export const DEFAULT_COUNTRY = 'USA';

export class EntityResolver {
  private cities = new Map<string, City>();
  private teams = new Map<string, Team>();
  private newCities: City[] = [];
  private newTeams: Team[] = [];
  private unresolvedKeys = new Set<string>();
  private verboseLogging: boolean;

  readonly unresolved: UnresolvedEntity[] = [];

  constructor(
    existing: { cities: readonly City[]; teams: readonly Team[] },
    private readonly options: EntityResolverOptions
  ) {
    this.verboseLogging = options.verbose ?? process.env.LOG_RESOLVER_VERBOSE === 'true';
    for (const city of existing.cities) {
      if (!this.cities.has(city.cityId)) this.cities.set(city.cityId, city);
    }
    for (const team of existing.teams) {
      if (!this.teams.has(team.teamId)) this.teams.set(team.teamId, team);
    }
  }

  /**
   * Cities registered during this stage, in first-seen order
   */
  pendingCities(): City[] {
    return [...this.newCities];
  }

  /**
   * Teams registered during this stage, in first-seen order
   */
  pendingTeams(): Team[] {
    return [...this.newTeams];
  }

  /**
   * Resolve a "City Nickname" string (NHL, NFL)
   */
  resolveByName(league: NameBasedLeague, fullName: string): ResolvedTeam {
    const name = fullName.trim().replace(/\s+/g, ' ');
    const { city, nickname } = splitCityTeam(name, this.options.nicknames[league]);
    const teamId = `${league}_${slugify(name)}`;

    if (!city) {
      return this.register(
        {
          teamId,
          teamName: name,
          league,
          cityId: cityIdFor(name),
          cityName: name,
          status: 'placeholder',
          reason: 'no city in team name',
        },
        { state: '', altNames: nickname, token: name }
      );
    }

    return this.register(
      { teamId, teamName: name, league, cityId: cityIdFor(city), cityName: city, status: 'resolved' },
      { state: '', altNames: nickname, token: name }
    );
  }

  /**
   * Resolve a league-issued code (NBA abbreviation, MLB retro code) through
   * its reference table. Unknown codes become their own placeholder city.
   */
  resolveByCode(league: CodeBasedLeague, code: string, reference: ReadonlyMap<string, CodeReference>): ResolvedTeam {
    const token = code.trim();
    const ref = reference.get(token);

    if (!ref || !ref.cityName) {
      return this.register(
        {
          teamId: `${league}_${token}`,
          teamName: token,
          league,
          cityId: cityIdFor(token),
          cityName: token,
          status: 'placeholder',
          reason: 'code not in reference table',
        },
        { state: '', altNames: token, token }
      );
    }

    return this.register(
      {
        teamId: `${league}_${ref.teamKey}`,
        teamName: ref.teamName,
        league,
        cityId: cityIdFor(ref.cityName, ref.disambiguate ? ref.state : undefined),
        cityName: ref.cityName,
        status: 'resolved',
      },
      { state: ref.state, altNames: ref.altNames, token }
    );
  }

  /**
   * Register a reference row up front (NBA seeds its whole roster)
   */
  registerReference(league: CodeBasedLeague, ref: CodeReference): ResolvedTeam {
    return this.resolveByCode(league, ref.teamKey, new Map([[ref.teamKey, ref]]));
  }

  private register(
    resolved: ResolvedTeam,
    extra: { state: string; altNames: string; token: string }
  ): ResolvedTeam {
    if (resolved.status === 'placeholder') {
      this.recordUnresolved(resolved, extra.token);
    }

    // Stored teams keep their city; identities are never rewritten
    const stored = this.teams.get(resolved.teamId);
    if (stored) {
      return { ...resolved, teamName: stored.teamName, cityId: stored.cityId, cityName: stored.cityName };
    }

    let city = this.cities.get(resolved.cityId);
    if (!city) {
      city = {
        cityId: resolved.cityId,
        cityName: resolved.cityName,
        state: extra.state,
        country: DEFAULT_COUNTRY,
        slug: resolved.cityId,
      };
      this.cities.set(city.cityId, city);
      this.newCities.push(city);
    }

    const team: Team = {
      teamId: resolved.teamId,
      teamName: resolved.teamName,
      league: resolved.league,
      cityId: city.cityId,
      cityName: city.cityName,
      startDate: '',
      endDate: '',
      altNames: extra.altNames,
    };
    this.teams.set(team.teamId, team);
    this.newTeams.push(team);

    if (this.verboseLogging) {
      console.log(`[ENTITY_RESOLVER] ${resolved.status}: "${extra.token}" → ${team.teamId} (${city.cityId})`);
    }

    return { ...resolved, cityId: city.cityId, cityName: city.cityName };
  }

  private recordUnresolved(resolved: ResolvedTeam, token: string): void {
    const key = `${resolved.league}:${token}`;
    if (this.unresolvedKeys.has(key)) return;
    this.unresolvedKeys.add(key);
    this.unresolved.push({
      league: resolved.league,
      token,
      teamId: resolved.teamId,
      reason: resolved.reason ?? 'unresolved',
    });
    console.warn(`[ENTITY_RESOLVER] Placeholder identity for ${resolved.league} "${token}": ${resolved.reason}`);
  }
}
