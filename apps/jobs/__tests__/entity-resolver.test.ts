import { CodeReference, EntityResolver } from '../adapters/EntityResolver';
import type { LeagueNicknames } from '../src/config/nicknames';
import { silenceConsole, team } from './fixtures';

const nicknames: LeagueNicknames = { nhl: ['Maple Leafs', 'Golden Knights'], nfl: ['Football Team'] };

function emptyResolver(): EntityResolver {
  return new EntityResolver({ cities: [], teams: [] }, { nicknames, verbose: false });
}

const mlbNames = new Map<string, CodeReference>([
  [
    'KCA',
    {
      teamKey: 'KCA',
      teamName: 'Kansas City KCA',
      cityName: 'Kansas City',
      state: 'MO',
      disambiguate: true,
      altNames: 'KCA',
    },
  ],
]);

describe('Entity Resolver', () => {
  beforeEach(() => silenceConsole());
  afterEach(() => jest.restoreAllMocks());

  describe('name-based leagues', () => {
    test('registers city and team on first sight', () => {
      const resolver = emptyResolver();
      const resolved = resolver.resolveByName('nhl', 'Toronto Maple Leafs');

      expect(resolved).toEqual({
        teamId: 'nhl_toronto-maple-leafs',
        teamName: 'Toronto Maple Leafs',
        league: 'nhl',
        cityId: 'toronto',
        cityName: 'Toronto',
        status: 'resolved',
      });
      expect(resolver.pendingCities()).toEqual([
        { cityId: 'toronto', cityName: 'Toronto', state: '', country: 'USA', slug: 'toronto' },
      ]);
      expect(resolver.pendingTeams()).toEqual([team('nhl_toronto-maple-leafs', 'toronto', 'Toronto', {
        teamName: 'Toronto Maple Leafs',
        altNames: 'Maple Leafs',
      })]);
    });

    test('one city across leagues, first display name wins', () => {
      const resolver = emptyResolver();
      resolver.resolveByName('nhl', 'New York Rangers');
      resolver.resolveByName('nfl', 'New York Giants');
      const shouted = resolver.resolveByName('nfl', 'NEW YORK Jets');

      expect(shouted.cityId).toBe('new-york');
      expect(shouted.cityName).toBe('New York');
      expect(resolver.pendingCities().map(c => c.cityId)).toEqual(['new-york']);
      expect(resolver.pendingTeams().map(t => t.teamId)).toEqual([
        'nhl_new-york-rangers',
        'nfl_new-york-giants',
        'nfl_new-york-jets',
      ]);
    });

    test('repeat tokens do not register twice', () => {
      const resolver = emptyResolver();
      resolver.resolveByName('nhl', 'Vegas Golden Knights');
      resolver.resolveByName('nhl', '  Vegas   Golden Knights ');

      expect(resolver.pendingTeams()).toHaveLength(1);
      expect(resolver.pendingTeams()[0].teamId).toBe('nhl_vegas-golden-knights');
    });

    test('a name with no city becomes a placeholder', () => {
      const resolver = emptyResolver();
      const resolved = resolver.resolveByName('nhl', 'Maple Leafs');

      expect(resolved.status).toBe('placeholder');
      expect(resolved.cityId).toBe('maple-leafs');
      expect(resolved.cityName).toBe('Maple Leafs');
      expect(resolver.unresolved).toEqual([
        { league: 'nhl', token: 'Maple Leafs', teamId: 'nhl_maple-leafs', reason: 'no city in team name' },
      ]);
    });
  });

  describe('code-based leagues', () => {
    test('maps through the reference table with a disambiguated city id', () => {
      const resolver = emptyResolver();
      const resolved = resolver.resolveByCode('mlb', 'KCA', mlbNames);

      expect(resolved).toMatchObject({
        teamId: 'mlb_KCA',
        teamName: 'Kansas City KCA',
        cityId: 'kansas-city-mo',
        cityName: 'Kansas City',
        status: 'resolved',
      });
      expect(resolver.pendingCities()).toEqual([
        { cityId: 'kansas-city-mo', cityName: 'Kansas City', state: 'MO', country: 'USA', slug: 'kansas-city-mo' },
      ]);
    });

    test('an unmapped code degrades to a placeholder named after the code', () => {
      const resolver = emptyResolver();
      const first = resolver.resolveByCode('mlb', 'XYZ', mlbNames);
      resolver.resolveByCode('mlb', 'XYZ', mlbNames);

      expect(first).toMatchObject({
        teamId: 'mlb_XYZ',
        teamName: 'XYZ',
        cityId: 'xyz',
        cityName: 'XYZ',
        status: 'placeholder',
      });
      expect(resolver.unresolved).toEqual([
        { league: 'mlb', token: 'XYZ', teamId: 'mlb_XYZ', reason: 'code not in reference table' },
      ]);
      expect(resolver.pendingTeams()).toHaveLength(1);
      expect(console.warn).toHaveBeenCalledTimes(1);
    });
  });

  test('stored teams keep their city', () => {
    const resolver = new EntityResolver(
      {
        cities: [{ cityId: 'la', cityName: 'LA', state: '', country: 'USA', slug: 'la' }],
        teams: [team('nba_LAL', 'la', 'LA', { teamName: 'LA Lakers' })],
      },
      { nicknames, verbose: false }
    );
    const roster = new Map<string, CodeReference>([
      [
        'LAL',
        { teamKey: 'LAL', teamName: 'Los Angeles Lakers', cityName: 'Los Angeles', state: '', disambiguate: false, altNames: '' },
      ],
    ]);

    const resolved = resolver.resolveByCode('nba', 'LAL', roster);

    expect(resolved.cityId).toBe('la');
    expect(resolved.teamName).toBe('LA Lakers');
    expect(resolver.pendingTeams()).toEqual([]);
    expect(resolver.pendingCities()).toEqual([]);
  });

  test('each resolver owns its own state', () => {
    const first = emptyResolver();
    first.resolveByName('nhl', 'Boston Bruins');

    const second = emptyResolver();
    expect(second.pendingTeams()).toEqual([]);
    expect(second.unresolved).toEqual([]);
  });

  test('verbose mode logs each registration', () => {
    const resolver = new EntityResolver({ cities: [], teams: [] }, { nicknames, verbose: true });
    resolver.resolveByName('nhl', 'Boston Bruins');

    expect(console.log).toHaveBeenCalledWith('[ENTITY_RESOLVER] resolved: "Boston Bruins" → nhl_boston-bruins (boston)');
  });
});
