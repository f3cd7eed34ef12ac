import { cityIdFor, slugify, splitCityTeam } from '../lib/name-normalizer';
import { loadNicknames } from '../src/config/nicknames';
import { ConfigError, MissingInputError } from '../src/errors';
import { validateNicknameDocument } from '../src/utils/validate-nicknames';
import { BUNDLED_NICKNAMES, silenceConsole } from './fixtures';

describe('Name normalization', () => {
  beforeEach(() => silenceConsole());
  afterEach(() => jest.restoreAllMocks());

  describe('slugify / cityIdFor', () => {
    test('lowercases, drops periods and hyphenates whitespace', () => {
      expect(slugify('St. Louis')).toBe('st-louis');
      expect(slugify('  New   York ')).toBe('new-york');
      expect(slugify('Dallas/Fort Worth')).toBe('dallas-fort-worth');
    });

    test('state suffix only when asked for', () => {
      expect(cityIdFor('Kansas City')).toBe('kansas-city');
      expect(cityIdFor('Kansas City', 'MO')).toBe('kansas-city-mo');
      expect(cityIdFor('Portland', ' ')).toBe('portland');
    });

    test('differently cased city strings share an id', () => {
      expect(cityIdFor('TORONTO')).toBe(cityIdFor(' toronto '));
    });
  });

  describe('splitCityTeam', () => {
    const nicknames = loadNicknames(BUNDLED_NICKNAMES);

    // Every curated nickname must split off cleanly, whatever the city
    test.each([...nicknames.nhl.map(n => ['nhl', n]), ...nicknames.nfl.map(n => ['nfl', n])])(
      '%s nickname "%s" splits off a multi-word city',
      (league, nick) => {
        const list = league === 'nhl' ? nicknames.nhl : nicknames.nfl;
        expect(splitCityTeam(`San Testo ${nick}`, list)).toEqual({ city: 'San Testo', nickname: nick });
      }
    );

    test('real multi-word nicknames', () => {
      expect(splitCityTeam('Toronto Maple Leafs', nicknames.nhl)).toEqual({ city: 'Toronto', nickname: 'Maple Leafs' });
      expect(splitCityTeam('Vegas Golden Knights', nicknames.nhl)).toEqual({ city: 'Vegas', nickname: 'Golden Knights' });
      expect(splitCityTeam('Columbus Blue Jackets', nicknames.nhl)).toEqual({ city: 'Columbus', nickname: 'Blue Jackets' });
      expect(splitCityTeam('Detroit Red Wings', nicknames.nhl)).toEqual({ city: 'Detroit', nickname: 'Red Wings' });
      expect(splitCityTeam('Utah Hockey Club', nicknames.nhl)).toEqual({ city: 'Utah', nickname: 'Hockey Club' });
      expect(splitCityTeam('Washington Football Team', nicknames.nfl)).toEqual({
        city: 'Washington',
        nickname: 'Football Team',
      });
    });

    test('falls back to the last space for single-word nicknames', () => {
      expect(splitCityTeam('New York Rangers', nicknames.nhl)).toEqual({ city: 'New York', nickname: 'Rangers' });
      expect(splitCityTeam('St. Louis Blues', nicknames.nhl)).toEqual({ city: 'St. Louis', nickname: 'Blues' });
      expect(splitCityTeam('Toronto Maple Leafs', [])).toEqual({ city: 'Toronto Maple', nickname: 'Leafs' });
    });

    test('single word becomes the city', () => {
      expect(splitCityTeam('Sharks', nicknames.nhl)).toEqual({ city: 'Sharks', nickname: '' });
    });

    test('bare nickname leaves no city', () => {
      expect(splitCityTeam('Maple Leafs', nicknames.nhl)).toEqual({ city: '', nickname: 'Maple Leafs' });
    });

    test('nickname match is case-insensitive but needs a preceding space', () => {
      expect(splitCityTeam('toronto maple leafs', nicknames.nhl)).toEqual({ city: 'toronto', nickname: 'maple leafs' });
      expect(splitCityTeam('TorontoMaple Leafs', nicknames.nhl)).toEqual({ city: 'TorontoMaple', nickname: 'Leafs' });
    });
  });

  describe('nickname config', () => {
    test('bundled file loads both leagues', () => {
      const nicknames = loadNicknames(BUNDLED_NICKNAMES);
      expect(nicknames.nhl).toEqual(['Maple Leafs', 'Blue Jackets', 'Golden Knights', 'Red Wings', 'Hockey Club']);
      expect(nicknames.nfl).toEqual(['Football Team']);
    });

    test('duplicate nicknames are rejected case-insensitively', () => {
      expect(() => validateNicknameDocument({ nhl: ['Red Wings', 'red wings'] }, 'nicknames.yml')).toThrow(ConfigError);
    });

    test('league keys are lowercased and whitespace collapsed', () => {
      expect(validateNicknameDocument({ NHL: ['Maple   Leafs '] }, 'inline')).toEqual({ nhl: ['Maple Leafs'] });
    });

    test('non-string entries are rejected', () => {
      expect(() => validateNicknameDocument({ nhl: ['Red Wings', 7] }, 'inline')).toThrow(ConfigError);
      expect(() => validateNicknameDocument(['Red Wings'], 'inline')).toThrow(ConfigError);
    });

    test('an explicit path that does not exist is an error', () => {
      expect(() => loadNicknames('/nonexistent/nicknames.yml')).toThrow(MissingInputError);
    });
  });
});
