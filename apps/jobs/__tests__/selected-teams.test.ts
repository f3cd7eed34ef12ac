import * as fs from 'fs';
import * as path from 'path';
import {
  resolveSelection,
  selectedMonthlyFileName,
  selectedMonthRecord,
  selectTeamsMonthly,
  TeamSelection,
} from '../src/rollups/selected-teams';
import { buildTeamCityMap, writeTeamCityMap } from '../src/rollups/team-city-map';
import { ledgerRow, makeTempDir, removeDir, silenceConsole, team } from './fixtures';

const teams = [
  team('nhl_new-york-rangers', 'new-york', 'New York', { teamName: 'New York Rangers', altNames: 'Rangers' }),
  team('nfl_new-york-giants', 'new-york', 'New York', { teamName: 'New York Giants', altNames: 'Giants' }),
  team('nba_NYK', 'new-york', 'New York', { teamName: 'New York Knicks', altNames: '1610612752' }),
  team('mlb_NYN', 'new-york', 'New York', { teamName: 'New York NYN' }),
  team('nhl_other', 'elsewhere', 'Elsewhere'),
];

const selection: TeamSelection = {
  nhl: 'New York Rangers',
  nfl: 'New York Giants',
  nba: 'NYK',
  mlb: 'NYN',
};

describe('Selected teams', () => {
  beforeEach(() => silenceConsole());
  afterEach(() => jest.restoreAllMocks());

  describe('resolveSelection', () => {
    test('matches a slugged full name', () => {
      expect(resolveSelection('nhl', 'New York Rangers', teams)?.teamId).toBe('nhl_new-york-rangers');
    });

    test('matches a league code', () => {
      expect(resolveSelection('nba', 'NYK', teams)?.teamId).toBe('nba_NYK');
    });

    test('matches a team name or alternate name, ignoring case', () => {
      expect(resolveSelection('mlb', 'new york nyn', teams)?.teamId).toBe('mlb_NYN');
      expect(resolveSelection('nba', '1610612752', teams)?.teamId).toBe('nba_NYK');
    });

    test('only looks inside the requested league', () => {
      expect(resolveSelection('nfl', 'New York Rangers', teams)).toBeUndefined();
    });
  });

  test('sums the selected teams per month', () => {
    const ledger = [
      ledgerRow('nhl_new-york-rangers', '2023-01-05', 1, 1),
      ledgerRow('nba_NYK', '2023-01-20', -1, -1),
      ledgerRow('mlb_NYN', '2023-02-03', 1, 1),
      ledgerRow('nfl_new-york-giants', '2023-02-10', 0, 0),
      ledgerRow('nhl_other', '2023-02-11', 1, 1),
    ];

    const rows = selectTeamsMonthly(ledger, teams, selection);

    expect(rows).toEqual([
      { monthEnd: '2023-01-31', month: '2023-01-01', totalIndexScore: 0, games: 2 },
      { monthEnd: '2023-02-28', month: '2023-02-01', totalIndexScore: 1, games: 2 },
    ]);
    expect(selectedMonthRecord(rows[1])).toEqual({
      month_end: '2023-02-28',
      month: '2023-02-01',
      total_index_score: '1',
      games: '2',
    });
  });

  test('an unmatched token is warned about and contributes nothing', () => {
    const ledger = [ledgerRow('nhl_new-york-rangers', '2023-01-05', 1, 1)];

    expect(selectTeamsMonthly(ledger, teams, { ...selection, nhl: 'Nobody' })).toEqual([]);
    expect(console.warn).toHaveBeenCalledWith('[ROLLUPS] No nhl team matches "Nobody"');
  });

  test('default file name lists the selection in nhl, mlb, nba, nfl order', () => {
    expect(selectedMonthlyFileName(selection, '2024-05-06')).toBe(
      'monthly_20240506_nhl-new-york-rangers_mlb-nyn_nba-nyk_nfl-new-york-giants.csv'
    );
  });
});

describe('Team city map', () => {
  const mixed = [
    team('nba_NYK', 'new-york', 'New York'),
    team('nhl_b', 'boston', 'Boston'),
    team('nhl_a', 'anaheim', 'Anaheim'),
    team('xfl_t', 'tulsa', 'Tulsa'),
    team('ahl_h', 'hershey', 'Hershey'),
  ];

  test('known leagues first, then the rest by name; team ids sorted', () => {
    const map = buildTeamCityMap(mixed);

    expect(Object.keys(map)).toEqual(['nhl', 'nba', 'ahl', 'xfl']);
    expect(map.nhl).toEqual({ nhl_a: 'Anaheim', nhl_b: 'Boston' });
    expect(Object.keys(map.nhl)).toEqual(['nhl_a', 'nhl_b']);
  });

  test('writes indented JSON with a trailing newline', () => {
    const dir = makeTempDir();
    try {
      const file = path.join(dir, 'team_city_map.json');
      writeTeamCityMap(file, buildTeamCityMap(mixed.slice(0, 2)));

      expect(fs.readFileSync(file, 'utf8')).toBe(
        '{\n  "nhl": {\n    "nhl_b": "Boston"\n  },\n  "nba": {\n    "nba_NYK": "New York"\n  }\n}\n'
      );
    } finally {
      removeDir(dir);
    }
  });
});
