import * as path from 'path';
import { ConfigError, MissingInputError } from '../src/errors';
import {
  DEFAULT_SCORING_WEIGHTS,
  loadScoringWeights,
  parseScoringWeights,
  weightFor,
} from '../src/config/scoring-weights';
import { makeTempDir, removeDir, silenceConsole, writeFile } from './fixtures';

describe('Scoring weights config', () => {
  let dir: string;
  const savedEnv = process.env.SCORING_CONFIG_PATH;

  beforeEach(() => {
    silenceConsole();
    delete process.env.SCORING_CONFIG_PATH;
    dir = makeTempDir();
  });

  afterEach(() => {
    jest.restoreAllMocks();
    removeDir(dir);
    if (savedEnv === undefined) {
      delete process.env.SCORING_CONFIG_PATH;
    } else {
      process.env.SCORING_CONFIG_PATH = savedEnv;
    }
  });

  describe('parseScoringWeights', () => {
    test('empty document means defaults', () => {
      expect(parseScoringWeights('')).toEqual(DEFAULT_SCORING_WEIGHTS);
    });

    test('missing keys fall back to defaults', () => {
      expect(parseScoringWeights('playoff_win: 5\n')).toEqual({
        regular_season_win: 1,
        regular_season_loss: -1,
        playoff_win: 5,
        playoff_loss: -3,
      });
    });

    test('JSON is accepted', () => {
      expect(parseScoringWeights('{"regular_season_win": 2}').regular_season_win).toBe(2);
    });

    test('non-integer weights are rejected', () => {
      expect(() => parseScoringWeights('playoff_win: 2.5')).toThrow(ConfigError);
      expect(() => parseScoringWeights('playoff_win: three')).toThrow(ConfigError);
    });

    test('a list is not a weight mapping', () => {
      expect(() => parseScoringWeights('- 1\n- 2\n')).toThrow(ConfigError);
    });

    test('malformed YAML is a config error', () => {
      expect(() => parseScoringWeights('playoff_win: [1, 2')).toThrow(ConfigError);
    });

    test('unknown keys are ignored with a warning', () => {
      const weights = parseScoringWeights('tie: 0\nplayoff_loss: -2\n', 'scoring.yml');

      expect(weights.playoff_loss).toBe(-2);
      expect(console.warn).toHaveBeenCalledWith('[SCORING] Ignoring unknown weight keys in scoring.yml: tie');
    });
  });

  describe('loadScoringWeights', () => {
    test('bundled config matches the defaults', () => {
      expect(loadScoringWeights()).toEqual(DEFAULT_SCORING_WEIGHTS);
    });

    test('explicit path wins', () => {
      const file = writeFile(path.join(dir, 'weights.yml'), 'regular_season_win: 4\n');
      expect(loadScoringWeights(file).regular_season_win).toBe(4);
    });

    test('SCORING_CONFIG_PATH is used when no path is given', () => {
      process.env.SCORING_CONFIG_PATH = writeFile(path.join(dir, 'env.yml'), 'playoff_loss: -7\n');
      expect(loadScoringWeights().playoff_loss).toBe(-7);
    });

    test('a named file that does not exist is a missing input', () => {
      expect(() => loadScoringWeights(path.join(dir, 'nope.yml'))).toThrow(MissingInputError);
    });
  });

  test('weightFor picks by season type and outcome', () => {
    expect(weightFor(DEFAULT_SCORING_WEIGHTS, 'regular', 'win')).toBe(1);
    expect(weightFor(DEFAULT_SCORING_WEIGHTS, 'regular', 'loss')).toBe(-1);
    expect(weightFor(DEFAULT_SCORING_WEIGHTS, 'playoff', 'win')).toBe(3);
    expect(weightFor(DEFAULT_SCORING_WEIGHTS, 'playoff', 'loss')).toBe(-3);
  });
});
