/**
 * Scoring Weights Configuration Loader
 *
 * Loads the outcome weights from scoring.yml (JSON is accepted too, YAML being
 * a superset). Keys left out of the file fall back to the defaults.
 */

import * as fs from 'fs';
import * as path from 'path';
import * as yaml from 'js-yaml';
import { ConfigError, MissingInputError, errMsg } from '../errors';
import type { SeasonType } from '../store/schemas';

export interface ScoringWeights {
  regular_season_win: number;
  regular_season_loss: number;
  playoff_win: number;
  playoff_loss: number;
}

export const WEIGHT_KEYS: readonly (keyof ScoringWeights)[] = [
  'regular_season_win',
  'regular_season_loss',
  'playoff_win',
  'playoff_loss',
];

export const DEFAULT_SCORING_WEIGHTS: Readonly<ScoringWeights> = {
  regular_season_win: 1,
  regular_season_loss: -1,
  playoff_win: 3,
  playoff_loss: -3,
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Parse and validate weights from YAML/JSON text
 */
export function parseScoringWeights(content: string, source = 'scoring config'): ScoringWeights {
  let parsed: unknown;
  try {
    parsed = yaml.load(content);
  } catch (error) {
    throw new ConfigError(`Invalid YAML: ${errMsg(error)}`, source);
  }

  if (parsed === undefined || parsed === null) {
    return { ...DEFAULT_SCORING_WEIGHTS };
  }
  if (!isRecord(parsed)) {
    throw new ConfigError('Invalid structure: expected a mapping of weight keys to integers', source);
  }

  const weights: ScoringWeights = { ...DEFAULT_SCORING_WEIGHTS };
  for (const key of WEIGHT_KEYS) {
    const value = parsed[key];
    if (value === undefined) continue;
    if (typeof value !== 'number' || !Number.isInteger(value)) {
      throw new ConfigError(`Weight "${key}" must be an integer, got ${JSON.stringify(value)}`, source);
    }
    weights[key] = value;
  }

  const unknown = Object.keys(parsed).filter(k => !(WEIGHT_KEYS as readonly string[]).includes(k));
  if (unknown.length) {
    console.warn(`[SCORING] Ignoring unknown weight keys in ${source}: ${unknown.join(', ')}`);
  }

  return weights;
}

export function defaultScoringConfigPath(): string {
  return path.join(__dirname, '../../config/scoring.yml');
}

/**
 * Load weights for one pipeline run.
 *
 * Resolution order: explicit path, SCORING_CONFIG_PATH, bundled scoring.yml.
 * An explicitly named file must exist; a missing bundled file means defaults.
 */
export function loadScoringWeights(configPath?: string): ScoringWeights {
  const explicit = configPath ?? process.env.SCORING_CONFIG_PATH;

  if (explicit) {
    if (!fs.existsSync(explicit)) {
      throw new MissingInputError(explicit, 'scoring config');
    }
    return parseScoringWeights(fs.readFileSync(explicit, 'utf8'), explicit);
  }

  const bundled = defaultScoringConfigPath();
  if (!fs.existsSync(bundled)) {
    console.log('[SCORING] No scoring config found, using default weights');
    return { ...DEFAULT_SCORING_WEIGHTS };
  }
  return parseScoringWeights(fs.readFileSync(bundled, 'utf8'), bundled);
}

/**
 * Configured weight for a decided outcome
 */
export function weightFor(weights: ScoringWeights, seasonType: SeasonType, outcome: 'win' | 'loss'): number {
  if (seasonType === 'playoff') {
    return outcome === 'win' ? weights.playoff_win : weights.playoff_loss;
  }
  return outcome === 'win' ? weights.regular_season_win : weights.regular_season_loss;
}
