/**
 * Nickname Table Loader
 *
 * The curated multi-word nickname lists that drive "City Nickname" splitting
 * for name-based leagues. Loaded once per stage and passed down explicitly.
 */

import * as fs from 'fs';
import * as path from 'path';
import { MissingInputError } from '../errors';
import type { NameBasedLeague } from '../store/schemas';
import { validateNicknameFile } from '../utils/validate-nicknames';

export type LeagueNicknames = Record<NameBasedLeague, readonly string[]>;

export const EMPTY_NICKNAMES: LeagueNicknames = { nhl: [], nfl: [] };

function candidatePaths(): string[] {
  return [
    path.join(__dirname, '../../config/nicknames.yml'), // source tree
    path.join(process.cwd(), 'apps/jobs/config/nicknames.yml'), // repo root
    path.join(process.cwd(), 'config/nicknames.yml'), // fallback
  ];
}

/**
 * Load nickname lists. Priority: explicit path, NICKNAMES_CONFIG_PATH, the
 * first well-known location that exists.
 */
export function loadNicknames(configPath?: string): LeagueNicknames {
  const explicit = configPath ?? process.env.NICKNAMES_CONFIG_PATH;
  let source: string | undefined;

  if (explicit) {
    if (!fs.existsSync(explicit)) {
      throw new MissingInputError(explicit, 'nickname config');
    }
    source = explicit;
  } else {
    source = candidatePaths().find(p => fs.existsSync(p));
  }

  if (!source) {
    console.warn('[NICKNAMES] nicknames.yml not found, splitting every name on the last space');
    return EMPTY_NICKNAMES;
  }

  const table = validateNicknameFile(source);
  const nicknames: LeagueNicknames = {
    nhl: table.nhl ?? [],
    nfl: table.nfl ?? [],
  };

  console.log(`[NICKNAMES] Loaded ${nicknames.nhl.length} NHL and ${nicknames.nfl.length} NFL nicknames from ${source}`);
  return nicknames;
}
