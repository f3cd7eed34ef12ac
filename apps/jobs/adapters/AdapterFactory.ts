/**
 * League Feed Adapter Factory
 *
 * Creates the feed adapter for a league, loading the reference table the
 * code-based leagues need.
 */

import { DataPaths, referencePath } from '../src/config/paths';
import { MissingInputError } from '../src/errors';
import { League, LEAGUES } from '../src/store/schemas';
import { LeagueFeedAdapter } from './LeagueFeedAdapter';
import { MlbFeedAdapter, readMlbTeamNames } from './MlbFeedAdapter';
import { NbaFeedAdapter, readNbaRoster } from './NbaFeedAdapter';
import { NflFeedAdapter } from './NflFeedAdapter';
import { NhlFeedAdapter } from './NhlFeedAdapter';

export class AdapterFactory {
  constructor(private readonly paths: DataPaths) {}

  /**
   * Create an adapter by league. `reference` overrides the default
   * reference file under `raw/`.
   */
  createAdapter(league: League, reference?: string): LeagueFeedAdapter {
    switch (league) {
      case 'nhl':
        return new NhlFeedAdapter();
      case 'nfl':
        return new NflFeedAdapter();
      case 'nba':
        return new NbaFeedAdapter(readNbaRoster(this.requireReference(league, reference)));
      case 'mlb':
        return new MlbFeedAdapter(readMlbTeamNames(this.requireReference(league, reference)));
    }
  }

  /**
   * Get list of leagues with an adapter
   */
  getSupportedLeagues(): League[] {
    return [...LEAGUES];
  }

  private requireReference(league: League, reference?: string): string {
    const filePath = reference ?? referencePath(this.paths, league);
    if (!filePath) {
      throw new MissingInputError(`${league} reference`, 'reference table');
    }
    return filePath;
  }
}
