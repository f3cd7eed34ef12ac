/**
 * NHL feed: one row per game with full team names and goal totals.
 * `Type` containing "playoff" (any case) marks a playoff game.
 */

import { parseScore, TableRecord } from '../src/store/table-io';
import { NameBasedFeedAdapter, NamedGameRow } from './NameBasedFeedAdapter';

export class NhlFeedAdapter extends NameBasedFeedAdapter {
  readonly league = 'nhl';
  readonly requiredColumns = ['Date', 'Away', 'AwayGoals', 'Home', 'HomeGoals', 'Type'] as const;

  getName(): string {
    return 'NHL season games';
  }

  protected readRow(record: TableRecord): NamedGameRow {
    return {
      rawDate: record.Date,
      homeName: record.Home,
      awayName: record.Away,
      homeScore: parseScore(record.HomeGoals),
      awayScore: parseScore(record.AwayGoals),
      seasonType: /playoff/i.test(record.Type) ? 'playoff' : 'regular',
    };
  }
}
