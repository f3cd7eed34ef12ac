/**
 * NFL feed: schedule rows keyed by `schedule_date`, home/away names and
 * scores. `schedule_playoff`, when present, flags postseason games.
 */

import { parseScore, TableRecord } from '../src/store/table-io';
import { NameBasedFeedAdapter, NamedGameRow } from './NameBasedFeedAdapter';

const TRUTHY = new Set(['true', '1', 'yes', 'y']);

export class NflFeedAdapter extends NameBasedFeedAdapter {
  readonly league = 'nfl';
  readonly requiredColumns = ['schedule_date', 'team_home', 'score_home', 'team_away', 'score_away'] as const;

  getName(): string {
    return 'NFL scores';
  }

  protected readRow(record: TableRecord): NamedGameRow {
    const playoff = TRUTHY.has((record.schedule_playoff ?? '').trim().toLowerCase());
    return {
      rawDate: record.schedule_date,
      homeName: record.team_home,
      awayName: record.team_away,
      homeScore: parseScore(record.score_home),
      awayScore: parseScore(record.score_away),
      seasonType: playoff ? 'playoff' : 'regular',
    };
  }
}
