/**
 * Calendar Helpers
 *
 * All dates travel through the pipeline as `YYYY-MM-DD` strings and are
 * interpreted as UTC calendar days.
 */

const DAY_MS = 24 * 60 * 60 * 1000;

function pad(n: number, width = 2): string {
  return String(n).padStart(width, '0');
}

function fromParts(year: number, month: number, day: number): string | null {
  const d = new Date(Date.UTC(year, month - 1, day));
  if (d.getUTCFullYear() !== year || d.getUTCMonth() !== month - 1 || d.getUTCDate() !== day) {
    return null;
  }
  return `${pad(year, 4)}-${pad(month)}-${pad(day)}`;
}

/**
 * Normalize the date formats the league feeds use to `YYYY-MM-DD`.
 *
 * Accepts `2023-03-01`, `2023-03-01 19:00:00`, `2023-03-01T00:00:00`,
 * `20230301` and `3/1/2023`. Returns null for anything else, including
 * impossible dates such as `2023-02-30`.
 */
export function normalizeDate(raw: string): string | null {
  const text = raw.trim();

  let m = /^(\d{4})-(\d{1,2})-(\d{1,2})(?:[ T].*)?$/.exec(text);
  if (m) return fromParts(Number(m[1]), Number(m[2]), Number(m[3]));

  m = /^(\d{4})(\d{2})(\d{2})$/.exec(text);
  if (m) return fromParts(Number(m[1]), Number(m[2]), Number(m[3]));

  m = /^(\d{1,2})\/(\d{1,2})\/(\d{4})(?:\s.*)?$/.exec(text);
  if (m) return fromParts(Number(m[3]), Number(m[1]), Number(m[2]));

  return null;
}

/**
 * Parse a canonical `YYYY-MM-DD` day; anything else is a RangeError
 */
function toUtc(date: string): Date {
  const m = /^(\d{4})-(\d{2})-(\d{2})$/.exec(date);
  const day = m ? fromParts(Number(m[1]), Number(m[2]), Number(m[3])) : null;
  if (!m || !day) {
    throw new RangeError(`Invalid calendar date "${date}" (expected YYYY-MM-DD)`);
  }
  return new Date(Date.UTC(Number(m[1]), Number(m[2]) - 1, Number(m[3])));
}

function fromUtc(d: Date): string {
  return `${pad(d.getUTCFullYear(), 4)}-${pad(d.getUTCMonth() + 1)}-${pad(d.getUTCDate())}`;
}

export function addDays(date: string, days: number): string {
  return fromUtc(new Date(toUtc(date).getTime() + days * DAY_MS));
}

/**
 * Monday of the ISO week containing `date`
 */
export function weekStart(date: string): string {
  const d = toUtc(date);
  const sinceMonday = (d.getUTCDay() + 6) % 7;
  return addDays(date, -sinceMonday);
}

export function monthStart(date: string): string {
  toUtc(date);
  return `${date.slice(0, 7)}-01`;
}

export function monthEnd(date: string): string {
  const d = toUtc(date);
  return fromUtc(new Date(Date.UTC(d.getUTCFullYear(), d.getUTCMonth() + 1, 0)));
}

/**
 * Every calendar day from `start` to `end`, inclusive
 */
export function eachDay(start: string, end: string): string[] {
  toUtc(start);
  toUtc(end);
  const days: string[] = [];
  for (let day = start; day <= end; day = addDays(day, 1)) {
    days.push(day);
  }
  return days;
}

/**
 * Yesterday's date on the US/Eastern calendar, the default snapshot day
 */
export function yesterdayInEastern(now: Date = new Date()): string {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone: 'America/New_York',
    year: 'numeric',
    month: '2-digit',
    day: '2-digit',
  }).formatToParts(now);

  const part = (type: Intl.DateTimeFormatPartTypes): number =>
    Number(parts.find(p => p.type === type)?.value ?? NaN);

  const today = fromParts(part('year'), part('month'), part('day'));
  if (!today) {
    throw new Error(`Could not determine the US/Eastern date for ${now.toISOString()}`);
  }
  return addDays(today, -1);
}
