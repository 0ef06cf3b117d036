import { format, getISOWeek, getISOWeekYear, isValid, parse } from 'date-fns';

const DAY_FORMAT = 'yyyy-MM-dd';
const DAY_PATTERN = /^\d{4}-\d{2}-\d{2}$/;
const MONTH_PATTERN = /^\d{4}-(0[1-9]|1[0-2])$/;

export function parseDay(value: string): Date | null {
  if (!DAY_PATTERN.test(value)) return null;
  const d = parse(value, DAY_FORMAT, new Date(0));
  // parse() rolls some overflow forward, so compare the formatted value too
  if (!isValid(d) || format(d, DAY_FORMAT) !== value) return null;
  return d;
}

export function isCalendarDate(value: string): boolean {
  return parseDay(value) !== null;
}

export function isMonthKey(value: string): boolean {
  return MONTH_PATTERN.test(value);
}

export function monthKey(day: string): string {
  return day.slice(0, 7);
}

/** YYYY-Www, ISO week numbering. */
export function isoWeekKey(day: string): string {
  const d = parseDay(day);
  if (!d) throw new RangeError(`not a calendar date: ${day}`);
  return `${getISOWeekYear(d)}-W${String(getISOWeek(d)).padStart(2, '0')}`;
}

export function currentMonth(now: Date = new Date()): string {
  return format(now, 'yyyy-MM');
}
