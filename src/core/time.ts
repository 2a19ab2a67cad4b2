/**
 * Calendar-date utilities. A calendar date is a `yyyy-MM-dd` string with no
 * time or zone; "today" is the local day of the supplied clock.
 */

import { eachDayOfInterval, format, isValid, parse, startOfDay, subDays } from 'date-fns';

export type CalendarDate = string;

export type Clock = () => Date;

const CALENDAR_DATE_PATTERN = /^\d{4}-\d{2}-\d{2}$/;

export const systemClock: Clock = () => new Date();

export function formatDate(date: Date): CalendarDate {
  return format(date, 'yyyy-MM-dd');
}

/**
 * Parses a strict `yyyy-MM-dd` string, rejecting impossible days such as
 * `2024-02-30`.
 */
export function parseCalendarDate(value: string): Date | null {
  if (!CALENDAR_DATE_PATTERN.test(value)) return null;
  const parsed = parse(value, 'yyyy-MM-dd', new Date(0));
  if (!isValid(parsed) || formatDate(parsed) !== value) return null;
  return parsed;
}

export function isCalendarDate(value: string): boolean {
  return parseCalendarDate(value) !== null;
}

export function today(clock: Clock = systemClock): CalendarDate {
  return formatDate(clock());
}

export function isAfterToday(date: CalendarDate, clock: Clock = systemClock): boolean {
  // yyyy-MM-dd compares correctly as a string
  return date > today(clock);
}

/**
 * Inclusive window `[today - windowDays, today]`, ascending.
 * windowDays = 30 yields 31 dates.
 */
export function dateWindow(windowDays: number, clock: Clock = systemClock): CalendarDate[] {
  const end = startOfDay(clock());
  const start = subDays(end, windowDays);
  return eachDayOfInterval({ start, end }).map(formatDate);
}
