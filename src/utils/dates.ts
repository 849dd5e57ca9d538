import type { CalendarDate, LocalDateTime } from '../types.js';

const DAY_IN_MS = 24 * 60 * 60 * 1000;

// MM/DD/YY HH:mm, the way Metrix prints round start times in its series navigation.
const METRIX_DATE_TIME = /^(\d{1,2})\/(\d{1,2})\/(\d{2})\s+(\d{1,2}):(\d{1,2})$/;

const toUtcMidnight = ({ year, month, day }: CalendarDate) => Date.UTC(year, month - 1, day);

const fromUtc = (ms: number): CalendarDate => {
  const date = new Date(ms);
  return { year: date.getUTCFullYear(), month: date.getUTCMonth() + 1, day: date.getUTCDate() };
};

export const isValidCalendarDate = (date: CalendarDate): boolean => {
  if (date.month < 1 || date.month > 12 || date.day < 1) {
    return false;
  }
  const roundTrip = fromUtc(toUtcMidnight(date));
  return roundTrip.year === date.year && roundTrip.month === date.month && roundTrip.day === date.day;
};

/**
 * Strict parse of a Metrix navigation timestamp. Two-digit years 69-99 land in the 1900s and
 * 00-68 in the 2000s. Returns null for anything that is not a real date and time.
 */
export const parseMetrixDateTime = (text: string): LocalDateTime | null => {
  const match = METRIX_DATE_TIME.exec(text);
  if (!match) {
    return null;
  }

  const [, month, day, shortYear, hour, minute] = match.map(Number);
  const year = shortYear < 69 ? 2000 + shortYear : 1900 + shortYear;
  const candidate: LocalDateTime = { year, month, day, hour, minute };

  if (!isValidCalendarDate(candidate) || hour > 23 || minute > 59) {
    return null;
  }
  return candidate;
};

export const calendarDateInZone = (instant: Date, timeZone: string): CalendarDate => {
  const parts = new Intl.DateTimeFormat('en-US', {
    timeZone,
    year: 'numeric',
    month: 'numeric',
    day: 'numeric'
  }).formatToParts(instant);

  const pick = (type: Intl.DateTimeFormatPartTypes) =>
    Number(parts.find((part) => part.type === type)?.value);

  return { year: pick('year'), month: pick('month'), day: pick('day') };
};

export const addDays = (date: CalendarDate, days: number): CalendarDate =>
  fromUtc(toUtcMidnight(date) + days * DAY_IN_MS);

export const isSameCalendarDate = (a: CalendarDate, b: CalendarDate): boolean =>
  a.year === b.year && a.month === b.month && a.day === b.day;

/** 0 = Sunday … 6 = Saturday, from the calendar date alone. */
export const weekdayOf = (date: CalendarDate): number => new Date(toUtcMidnight(date)).getUTCDay();
