import type { SessionSummary } from '../../types.js';
import { addDays, calendarDateInZone, isSameCalendarDate } from '../../utils/dates.js';

export interface ReferenceClock {
  now: Date;
  timeZone: string;
}

/**
 * First round whose start date is the day after `now` in `timeZone`. Page order wins when
 * several rounds share that date; the input is not assumed to be sorted.
 */
export const findSessionForTomorrow = (
  sessions: readonly SessionSummary[],
  { now, timeZone }: ReferenceClock
): SessionSummary | undefined => {
  const tomorrow = addDays(calendarDateInZone(now, timeZone), 1);
  return sessions.find((session) => isSameCalendarDate(session.startTime, tomorrow));
};
