/**
 * Event → fixed-width menu line
 */

import { TZDate } from '@date-fns/tz';
import { endOfDay, format } from 'date-fns';
import { fitColumn, padColumn } from '../normalizers/index.js';
import type { CalendarEvent, DayLabel, DisplayLine, EventTime } from '../schemas/index.js';
import { ApiError } from './errors.js';
import { toZonedDate } from './time-range.js';

const DAY_MS = 24 * 60 * 60 * 1000;

export const CONFERENCE_MARKER = '📹 ';

export const COLUMN_WIDTHS = {
  day: 12,
  time: 16,
  summary: 46,
  conferenceId: 12,
} as const;

function toLocal(time: EventTime, timezone: string): TZDate {
  // All-day dates land on local midnight
  const value = time.kind === 'timed' ? time.dateTime : time.date;
  const date = toZonedDate(value, timezone);
  if (!date) {
    throw new ApiError(`Invalid event time: "${value}"`);
  }
  return date;
}

function isMidnight(date: Date): boolean {
  return (
    date.getHours() === 0 &&
    date.getMinutes() === 0 &&
    date.getSeconds() === 0 &&
    date.getMilliseconds() === 0
  );
}

/**
 * Whole days from the event start to the end of the current local day,
 * rounded down: 0 is today, -1 tomorrow.
 */
function dayLabel(start: TZDate, now: Date, timezone: string): DayLabel {
  const reference = endOfDay(new TZDate(now.getTime(), timezone));
  const delta = Math.floor((reference.getTime() - start.getTime()) / DAY_MS);

  if (delta === 0) {
    return 'Today';
  }
  if (delta === -1) {
    return 'Tomorrow';
  }
  return format(start, 'yyyy-MM-dd');
}

export function formatEvent(event: CalendarEvent, timezone: string, now: Date): DisplayLine {
  const start = toLocal(event.start, timezone);
  const end = toLocal(event.end, timezone);

  const time =
    isMidnight(start) && isMidnight(end)
      ? 'All day'
      : `${format(start, 'HH:mm')} - ${format(end, 'HH:mm')}`;

  const conferenceId = event.conferenceId ?? '';

  return {
    day: dayLabel(start, now, timezone),
    time,
    marker: conferenceId ? CONFERENCE_MARKER : '',
    summary: fitColumn(event.summary, COLUMN_WIDTHS.summary),
    conferenceId,
  };
}

export function renderLine(line: DisplayLine): string {
  return [
    padColumn(line.day, COLUMN_WIDTHS.day),
    padColumn(line.time, COLUMN_WIDTHS.time),
    `${line.marker}${line.summary}`,
    padColumn(line.conferenceId, COLUMN_WIDTHS.conferenceId),
  ].join(' ');
}
