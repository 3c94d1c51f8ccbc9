/**
 * Google Calendar event normalizer
 *
 * Maps raw events.list items onto CalendarEvent. Missing summaries and
 * conference data are treated as empty rather than as errors.
 */

import type { CalendarEvent, EventTime, RawEvent } from '../schemas/index.js';

type RawEventTime = RawEvent['start'];

/**
 * Resolve the start/end pair of an event. Both ends must be timed, or both
 * all-day; anything else cannot be placed on the timeline.
 */
function resolveTimes(
  start: RawEventTime,
  end: RawEventTime
): { start: EventTime; end: EventTime } | null {
  if (start?.dateTime && end?.dateTime) {
    return {
      start: { kind: 'timed', dateTime: start.dateTime },
      end: { kind: 'timed', dateTime: end.dateTime },
    };
  }

  if (start?.date && end?.date) {
    return {
      start: { kind: 'all-day', date: start.date },
      end: { kind: 'all-day', date: end.date },
    };
  }

  return null;
}

/**
 * Normalize a single raw event
 *
 * @returns The event, or null when it has no usable start/end
 */
export function normalizeGoogleEvent(raw: RawEvent): CalendarEvent | null {
  const times = resolveTimes(raw.start, raw.end);
  if (!times) {
    return null;
  }

  const event: CalendarEvent = {
    id: raw.id,
    summary: raw.summary ?? '',
    ...times,
  };

  const conferenceId = raw.conferenceData?.conferenceId;
  if (conferenceId) {
    event.conferenceId = conferenceId;
  }

  return event;
}

/**
 * Sort key for an event: the timed start string, else the all-day date.
 * Keys compare as plain strings, so dates sort ahead of same-day times.
 */
export function eventSortKey(event: CalendarEvent): string {
  return event.start.kind === 'timed' ? event.start.dateTime : event.start.date;
}
