/**
 * Fetch → merge → sort → format
 */

import { eventSortKey } from '../normalizers/index.js';
import type { CalendarEvent, CalendarConfig } from '../schemas/index.js';
import { formatEvent, renderLine } from './format.js';
import { TimeRangeResolver, systemClock } from './time-range.js';
import type { Clock } from './time-range.js';

/**
 * Anything that can list events for a set of calendars
 */
export interface EventSource {
  fetchAll(calendarIds: readonly string[], start: Date, end: Date): Promise<CalendarEvent[]>;
}

export interface PipelineDeps {
  source: EventSource;
  clock?: Clock;
}

/**
 * Stable ascending sort by start key; equal keys keep fetch order
 */
export function sortEvents(events: readonly CalendarEvent[]): CalendarEvent[] {
  return [...events].sort((a, b) => {
    const keyA = eventSortKey(a);
    const keyB = eventSortKey(b);
    return keyA < keyB ? -1 : keyA > keyB ? 1 : 0;
  });
}

/**
 * Produce the menu lines for every configured calendar
 */
export async function run(config: CalendarConfig, deps: PipelineDeps): Promise<string[]> {
  const clock = deps.clock ?? systemClock;
  const range = new TimeRangeResolver(config, clock);

  const events = await deps.source.fetchAll(config.calendarIds, range.start(), range.end());

  const now = clock();
  return sortEvents(events).map((event) => renderLine(formatEvent(event, config.timezone, now)));
}
