/**
 * Google Calendar event fetching
 *
 * Follows events.list pagination for each calendar and normalizes the items.
 * Calendars and pages are fetched one after another, in order.
 */

import { normalizeGoogleEvent } from '../../normalizers/index.js';
import type { CalendarEvent, RawEvent } from '../../schemas/index.js';
import { toRfc3339 } from '../../src/time-range.js';
import type { CalendarTransport, EventFetcherOptions } from './types.js';

export const DEFAULT_MAX_PAGES = 100;

export class EventFetcher {
  private readonly maxPages: number;

  constructor(
    private readonly transport: CalendarTransport,
    options: EventFetcherOptions = {}
  ) {
    this.maxPages = options.maxPages ?? DEFAULT_MAX_PAGES;
  }

  /**
   * Fetch all events of one calendar within [start, end), in the service's
   * start-time order
   */
  async fetch(calendarId: string, start: Date, end: Date): Promise<CalendarEvent[]> {
    const timeMin = toRfc3339(start);
    const timeMax = toRfc3339(end);
    const items: RawEvent[] = [];
    let pageToken: string | undefined;
    let pages = 0;

    do {
      const response = await this.transport.list({
        calendarId,
        timeMin,
        timeMax,
        singleEvents: true, // Expand recurring events
        orderBy: 'startTime',
        pageToken,
      });

      items.push(...response.items);
      pageToken = response.nextPageToken;
      pages++;

      // Safety limit
      if (pageToken && pages >= this.maxPages) {
        console.warn(
          `[google-calendar] ${calendarId}: reached ${this.maxPages} pages, stopping pagination`
        );
        break;
      }
    } while (pageToken);

    const events: CalendarEvent[] = [];
    for (const item of items) {
      const event = normalizeGoogleEvent(item);
      if (event) {
        events.push(event);
      } else {
        console.warn(`[google-calendar] ${calendarId}: skipping event "${item.id}" without start/end`);
      }
    }

    return events;
  }

  /**
   * Fetch every calendar in order and concatenate the results
   */
  async fetchAll(calendarIds: readonly string[], start: Date, end: Date): Promise<CalendarEvent[]> {
    const all: CalendarEvent[] = [];

    for (const calendarId of calendarIds) {
      const events = await this.fetch(calendarId, start, end);
      all.push(...events);
    }

    return all;
  }
}
