/**
 * Google Calendar provider configuration and transport types
 */

import type { EventsPage } from '../../schemas/index.js';

/**
 * Google OAuth credentials
 */
export interface GoogleOAuthCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

/**
 * Parameters of a single events.list call
 * https://developers.google.com/calendar/api/v3/reference/events/list
 */
export interface ListEventsParams {
  calendarId: string;
  /** RFC3339 lower bound (exclusive on event end) */
  timeMin: string;
  /** RFC3339 upper bound (exclusive on event start) */
  timeMax: string;
  /** Expand recurring events into instances */
  singleEvents: boolean;
  orderBy: 'startTime' | 'updated';
  /** Continuation cursor from the previous page */
  pageToken?: string;
}

/**
 * Authenticated access to events.list. Token refresh, if any, is the
 * implementation's concern.
 */
export interface CalendarTransport {
  list(params: ListEventsParams): Promise<EventsPage>;
}

/**
 * `fetch` as used by the transport and token exchange
 */
export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

/**
 * Options for the event fetcher
 */
export interface EventFetcherOptions {
  /** Stop following cursors after this many pages (default: 100) */
  maxPages?: number;
}
