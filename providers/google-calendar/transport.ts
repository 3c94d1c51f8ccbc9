/**
 * Google Calendar REST transport for events.list
 */

import { EventsPageSchema, formatValidationErrors } from '../../schemas/index.js';
import type { EventsPage } from '../../schemas/index.js';
import { ApiError, errorMessage } from '../../src/errors.js';
import { getAccessToken } from './auth.js';
import type {
  CalendarTransport,
  FetchLike,
  GoogleOAuthCredentials,
  ListEventsParams,
} from './types.js';

export const GOOGLE_CALENDAR_API = 'https://www.googleapis.com/calendar/v3';

/** Minimal fields only */
const EVENT_FIELDS = 'items(id,summary,start,end,conferenceData(conferenceId)),nextPageToken';

const MAX_RESULTS = '250';

export class GoogleCalendarTransport implements CalendarTransport {
  constructor(
    private readonly accessToken: string,
    private readonly fetchImpl: FetchLike = fetch
  ) {}

  /**
   * Exchange the stored refresh token and build a transport
   */
  static async connect(
    credentials: GoogleOAuthCredentials,
    fetchImpl: FetchLike = fetch
  ): Promise<GoogleCalendarTransport> {
    const accessToken = await getAccessToken(credentials, fetchImpl);
    return new GoogleCalendarTransport(accessToken, fetchImpl);
  }

  async list(params: ListEventsParams): Promise<EventsPage> {
    const endpoint = `/calendars/${encodeURIComponent(params.calendarId)}/events`;
    const url = new URL(`${GOOGLE_CALENDAR_API}${endpoint}`);
    url.searchParams.set('timeMin', params.timeMin);
    url.searchParams.set('timeMax', params.timeMax);
    url.searchParams.set('singleEvents', String(params.singleEvents));
    url.searchParams.set('orderBy', params.orderBy);
    url.searchParams.set('maxResults', MAX_RESULTS);
    url.searchParams.set('fields', EVENT_FIELDS);
    if (params.pageToken) {
      url.searchParams.set('pageToken', params.pageToken);
    }

    let response: Response;
    try {
      response = await this.fetchImpl(url.toString(), {
        headers: {
          Authorization: `Bearer ${this.accessToken}`,
          'Content-Type': 'application/json',
        },
      });
    } catch (error) {
      throw new ApiError(
        `Google Calendar request failed for ${params.calendarId}: ${errorMessage(error)}`,
        undefined,
        { cause: error }
      );
    }

    if (!response.ok) {
      throw new ApiError(
        `Google Calendar API error: ${response.status} ${response.statusText}`,
        response.status
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ApiError('Google Calendar API returned invalid JSON', response.status, {
        cause: error,
      });
    }

    const result = EventsPageSchema.safeParse(body);
    if (!result.success) {
      const details = formatValidationErrors(result.error).join('; ');
      throw new ApiError(`Unexpected events.list response: ${details}`, response.status, {
        cause: result.error,
      });
    }

    return result.data;
  }
}
