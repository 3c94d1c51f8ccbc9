/**
 * Core data contracts shared by the fetch, format and selection paths
 */

/**
 * Effective configuration for a single run
 */
export interface CalendarConfig {
  /** IANA timezone identifier (e.g., 'Europe/Lisbon') */
  readonly timezone: string;
  /** Start of time window override (ISO date or date-time) */
  readonly startDate?: string;
  /** End of time window override (ISO date or date-time) */
  readonly endDate?: string;
  /** Calendar IDs to fetch, in display tie-break order */
  readonly calendarIds: readonly string[];
}

/**
 * One-time overrides applied on the first configuration resolution.
 * `null` and `undefined` both mean "keep the settings file value".
 */
export interface ConfigOverrides {
  startDate?: string | null;
  endDate?: string | null;
}

/**
 * Start or end of an event: either an exact instant or a calendar date
 */
export type EventTime =
  | { kind: 'timed'; dateTime: string }
  | { kind: 'all-day'; date: string };

/**
 * Calendar event normalized from the remote service.
 * `start` and `end` always share the same `kind`.
 */
export interface CalendarEvent {
  id: string;
  summary: string;
  start: EventTime;
  end: EventTime;
  conferenceId?: string;
}

/**
 * Day column of a rendered line
 */
export type DayLabel = 'Today' | 'Tomorrow' | string;

/**
 * One formatted menu entry, field by field
 */
export interface DisplayLine {
  day: DayLabel;
  /** 'All day' or 'HH:MM - HH:MM' */
  time: string;
  /** Conference glyph plus trailing space, or '' */
  marker: string;
  /** Summary fitted to the summary column width */
  summary: string;
  conferenceId: string;
}

/**
 * Action decoded from a menu selection
 */
export type SelectionAction =
  | { kind: 'display' }
  | { kind: 'open-meeting'; code: string; url: string };
