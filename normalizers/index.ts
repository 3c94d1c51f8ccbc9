/**
 * Normalizers for converting Google Calendar payloads to CalendarEvent
 */

export type { CalendarEvent, EventTime } from '../schemas/index.js';

export * from './google-calendar.js';

// Utility functions
export * from './utils.js';
