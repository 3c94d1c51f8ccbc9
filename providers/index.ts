/**
 * Calendar providers
 *
 * Each provider exposes a transport for its remote API and a fetcher that:
 * - Takes calendar IDs and a time window
 * - Handles pagination
 * - Returns normalized CalendarEvent lists
 */

export * from './google-calendar/index.js';
