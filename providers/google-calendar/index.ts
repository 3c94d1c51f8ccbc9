/**
 * Google Calendar provider
 *
 * Refresh-token auth, events.list transport and the paginated event fetcher.
 */

export * from './types.js';
export * from './auth.js';
export * from './transport.js';
export * from './fetch.js';
