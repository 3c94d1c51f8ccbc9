/**
 * Zod schemas for runtime validation of settings, credentials and API payloads.
 *
 * Settings and credentials are validated strictly. Event payloads are parsed
 * leniently: optional fields that are missing or malformed become absent.
 */

import { z } from 'zod';

/**
 * `settings:` block of settings.yml
 */
export const SettingsSchema = z.object({
  /** IANA timezone identifier */
  timezone: z.string().min(1, 'timezone is required'),
  /** Calendar IDs, in order; duplicates allowed */
  calendar_id: z.array(z.string().min(1)),
  start_date: z.string().nullish(),
  end_date: z.string().nullish(),
});

/**
 * Whole settings.yml document. A document without `settings` is treated as an
 * empty block so the field-level errors are reported.
 */
export const SettingsFileSchema = z
  .object({
    settings: z.unknown().optional(),
  })
  .nullish()
  .transform((doc) => doc?.settings ?? {})
  .pipe(SettingsSchema);

/**
 * Google "authorized user" credentials file (token.json)
 */
export const AuthorizedUserSchema = z.object({
  client_id: z.string().min(1),
  client_secret: z.string().min(1),
  refresh_token: z.string().min(1),
});

/**
 * OAuth token endpoint response
 */
export const TokenResponseSchema = z.object({
  access_token: z.string().min(1),
  expires_in: z.number().optional(),
  token_type: z.string().optional(),
});

/**
 * Start/end of a raw event
 */
export const EventDateTimeSchema = z.object({
  date: z.string().optional().catch(undefined),
  dateTime: z.string().optional().catch(undefined),
});

/**
 * Raw event, minimal fields
 */
export const RawEventSchema = z.object({
  id: z.string().catch(''),
  summary: z.string().optional().catch(undefined),
  start: EventDateTimeSchema.optional().catch(undefined),
  end: EventDateTimeSchema.optional().catch(undefined),
  conferenceData: z
    .object({
      conferenceId: z.string().optional().catch(undefined),
    })
    .optional()
    .catch(undefined),
});

/**
 * One page of an events.list response
 */
export const EventsPageSchema = z.object({
  items: z.array(RawEventSchema).optional().default([]),
  nextPageToken: z.string().optional(),
});

// Type exports inferred from schemas
export type Settings = z.infer<typeof SettingsSchema>;
export type AuthorizedUser = z.infer<typeof AuthorizedUserSchema>;
export type TokenResponse = z.infer<typeof TokenResponseSchema>;
export type RawEvent = z.infer<typeof RawEventSchema>;
export type EventsPage = z.infer<typeof EventsPageSchema>;

/**
 * Flatten Zod issues into `path: message` strings
 */
export function formatValidationErrors(error: z.ZodError): string[] {
  return error.errors.map((err) => {
    const path = err.path.join('.');
    return path ? `${path}: ${err.message}` : err.message;
  });
}
