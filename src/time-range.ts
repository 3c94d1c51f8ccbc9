/**
 * Time window resolution in the configured timezone
 */

import { TZDate, tz } from '@date-fns/tz';
import { format, isValid, parseISO } from 'date-fns';
import type { CalendarConfig } from '../schemas/index.js';
import { ConfigError } from './errors.js';

/**
 * Source of the current instant
 */
export type Clock = () => Date;

export const systemClock: Clock = () => new Date();

/**
 * Read an ISO date or date-time string as an instant in `timezone`.
 *
 * Strings without an offset are wall-clock time in `timezone`; strings with
 * `Z` or `±HH:MM` denote that exact instant.
 *
 * @returns The instant, or null when the string is not a valid date
 */
export function toZonedDate(input: string, timezone: string): TZDate | null {
  const date = parseISO(input.trim(), { in: tz(timezone) });
  return isValid(date) ? date : null;
}

/**
 * Localize a configured date override into `timezone`
 */
export function localizeDateString(input: string, timezone: string): TZDate {
  const date = toZonedDate(input, timezone);
  if (!date) {
    throw new ConfigError(`Invalid date or date-time: "${input}"`);
  }
  return date;
}

/**
 * RFC3339 with milliseconds and numeric offset, e.g. 2024-01-01T00:00:00.000+00:00
 */
export function toRfc3339(instant: Date): string {
  return format(instant, "yyyy-MM-dd'T'HH:mm:ss.SSSxxx");
}

/**
 * Resolves the [start, end) window once per instance.
 * Each bound is computed on first access and reused afterwards.
 */
export class TimeRangeResolver {
  private cachedStart: TZDate | undefined;
  private cachedEnd: TZDate | undefined;

  constructor(
    private readonly config: CalendarConfig,
    private readonly clock: Clock = systemClock
  ) {}

  start(): TZDate {
    if (!this.cachedStart) {
      this.cachedStart = this.resolveBound(this.config.startDate);
    }
    return this.cachedStart;
  }

  end(): TZDate {
    if (!this.cachedEnd) {
      this.cachedEnd = this.resolveBound(this.config.endDate);
    }
    return this.cachedEnd;
  }

  private resolveBound(override: string | undefined): TZDate {
    if (override) {
      return localizeDateString(override, this.config.timezone);
    }
    return new TZDate(this.clock().getTime(), this.config.timezone);
  }
}
