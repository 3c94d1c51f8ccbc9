/**
 * Settings loading and one-time configuration resolution
 */

import { readFile } from 'node:fs/promises';
import { homedir } from 'node:os';
import { join } from 'node:path';
import { parse as parseYaml } from 'yaml';
import { SettingsFileSchema, formatValidationErrors } from '../schemas/index.js';
import type { CalendarConfig, ConfigOverrides, Settings } from '../schemas/index.js';
import { ConfigError, errorMessage, isFileNotFound } from './errors.js';

export const CONFIG_DIR = join(homedir(), '.config', 'rofi-calendar');
export const DEFAULT_SETTINGS_PATH = join(CONFIG_DIR, 'settings.yml');
export const DEFAULT_CREDENTIALS_PATH = join(CONFIG_DIR, 'token.json');

/**
 * Supplies the validated `settings:` block
 */
export type SettingsSource = () => Promise<Settings>;

/**
 * Read and validate settings.yml
 */
export async function loadSettingsFile(path: string): Promise<Settings> {
  let content: string;
  try {
    content = await readFile(path, 'utf-8');
  } catch (error) {
    if (isFileNotFound(error)) {
      throw new ConfigError(`Settings file not found: ${path}`, { cause: error });
    }
    throw new ConfigError(`Failed to read settings file ${path}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  let document: unknown;
  try {
    document = parseYaml(content);
  } catch (error) {
    throw new ConfigError(`Failed to parse settings file ${path}: ${errorMessage(error)}`, {
      cause: error,
    });
  }

  const result = SettingsFileSchema.safeParse(document);
  if (!result.success) {
    const details = formatValidationErrors(result.error).join('; ');
    throw new ConfigError(`Invalid settings in ${path}: ${details}`, { cause: result.error });
  }

  return result.data;
}

/**
 * Whether the runtime knows the IANA timezone identifier
 */
export function isValidTimezone(timezone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone: timezone });
    return true;
  } catch (error) {
    if (error instanceof RangeError) {
      return false;
    }
    throw error;
  }
}

function toConfig(settings: Settings, overrides: ConfigOverrides): CalendarConfig {
  const startDate = overrides.startDate ?? settings.start_date ?? undefined;
  const endDate = overrides.endDate ?? settings.end_date ?? undefined;

  if (!isValidTimezone(settings.timezone)) {
    throw new ConfigError(`Unknown timezone: ${settings.timezone}`);
  }

  return Object.freeze({
    timezone: settings.timezone,
    ...(startDate ? { startDate } : {}),
    ...(endDate ? { endDate } : {}),
    calendarIds: Object.freeze([...settings.calendar_id]),
  });
}

/**
 * Resolves the run configuration once.
 *
 * The first `resolve` call loads the settings and merges its non-null
 * overrides. Every later call returns that same object and ignores the
 * overrides passed to it. Construct one resolver per process.
 */
export class ConfigResolver {
  private resolved: Promise<CalendarConfig> | undefined;

  constructor(private readonly source: SettingsSource) {}

  static fromFile(path: string = DEFAULT_SETTINGS_PATH): ConfigResolver {
    return new ConfigResolver(() => loadSettingsFile(path));
  }

  resolve(overrides: ConfigOverrides = {}): Promise<CalendarConfig> {
    if (!this.resolved) {
      this.resolved = this.source().then((settings) => toConfig(settings, overrides));
    }
    return this.resolved;
  }
}
