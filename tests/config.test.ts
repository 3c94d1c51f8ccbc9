import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'node:fs';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import { ConfigResolver, isValidTimezone, loadSettingsFile } from '../src/config.js';
import { ConfigError } from '../src/errors.js';
import type { Settings } from '../schemas/index.js';

const baseSettings: Settings = {
  timezone: 'Europe/Lisbon',
  calendar_id: ['primary', 'team@group.calendar.google.com'],
};

describe('loadSettingsFile', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'rofi-calendar-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  function writeSettings(content: string): string {
    const path = join(dir, 'settings.yml');
    writeFileSync(path, content);
    return path;
  }

  it('should read the settings block', async () => {
    const path = writeSettings(
      [
        'settings:',
        '  timezone: America/New_York',
        '  calendar_id:',
        '    - primary',
        '    - primary',
        '  start_date: "2024-01-01T00:00:00"',
      ].join('\n')
    );

    const settings = await loadSettingsFile(path);

    expect(settings.timezone).toBe('America/New_York');
    expect(settings.calendar_id).toEqual(['primary', 'primary']);
    expect(settings.start_date).toBe('2024-01-01T00:00:00');
    expect(settings.end_date).toBeUndefined();
  });

  it('should keep unquoted dates as strings', async () => {
    const path = writeSettings(
      ['settings:', '  timezone: UTC', '  calendar_id: [primary]', '  end_date: 2024-01-02'].join('\n')
    );

    const settings = await loadSettingsFile(path);

    expect(settings.end_date).toBe('2024-01-02');
  });

  it('should fail with ConfigError when the file is missing', async () => {
    await expect(loadSettingsFile(join(dir, 'nope.yml'))).rejects.toThrow(ConfigError);
    await expect(loadSettingsFile(join(dir, 'nope.yml'))).rejects.toThrow(/Settings file not found/);
  });

  it('should fail with ConfigError on invalid YAML', async () => {
    const path = writeSettings('settings: [unclosed');

    await expect(loadSettingsFile(path)).rejects.toThrow(ConfigError);
  });

  it('should report missing fields when the settings block is absent', async () => {
    const path = writeSettings('other: 1\n');

    await expect(loadSettingsFile(path)).rejects.toThrow(/timezone: Required/);
  });

  it('should accept an empty calendar list', async () => {
    const path = writeSettings('settings:\n  timezone: UTC\n  calendar_id: []\n');

    await expect(loadSettingsFile(path)).resolves.toEqual({ timezone: 'UTC', calendar_id: [] });
  });
});

describe('isValidTimezone', () => {
  it('should accept IANA identifiers', () => {
    expect(isValidTimezone('UTC')).toBe(true);
    expect(isValidTimezone('Europe/Lisbon')).toBe(true);
  });

  it('should reject unknown identifiers', () => {
    expect(isValidTimezone('Mars/Olympus_Mons')).toBe(false);
  });
});

describe('ConfigResolver', () => {
  it('should merge non-null overrides into the settings', async () => {
    const resolver = new ConfigResolver(async () => ({
      ...baseSettings,
      start_date: '2024-01-01',
      end_date: '2024-01-31',
    }));

    const config = await resolver.resolve({ startDate: null, endDate: '2024-01-07' });

    expect(config).toEqual({
      timezone: 'Europe/Lisbon',
      startDate: '2024-01-01',
      endDate: '2024-01-07',
      calendarIds: ['primary', 'team@group.calendar.google.com'],
    });
  });

  it('should omit dates that are not configured', async () => {
    const resolver = new ConfigResolver(async () => baseSettings);

    const config = await resolver.resolve();

    expect(config.startDate).toBeUndefined();
    expect(config.endDate).toBeUndefined();
  });

  it('should return the first resolution on every later call', async () => {
    const source = vi.fn(async () => baseSettings);
    const resolver = new ConfigResolver(source);

    const first = await resolver.resolve({ startDate: '2024-01-01' });
    const second = await resolver.resolve({ startDate: '2025-06-30', endDate: '2025-07-01' });

    expect(second).toBe(first);
    expect(second.startDate).toBe('2024-01-01');
    expect(second.endDate).toBeUndefined();
    expect(source).toHaveBeenCalledTimes(1);
  });

  it('should freeze the resolved configuration', async () => {
    const resolver = new ConfigResolver(async () => baseSettings);

    const config = await resolver.resolve();

    expect(Object.isFrozen(config)).toBe(true);
    expect(Object.isFrozen(config.calendarIds)).toBe(true);
  });

  it('should fail with ConfigError on an unknown timezone', async () => {
    const resolver = new ConfigResolver(async () => ({ ...baseSettings, timezone: 'Nowhere/Else' }));

    await expect(resolver.resolve()).rejects.toThrow(ConfigError);
    await expect(resolver.resolve()).rejects.toThrow('Unknown timezone: Nowhere/Else');
  });
});
