/**
 * Command-line surface
 *
 * Without a selection, prints one menu line per event. With a selection (the
 * line the menu echoes back), opens its Meet link if it ends with one.
 */

import { Command, Option } from 'commander';
import { addDays, endOfDay, format } from 'date-fns';
import open from 'open';
import {
  EventFetcher,
  GoogleCalendarTransport,
  loadCredentialsFile,
} from '../providers/google-calendar/index.js';
import { ConfigResolver, DEFAULT_CREDENTIALS_PATH, DEFAULT_SETTINGS_PATH } from './config.js';
import { run } from './pipeline.js';
import type { EventSource } from './pipeline.js';
import { handleSelection } from './selection.js';
import type { OpenUrl } from './selection.js';
import { systemClock } from './time-range.js';
import type { Clock } from './time-range.js';

interface CliOptions {
  start?: string;
  startDate?: string;
  end?: string;
  endDate?: string;
  config: string;
  credentials: string;
}

/**
 * Side effects the CLI needs, replaceable in tests
 */
export interface CliDeps {
  resolverFor(settingsPath: string): ConfigResolver;
  connect(credentialsPath: string): Promise<EventSource>;
  openUrl: OpenUrl;
  clock: Clock;
  write(line: string): void;
}

export const defaultDeps: CliDeps = {
  resolverFor: (settingsPath) => ConfigResolver.fromFile(settingsPath),
  connect: async (credentialsPath) => {
    const credentials = await loadCredentialsFile(credentialsPath);
    return new EventFetcher(await GoogleCalendarTransport.connect(credentials));
  },
  openUrl: (url) => open(url),
  clock: systemClock,
  write: (line) => console.log(line),
};

const LOCAL_DATE_TIME = "yyyy-MM-dd'T'HH:mm:ss.SSS";

/**
 * Now on the local wall clock, without an offset; it is read in the
 * configured timezone later.
 */
export function defaultStartDate(clock: Clock = systemClock): string {
  return format(clock(), LOCAL_DATE_TIME);
}

/**
 * End of tomorrow on the local wall clock, without an offset
 */
export function defaultEndDate(clock: Clock = systemClock): string {
  return format(endOfDay(addDays(clock(), 1)), LOCAL_DATE_TIME);
}

export function createProgram(deps: CliDeps = defaultDeps): Command {
  const program = new Command();

  program
    .name('rofi-calendar')
    .description(
      'Fetch calendar events and print them in a format suitable for rofi.\n' +
        'Used as: rofi -show cal -modes cal:rofi-calendar\n\n' +
        'Or accepts a rofi selection to take an action.'
    )
    .version('0.1.0')
    .argument('[selection]', 'line selected in the menu')
    .option('-s, --start <date>', 'start date to fetch events from (default: now)')
    .addOption(new Option('--start-date <date>').hideHelp())
    .option('-e, --end <date>', 'end date to fetch events until (default: end of tomorrow)')
    .addOption(new Option('--end-date <date>').hideHelp())
    .option('-c, --config <path>', 'settings file', DEFAULT_SETTINGS_PATH)
    .option('--credentials <path>', 'authorized user credentials file', DEFAULT_CREDENTIALS_PATH)
    .action(async (selection: string | undefined, options: CliOptions) => {
      if (selection) {
        await handleSelection(selection, deps.openUrl);
        return;
      }

      const config = await deps.resolverFor(options.config).resolve({
        startDate: options.start ?? options.startDate ?? defaultStartDate(deps.clock),
        endDate: options.end ?? options.endDate ?? defaultEndDate(deps.clock),
      });

      const source = await deps.connect(options.credentials);
      const lines = await run(config, { source, clock: deps.clock });

      for (const line of lines) {
        deps.write(line);
      }
    });

  return program;
}
