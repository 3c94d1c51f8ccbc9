/**
 * Error taxonomy for a run. Nothing is retried: each error aborts the run and
 * the CLI maps its kind to an exit code.
 */

export type CalendarErrorKind = 'config' | 'auth' | 'api';

export const EXIT_CODES = {
  ok: 0,
  unknown: 1,
  config: 2,
  auth: 3,
  api: 4,
} as const;

export abstract class CalendarError extends Error {
  abstract readonly kind: CalendarErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }

  get exitCode(): number {
    return EXIT_CODES[this.kind];
  }
}

/**
 * Missing or invalid settings, unresolvable timezone, unparseable date override
 */
export class ConfigError extends CalendarError {
  readonly kind = 'config';
}

/**
 * Credentials missing, unreadable, or rejected by the token endpoint
 */
export class AuthError extends CalendarError {
  readonly kind = 'auth';
}

/**
 * Transport or protocol failure while listing events, including mid-pagination
 */
export class ApiError extends CalendarError {
  readonly kind = 'api';

  constructor(
    message: string,
    readonly status?: number,
    options?: { cause?: unknown }
  ) {
    super(message, options);
  }
}

/**
 * Exit code for anything thrown out of a run
 */
export function exitCodeFor(error: unknown): number {
  return error instanceof CalendarError ? error.exitCode : EXIT_CODES.unknown;
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

/**
 * Whether a filesystem error means the file does not exist
 */
export function isFileNotFound(error: unknown): boolean {
  return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
