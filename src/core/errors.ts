export type SessionErrorCode =
  | "NAVIGATION_TIMEOUT"
  | "SESSION_INVALID"
  | "PROFILE_UNREACHABLE"
  | "BROWSER_UNAVAILABLE"
  | "PAGE_CLOSED";

export class SessionError extends Error {
  constructor(message: string, public code: SessionErrorCode, public url?: string) {
    super(message);
    this.name = "SessionError";
  }

  get retryable(): boolean {
    return this.code === "NAVIGATION_TIMEOUT";
  }
}

export type ParseDegradationCode = "NO_POST_CONTAINERS" | "MARKUP_UNREADABLE";

/**
 * A snapshot the parser could not make sense of. Returned as a value from
 * the parser and logged by the caller; it is never thrown out of the parser.
 */
export class ParseDegradation extends Error {
  constructor(message: string, public code: ParseDegradationCode, public scroll: number) {
    super(message);
    this.name = "ParseDegradation";
  }
}

export type PersistenceErrorCode =
  | "WRITE_FAILED"
  | "RENAME_FAILED"
  | "HISTORY_INVALID"
  | "READ_FAILED";

export class PersistenceError extends Error {
  constructor(message: string, public code: PersistenceErrorCode, public destination: string) {
    super(message);
    this.name = "PersistenceError";
  }
}

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

export const EXIT_CODES = {
  OK: 0,
  UNEXPECTED: 1,
  CONFIG: 2,
  SESSION: 3,
  PERSISTENCE: 4,
  CANCELLED: 130,
} as const;

export type ExitCode = (typeof EXIT_CODES)[keyof typeof EXIT_CODES];

export function exitCodeForError(error: unknown): ExitCode {
  if (error instanceof ConfigError) return EXIT_CODES.CONFIG;
  if (error instanceof SessionError) return EXIT_CODES.SESSION;
  if (error instanceof PersistenceError) return EXIT_CODES.PERSISTENCE;
  return EXIT_CODES.UNEXPECTED;
}

export function describeError(error: unknown): string {
  if (error instanceof PersistenceError) {
    return `${error.name} [${error.code}] ${error.message} (destination: ${error.destination})`;
  }
  if (error instanceof SessionError) {
    return `${error.name} [${error.code}] ${error.message}${error.url ? ` (url: ${error.url})` : ""}`;
  }
  if (error instanceof Error) {
    return `${error.name}: ${error.message}`;
  }
  return String(error);
}
