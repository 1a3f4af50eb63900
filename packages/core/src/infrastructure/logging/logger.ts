import pino, { type Logger } from 'pino';

export type { Logger } from 'pino';

/** Levels accepted by `createLogger()` and the `log.level` configuration entry. */
export type LogLevel = 'fatal' | 'error' | 'warn' | 'info' | 'debug' | 'trace' | 'silent';

export interface LoggerOptions {
  /** Default: `FIXEDREC_LOG_LEVEL`, else `'info'`. */
  readonly level?: LogLevel;
  /** Write to this file instead of stdout. */
  readonly file?: string;
}

const LEVELS: readonly LogLevel[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

function levelFromEnv(): LogLevel | undefined {
  const raw = process.env.FIXEDREC_LOG_LEVEL?.trim().toLowerCase();
  return raw !== undefined && isLogLevel(raw) ? raw : undefined;
}

/** Build a pino logger named `fixedrec`. */
export function createLogger(options?: LoggerOptions): Logger {
  const level = options?.level ?? levelFromEnv() ?? 'info';
  const destination = options?.file ? pino.destination({ dest: options.file, mkdir: true, sync: true }) : undefined;

  return pino({ name: 'fixedrec', level, base: undefined }, destination);
}

/** Shared default logger, used when no logger is passed to a reader. */
export const logger: Logger = createLogger();
