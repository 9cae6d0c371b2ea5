import { pino } from 'pino';
import type { Logger, LevelWithSilent } from 'pino';

const LEVELS: readonly LevelWithSilent[] = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'];

export interface LoggerOptions {
  /** Minimum level. Default: `FIXEDWIDTH_LOG_LEVEL`, else `'silent'`. */
  readonly level?: LevelWithSilent;
  /** Name attached to every line. Default: `'fixedwidth'`. */
  readonly name?: string;
}

/** Read the level from the environment, ignoring values pino does not know. */
export function levelFromEnv(env: NodeJS.ProcessEnv = process.env): LevelWithSilent {
  const raw = env['FIXEDWIDTH_LOG_LEVEL']?.trim().toLowerCase();
  return LEVELS.find((level) => level === raw) ?? 'silent';
}

/** Create a pino logger for the library. A library stays quiet unless asked. */
export function createLogger(options?: LoggerOptions): Logger {
  return pino({
    name: options?.name ?? 'fixedwidth',
    level: options?.level ?? levelFromEnv(),
  });
}

/** Package-wide default logger, used when a load is not given one. */
export const logger: Logger = createLogger();
