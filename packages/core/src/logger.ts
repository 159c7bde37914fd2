import type { Logger, LogLevel } from './types.js';

const LEVELS: LogLevel[] = ['error', 'warn', 'info', 'debug'];

/**
 * Create the default console logger
 *
 * Messages above `level` are dropped. Metadata is passed through to the
 * console untouched so objects stay inspectable.
 */
export function createLogger(level: LogLevel = 'info'): Logger {
  const currentLevel = LEVELS.indexOf(level);

  return {
    error: (msg: string, meta?: unknown) => {
      if (currentLevel >= 0) console.error(`[DOCWRITER ERROR] ${msg}`, meta ?? '');
    },
    warn: (msg: string, meta?: unknown) => {
      if (currentLevel >= 1) console.warn(`[DOCWRITER WARN] ${msg}`, meta ?? '');
    },
    info: (msg: string, meta?: unknown) => {
      if (currentLevel >= 2) console.log(`[DOCWRITER INFO] ${msg}`, meta ?? '');
    },
    debug: (msg: string, meta?: unknown) => {
      if (currentLevel >= 3) console.log(`[DOCWRITER DEBUG] ${msg}`, meta ?? '');
    },
  };
}

/**
 * Logger that discards everything (tests, library defaults)
 */
export const silentLogger: Logger = {
  error: () => {},
  warn: () => {},
  info: () => {},
  debug: () => {},
};

/**
 * Normalize an unknown thrown value into a loggable message
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : 'Unknown error';
}
