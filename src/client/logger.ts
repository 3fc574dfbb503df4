/**
 * Logger - Leveled logging for query construction and execution
 *
 * The library never writes to stdout; warnings and errors go to stderr via
 * the console-backed default, or wherever an injected logger sends them.
 */

export type LogLevel = 'debug' | 'info' | 'warn' | 'error' | 'silent';

export type LogContext = Record<string, unknown>;

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, context?: LogContext): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

/** Default level for the console logger */
export const DEFAULT_LOG_LEVEL: LogLevel = 'warn';

const PREFIX = '[firestore-typed-query]';

/**
 * Create a logger writing to the console at or above the given level
 */
export function createConsoleLogger(level: LogLevel = DEFAULT_LOG_LEVEL): Logger {
  const threshold = LEVEL_ORDER[level];

  const write = (at: Exclude<LogLevel, 'silent'>, message: string, context?: LogContext): void => {
    if (LEVEL_ORDER[at] < threshold) return;

    const line = `${PREFIX} ${at.toUpperCase()} ${message}`;
    const args: unknown[] = context === undefined ? [line] : [line, context];
    switch (at) {
      case 'debug':
        console.debug(...args);
        break;
      case 'info':
        console.info(...args);
        break;
      case 'warn':
        console.warn(...args);
        break;
      case 'error':
        console.error(...args);
        break;
    }
  };

  return {
    debug: (message, context) => write('debug', message, context),
    info: (message, context) => write('info', message, context),
    warn: (message, context) => write('warn', message, context),
    error: (message, context) => write('error', message, context),
  };
}

/** Logger that drops everything */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
};
