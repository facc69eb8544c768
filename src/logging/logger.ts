import type { LogLevel } from '../config/types.js';

/**
 * Logger interface used by all modules.
 */
export interface Logger {
  debug(message: string, ...args: unknown[]): void;
  info(message: string, ...args: unknown[]): void;
  warn(message: string, ...args: unknown[]): void;
  error(message: string, ...args: unknown[]): void;
}

/** Numeric ordering for log levels. */
const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Sanitize a string by removing access tokens and URL signatures.
 *
 * Contract:
 *   - Replaces 'Bearer <token>' with 'Bearer [REDACTED]'
 *   - Replaces sig=<value> (up to the next '&', whitespace or quote) with sig=[REDACTED]
 *   - Returns the input unchanged if no sensitive patterns are found
 *   - This is a pure function
 */
export function sanitize(input: string): string {
  return input
    .replace(/Bearer\s+[A-Za-z0-9\-._~+/]+=*/g, 'Bearer [REDACTED]')
    .replace(/sig=[^&\s"']*/g, 'sig=[REDACTED]');
}

/**
 * Create a Logger instance.
 *
 * @param level - Minimum log level to emit. Messages below this level are suppressed.
 *
 * Contract:
 *   - All log output is formatted as: [blob-storage] [LEVEL] [ISO-timestamp] message
 *   - Every emitted line passes through sanitize()
 *   - Level ordering: debug < info < warn < error
 *   - Output goes to console.log (debug, info) and console.error (warn, error)
 *   - The ...args are JSON.stringified and appended to the message
 */
export function createLogger(level: LogLevel): Logger {
  const minLevel = LOG_LEVEL_ORDER[level];

  function formatArgs(args: unknown[]): string {
    if (args.length === 0) return '';
    const parts = args.map((arg) => {
      if (arg instanceof Error) {
        return `${arg.name}: ${arg.message}`;
      }
      try {
        return JSON.stringify(arg);
      } catch {
        return String(arg);
      }
    });
    return ' ' + parts.join(' ');
  }

  function emit(msgLevel: LogLevel, message: string, args: unknown[]): void {
    if (LOG_LEVEL_ORDER[msgLevel] < minLevel) return;

    const timestamp = new Date().toISOString();
    const prefix = `[blob-storage] [${msgLevel.toUpperCase()}] [${timestamp}]`;
    const line = sanitize(`${prefix} ${message}${formatArgs(args)}`);

    if (msgLevel === 'debug' || msgLevel === 'info') {
      console.log(line);
    } else {
      console.error(line);
    }
  }

  return {
    debug(message: string, ...args: unknown[]): void {
      emit('debug', message, args);
    },
    info(message: string, ...args: unknown[]): void {
      emit('info', message, args);
    },
    warn(message: string, ...args: unknown[]): void {
      emit('warn', message, args);
    },
    error(message: string, ...args: unknown[]): void {
      emit('error', message, args);
    },
  };
}
