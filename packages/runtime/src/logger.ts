// Loggers for collection and snapshot operations
//
// Collections report two kinds of events: routine bookkeeping (replaced or
// missing nodes, snapshot sizes) at debug, and aborted serialization or
// deserialization at warn. Failures are still thrown to the caller.

export type LogLevel = 'debug' | 'warn';

export type LogData = Record<string, unknown>;

/**
 * Structured logger accepted through NodeCollection options
 */
export type Logger = {
  debug(message: string, data?: LogData): void;
  warn(message: string, data?: LogData): void;
};

/**
 * Writes to the console, prefixed with the level and `nodeset`
 */
export const consoleLogger: Logger = {
  debug(message, data) {
    console.debug(`[nodeset:debug] ${message}`, data ?? '');
  },
  warn(message, data) {
    console.warn(`[nodeset:warn] ${message}`, data ?? '');
  },
};

export const silentLogger: Logger = {
  debug() {},
  warn() {},
};

/**
 * One call recorded by a capturing logger
 */
export type LogEntry = {
  level: LogLevel;
  message: string;
  data?: LogData;
};

/**
 * Logger that records every call in order, for assertions in tests.
 */
export function createCapturingLogger(): Logger & { entries: LogEntry[] } {
  const entries: LogEntry[] = [];

  const record =
    (level: LogLevel) =>
    (message: string, data?: LogData): void => {
      entries.push(data === undefined ? { level, message } : { level, message, data });
    };

  return {
    entries,
    debug: record('debug'),
    warn: record('warn'),
  };
}
