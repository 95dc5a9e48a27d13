/**
 * Log levels, ordered from most to least verbose.
 */
export enum LogLevel {
  TRACE = 'TRACE',
  DEBUG = 'DEBUG',
  INFO = 'INFO',
  WARN = 'WARN',
  ERROR = 'ERROR',
}

const ORDER: LogLevel[] = [LogLevel.TRACE, LogLevel.DEBUG, LogLevel.INFO, LogLevel.WARN, LogLevel.ERROR];

/**
 * Parse a level name. Unknown names fall back to INFO.
 */
export function parseLogLevel(level: string): LogLevel {
  switch (level.toUpperCase()) {
    case 'TRACE':
      return LogLevel.TRACE;
    case 'DEBUG':
      return LogLevel.DEBUG;
    case 'INFO':
    case 'INFORMATION':
      return LogLevel.INFO;
    case 'WARN':
    case 'WARNING':
      return LogLevel.WARN;
    case 'ERROR':
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

/**
 * Check if a message at `itemLevel` passes a `filterLevel` threshold
 */
export function shouldDisplayLogLevel(itemLevel: LogLevel, filterLevel: LogLevel): boolean {
  return ORDER.indexOf(itemLevel) >= ORDER.indexOf(filterLevel);
}
