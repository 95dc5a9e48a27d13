/**
 * Logging Transports
 *
 * Winston transport wrappers. Text lines look like:
 * INFO  2026-02-10 14:30:15,042 [configure.deploy] Deployment triggered for DEV_Flow1
 */

import winston from 'winston';
import type { LogFormat, TimestampFormat } from './config.js';

/**
 * Interface for pluggable log transports.
 */
export interface LogTransport {
  name: string;
  createWinstonTransport(): winston.transport;
}

/**
 * yyyy-MM-dd HH:mm:ss,SSS in local time
 */
export function formatLocalTimestamp(date: Date): string {
  const year = date.getFullYear();
  const month = String(date.getMonth() + 1).padStart(2, '0');
  const day = String(date.getDate()).padStart(2, '0');
  const hours = String(date.getHours()).padStart(2, '0');
  const minutes = String(date.getMinutes()).padStart(2, '0');
  const seconds = String(date.getSeconds()).padStart(2, '0');
  const millis = String(date.getMilliseconds()).padStart(3, '0');
  return `${year}-${month}-${day} ${hours}:${minutes}:${seconds},${millis}`;
}

/**
 * Render one log record as a text line. Exported for tests.
 */
export function formatTextLine(
  info: { level: string; message: unknown; [key: string]: unknown },
  timestampFormat: TimestampFormat,
  now: Date = new Date()
): string {
  const level = info.level.toUpperCase().padEnd(5);
  const timestamp = timestampFormat === 'iso' ? now.toISOString() : formatLocalTimestamp(now);
  const component = typeof info['component'] === 'string' ? ` [${info['component']}]` : '';
  let line = `${level} ${timestamp}${component} ${String(info.message)}`;
  if (typeof info['errorStack'] === 'string') {
    line += '\n' + info['errorStack'];
  }
  return line;
}

function buildFormat(format: LogFormat, timestampFormat: TimestampFormat): winston.Logform.Format {
  if (format === 'json') {
    return winston.format.combine(winston.format.timestamp(), winston.format.json());
  }
  return winston.format.printf((info) => formatTextLine(info, timestampFormat));
}

/**
 * Console transport. Everything goes to stderr so that `--json` summaries on
 * stdout stay machine readable.
 */
export class ConsoleTransport implements LogTransport {
  name = 'console';

  constructor(
    private format: LogFormat,
    private timestampFormat: TimestampFormat
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.Console({
      format: buildFormat(this.format, this.timestampFormat),
      stderrLevels: ['error', 'warn', 'info', 'debug', 'trace'],
    });
  }
}

/**
 * File transport with size-based rotation.
 */
export class FileTransport implements LogTransport {
  name = 'file';

  constructor(
    private filePath: string,
    private format: LogFormat
  ) {}

  createWinstonTransport(): winston.transport {
    return new winston.transports.File({
      filename: this.filePath,
      format: buildFormat(this.format, 'local'),
      maxsize: 10 * 1024 * 1024, // 10 MB
      maxFiles: 5,
    });
  }
}
