/**
 * Logger Factory
 *
 * Initializes the root winston logger and caches per-component Logger wrappers.
 *
 * Usage:
 *   import { getLogger } from '../logging/index.js';
 *
 *   const logger = getLogger('configure.deploy');
 *   logger.info('Deployment triggered');
 *
 * getLogger() lazily initializes with defaults if initializeLogging() was never called.
 */

import winston from 'winston';
import { LogLevel } from './LogLevel.js';
import { getLoggingConfig } from './config.js';
import { initFromEnv } from './DebugModeRegistry.js';
import { Logger, setGlobalLevelProvider } from './Logger.js';
import { ConsoleTransport, FileTransport } from './transports.js';
import type { LogTransport } from './transports.js';

/**
 * Winston uses lower numbers for higher priority.
 */
const WINSTON_LEVELS: Record<string, number> = {
  error: 0,
  warn: 1,
  info: 2,
  debug: 3,
  trace: 4,
};

function toWinstonLevel(level: LogLevel): string {
  switch (level) {
    case LogLevel.ERROR:
      return 'error';
    case LogLevel.WARN:
      return 'warn';
    case LogLevel.INFO:
      return 'info';
    case LogLevel.DEBUG:
      return 'debug';
    case LogLevel.TRACE:
      return 'trace';
    default:
      return 'info';
  }
}

let rootLogger: winston.Logger | null = null;
let currentGlobalLevel: LogLevel = LogLevel.INFO;
const loggerCache = new Map<string, Logger>();

setGlobalLevelProvider(() => currentGlobalLevel);

/**
 * Initialize the logging subsystem. Safe to call more than once; cached
 * loggers are re-bound to the new root.
 */
export function initializeLogging(additionalTransports?: LogTransport[]): winston.Logger {
  const config = getLoggingConfig();

  currentGlobalLevel = config.logLevel;

  const transports: winston.transport[] = [
    new ConsoleTransport(config.logFormat, config.timestampFormat).createWinstonTransport(),
  ];

  if (config.logFile) {
    transports.push(new FileTransport(config.logFile, config.logFormat).createWinstonTransport());
  }

  for (const t of additionalTransports ?? []) {
    transports.push(t.createWinstonTransport());
  }

  if (rootLogger) {
    rootLogger.close();
  }

  const root = winston.createLogger({
    levels: WINSTON_LEVELS,
    // Filtering happens in Logger, so the root accepts everything
    level: 'trace',
    transports,
    exitOnError: false,
  });
  rootLogger = root;

  initFromEnv(config.debugComponents);

  for (const [component] of loggerCache) {
    loggerCache.set(component, new Logger(component, root));
  }

  return root;
}

/**
 * Get (or create) a Logger for a named component.
 */
export function getLogger(component: string): Logger {
  const cached = loggerCache.get(component);
  if (cached) return cached;

  const root = rootLogger ?? initializeLogging();
  const logger = new Logger(component, root);
  loggerCache.set(component, logger);
  return logger;
}

/**
 * Change the global log level at runtime.
 * Affects all loggers that don't have a per-component override.
 */
export function setGlobalLevel(level: LogLevel): void {
  currentGlobalLevel = level;
}

export function getGlobalLevel(): LogLevel {
  return currentGlobalLevel;
}

/**
 * Flush pending writes and close all transports.
 */
export async function shutdownLogging(): Promise<void> {
  const root = rootLogger;
  if (!root) return;
  await new Promise<void>((resolve) => {
    root.on('finish', () => resolve());
    root.end();
  });
  rootLogger = null;
}

/**
 * Reset all logging state (for testing).
 */
export function resetLogging(): void {
  if (rootLogger) {
    rootLogger.close();
  }
  rootLogger = null;
  currentGlobalLevel = LogLevel.INFO;
  loggerCache.clear();
}
