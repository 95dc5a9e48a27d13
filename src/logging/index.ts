export { Logger } from './Logger.js';
export { LogLevel, parseLogLevel } from './LogLevel.js';
export {
  initializeLogging,
  getLogger,
  setGlobalLevel,
  getGlobalLevel,
  shutdownLogging,
  resetLogging,
} from './LoggerFactory.js';
export { setComponentLevel, clearComponentLevel, resetDebugRegistry } from './DebugModeRegistry.js';
export { getLoggingConfig, resetLoggingConfig } from './config.js';
export type { LoggingConfiguration } from './config.js';
