/**
 * Debug Mode Registry
 *
 * Per-component log level overrides. Module-scoped state with a reset for tests.
 *
 * Engine components ("configure.updater", "configure.deploy", ...) can be turned
 * up to DEBUG/TRACE individually through DEBUG_COMPONENTS without flooding the
 * rest of the output.
 */

import { LogLevel, parseLogLevel, shouldDisplayLogLevel } from './LogLevel.js';

const overrides = new Map<string, LogLevel>();

/**
 * Set a log level override for a specific component.
 */
export function setComponentLevel(name: string, level: LogLevel): void {
  overrides.set(name, level);
}

/**
 * Clear a component's override, reverting to the global level.
 */
export function clearComponentLevel(name: string): void {
  overrides.delete(name);
}

/**
 * Effective level for a component. A component without its own override
 * inherits the nearest dotted ancestor's ("configure.deploy" → "configure").
 */
export function getEffectiveLevel(name: string, globalLevel: LogLevel): LogLevel {
  let current = name;
  for (;;) {
    const level = overrides.get(current);
    if (level) return level;
    const dot = current.lastIndexOf('.');
    if (dot <= 0) return globalLevel;
    current = current.substring(0, dot);
  }
}

export function shouldLog(name: string, messageLevel: LogLevel, globalLevel: LogLevel): boolean {
  return shouldDisplayLogLevel(messageLevel, getEffectiveLevel(name, globalLevel));
}

/**
 * Apply overrides from config entries like ["configure.deploy", "configure.updater:TRACE"].
 * Entries without a level suffix get DEBUG.
 */
export function initFromEnv(debugComponents: string[]): void {
  for (const entry of debugComponents) {
    const colonIndex = entry.lastIndexOf(':');
    if (colonIndex > 0) {
      setComponentLevel(entry.substring(0, colonIndex), parseLogLevel(entry.substring(colonIndex + 1)));
    } else {
      setComponentLevel(entry, LogLevel.DEBUG);
    }
  }
}

/**
 * Reset all registry state (for testing)
 */
export function resetDebugRegistry(): void {
  overrides.clear();
}
