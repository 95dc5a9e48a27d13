/**
 * Integration Configurator
 *
 * Library entry point: the configure engine, its tenant client and logging.
 * The command-line interface lives in ./cli/index.ts.
 */

export * from './configure/index.js';
export { TenantClient, ApiError } from './cli/lib/TenantClient.js';
export type { TenantClientOptions } from './cli/lib/TenantClient.js';
export { getLogger, initializeLogging, setGlobalLevel, LogLevel } from './logging/index.js';
