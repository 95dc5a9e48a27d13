/**
 * CLI-specific type definitions
 *
 * Persisted configuration, global options and command options. Kept apart
 * from the engine types so the engine does not depend on the CLI.
 */

// =============================================================================
// Configuration Types
// =============================================================================

/**
 * Defaults for the configure command, stored under the `configure` key.
 * Command flags override every one of them.
 */
export interface ConfigureDefaults {
  configPath?: string;
  deploymentPrefix?: string;
  packageFilter?: string;
  artifactFilter?: string;
  dryRun?: boolean;
  deployRetries?: number;
  deployDelaySeconds?: number;
  parallelDeployments?: number;
  batchSize?: number;
  disableBatch?: boolean;
}

/**
 * Persisted CLI configuration (see ConfigManager for the location)
 */
export interface CliConfig {
  /** Tenant API base URL */
  url?: string;
  /** Default username for basic authentication */
  username?: string;
  configure: ConfigureDefaults;
}

/**
 * Global CLI options available on all commands
 */
export type GlobalOptions = {
  url?: string;
  user?: string;
  password?: string;
  token?: string;
  json?: boolean;
  verbose?: boolean;
};

// =============================================================================
// Command Options
// =============================================================================

/**
 * Options of `configure` as parsed by commander
 */
export type ConfigureCommandOptions = {
  configPath?: string;
  deploymentPrefix?: string;
  packageFilter?: string;
  artifactFilter?: string;
  dryRun?: boolean;
  deployRetries?: number;
  deployDelay?: number;
  parallelDeployments?: number;
  batchSize?: number;
  disableBatch?: boolean;
};
