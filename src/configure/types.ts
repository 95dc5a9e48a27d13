/**
 * Configure engine types
 *
 * The declarative model after defaults have been applied, the derived
 * deployment task, run settings and run statistics.
 */

export const ARTIFACT_TYPES = ['Integration', 'MessageMapping', 'ScriptCollection', 'ValueMapping'] as const;

export type ArtifactType = (typeof ARTIFACT_TYPES)[number];

export const DEFAULT_ARTIFACT_VERSION = 'active';
export const DEFAULT_BATCH_SIZE = 90;

export interface Parameter {
  readonly key: string;
  readonly value: string;
}

export interface BatchSettings {
  readonly enabled: boolean;
  readonly batchSize: number;
}

export interface Artifact {
  /** Declared (unprefixed) artifact id */
  readonly id: string;
  readonly displayName?: string;
  readonly type: ArtifactType;
  readonly version: string;
  readonly deploy: boolean;
  readonly parameters: readonly Parameter[];
  /** Present only when the source declared a `batch` block */
  readonly batch?: BatchSettings;
}

export interface Package {
  /** Declared (unprefixed) package id */
  readonly id: string;
  readonly displayName?: string;
  readonly deploy: boolean;
  readonly artifacts: readonly Artifact[];
}

export interface Configuration {
  readonly deploymentPrefix?: string;
  readonly packages: readonly Package[];
}

/**
 * A parsed source file with its origin
 */
export interface ConfigurationSource {
  readonly config: Configuration;
  readonly source: string;
  readonly fileName: string;
}

/**
 * Result of merging all sources: prefix resolved to a plain string
 */
export interface MergedConfiguration {
  readonly deploymentPrefix: string;
  readonly packages: readonly Package[];
}

/**
 * "Deploy this artifact" unit, created during configuration and consumed by
 * the deployment phase. Ids already carry the deployment prefix.
 */
export interface DeploymentTask {
  readonly artifactId: string;
  readonly packageId: string;
  readonly artifactType: ArtifactType;
  readonly displayName?: string;
}

export interface RunSettings {
  readonly dryRun: boolean;
  /** Max status polls per deployment */
  readonly deployRetries: number;
  /** Wait before each poll, in seconds */
  readonly deployDelaySeconds: number;
  /** Concurrency bound per package */
  readonly parallelDeployments: number;
  /** Global chunk size for batch updates */
  readonly batchSize: number;
  readonly disableBatch: boolean;
  readonly packageFilter: readonly string[];
  readonly artifactFilter: readonly string[];
}

export interface RunStats {
  packagesProcessed: number;
  packagesWithErrors: number;
  artifactsProcessed: number;
  artifactsConfigured: number;
  artifactsFailed: number;
  parametersUpdated: number;
  parametersFailed: number;
  batchRequestsExecuted: number;
  individualRequestsUsed: number;
  deploymentTasksQueued: number;
  deploymentTasksSucceeded: number;
  deploymentTasksFailed: number;
  artifactsDeployed: number;
}
