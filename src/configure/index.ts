export { ConfigureOrchestrator } from './ConfigureOrchestrator.js';
export type { ConfigureRequest, ConfigureRunResult, OrchestratorOptions, RemoteServices } from './ConfigureOrchestrator.js';
export { ArtifactConfigurator, shouldDeploy, toDeploymentTask } from './ArtifactConfigurator.js';
export { ParameterUpdater, resolveBatchPlan } from './ParameterUpdater.js';
export type { BatchPlan, ParameterUpdateResult, UpdateMode, UpdateOptions } from './ParameterUpdater.js';
export { DeploymentRunner, sleep } from './DeploymentRunner.js';
export type { DeploymentOutcome, DeploymentRunnerOptions, DeploymentState, Sleep } from './DeploymentRunner.js';
export { DeploymentScheduler, groupByPackage } from './DeploymentScheduler.js';
export { NOT_DEPLOYED_VERSION, classifyRuntimeStatus } from './DeploymentStatus.js';
export type { PolledState } from './DeploymentStatus.js';
export { isSourceFile, loadSources, mergeSources, parseSource } from './SourceLoader.js';
export { PlaceholderResolver } from './PlaceholderResolver.js';
export { applyPrefix, validateDeploymentPrefix } from './DeploymentPrefix.js';
export { isIncluded, parseNameFilter } from './NameFilter.js';
export type { NameFilter } from './NameFilter.js';
export { createRunStats, hasFailures, recordDeploymentOutcomes } from './RunStats.js';
export { chunkOperations } from './capabilities.js';
export type {
  BatchExecutor,
  BatchResult,
  DeploymentApi,
  OperationResult,
  ParameterApi,
  RemoteParameter,
  RuntimeStatus,
  SetParameterOperation,
} from './capabilities.js';
export * from './errors.js';
export * from './types.js';
