/**
 * Configure-and-deploy orchestration.
 *
 * Load and merge sources, validate the prefix, configure every included
 * artifact (phase 1), then deploy the queued tasks (phase 2). Phase 2 starts
 * only after phase 1 is complete and is skipped for dry runs or when nothing
 * was queued. Per-artifact and per-task failures never abort the run; they
 * end up in the returned stats.
 */

import { getLogger } from '../logging/index.js';
import { ArtifactConfigurator } from './ArtifactConfigurator.js';
import { validateDeploymentPrefix } from './DeploymentPrefix.js';
import { DeploymentRunner } from './DeploymentRunner.js';
import type { DeploymentOutcome, Sleep } from './DeploymentRunner.js';
import { DeploymentScheduler } from './DeploymentScheduler.js';
import { ParameterUpdater } from './ParameterUpdater.js';
import { PlaceholderResolver } from './PlaceholderResolver.js';
import { createRunStats, hasFailures, recordDeploymentOutcomes } from './RunStats.js';
import { loadSources, mergeSources } from './SourceLoader.js';
import type { BatchExecutor, DeploymentApi, ParameterApi } from './capabilities.js';
import type { DeploymentTask, MergedConfiguration, RunSettings, RunStats } from './types.js';

const logger = getLogger('configure');

const RULE = '═'.repeat(72);

export interface RemoteServices {
  parameters: ParameterApi;
  batch: BatchExecutor;
  deployments: DeploymentApi;
}

export interface ConfigureRequest {
  /** Source file or directory */
  sourcePath: string;
  /** Takes precedence over the sources' declared prefix when non-empty */
  deploymentPrefix?: string;
  settings: RunSettings;
}

export interface ConfigureRunResult {
  success: boolean;
  stats: RunStats;
  config: MergedConfiguration;
  tasks: DeploymentTask[];
  outcomes: DeploymentOutcome[];
}

export interface OrchestratorOptions {
  sleep?: Sleep;
  resolver?: PlaceholderResolver;
}

function banner(title: string): void {
  logger.info('');
  logger.info(RULE);
  logger.info(title);
  logger.info(RULE);
}

export class ConfigureOrchestrator {
  constructor(
    private readonly services: RemoteServices,
    private readonly options: OrchestratorOptions = {}
  ) {}

  /**
   * Load the sources and run both phases.
   * Throws SourceLoadError / ValidationError before any remote call is made.
   */
  async run(request: ConfigureRequest): Promise<ConfigureRunResult> {
    const config = await this.load(request.sourcePath, request.deploymentPrefix);
    return this.execute(config, request.settings);
  }

  /**
   * Load and merge the sources, validating the override and the effective prefix.
   */
  async load(sourcePath: string, deploymentPrefix?: string): Promise<MergedConfiguration> {
    logger.info('Starting artifact configuration');

    if (deploymentPrefix) {
      validateDeploymentPrefix(deploymentPrefix);
    }

    logger.info(`Loading configuration from: ${sourcePath}`);
    const sources = await loadSources(sourcePath, this.options.resolver);
    logger.info(`Loaded ${sources.length} configuration file(s)`);

    const config = mergeSources(sources, deploymentPrefix);
    validateDeploymentPrefix(config.deploymentPrefix);
    return config;
  }

  /**
   * Run both phases on an already merged configuration.
   */
  async execute(config: MergedConfiguration, settings: RunSettings): Promise<ConfigureRunResult> {
    const stats = createRunStats();

    logger.info(`Deployment prefix: ${config.deploymentPrefix}`);
    logger.info(`Dry run: ${settings.dryRun}`);
    logger.info(`Batch processing: ${!settings.disableBatch} (size: ${settings.batchSize})`);

    banner('PHASE 1: CONFIGURING ARTIFACTS');
    const updater = new ParameterUpdater(this.services.parameters, this.services.batch);
    const tasks = await new ArtifactConfigurator(updater).configureAll(config, settings, stats);

    let outcomes: DeploymentOutcome[] = [];
    if (tasks.length > 0 && !settings.dryRun) {
      banner('PHASE 2: DEPLOYING CONFIGURED ARTIFACTS');
      logger.info(
        `Deploying ${tasks.length} artifacts with max ${settings.parallelDeployments} parallel deployments per package`
      );

      const runner = new DeploymentRunner(this.services.deployments, {
        maxRetries: settings.deployRetries,
        delaySeconds: settings.deployDelaySeconds,
        sleep: this.options.sleep,
      });
      outcomes = await new DeploymentScheduler(runner, settings.parallelDeployments).deployAll(tasks);

      // Single writer: every unit has settled before the stats are touched
      recordDeploymentOutcomes(stats, outcomes);
    }

    return { success: !hasFailures(stats), stats, config, tasks, outcomes };
  }
}
