/**
 * Phase 1: configure every included artifact, one after another, and collect
 * the deployment tasks for the artifacts that asked for it.
 */

import { getLogger } from '../logging/index.js';
import { applyPrefix } from './DeploymentPrefix.js';
import { isIncluded } from './NameFilter.js';
import type { ParameterUpdateResult, ParameterUpdater } from './ParameterUpdater.js';
import type { Artifact, DeploymentTask, MergedConfiguration, Package, RunSettings, RunStats } from './types.js';

const logger = getLogger('configure.phase1');

/**
 * Deploy when the artifact or its whole package asks for it
 */
export function shouldDeploy(pkg: Package, artifact: Artifact): boolean {
  return artifact.deploy || pkg.deploy;
}

export function toDeploymentTask(prefix: string, pkg: Package, artifact: Artifact): DeploymentTask {
  return {
    artifactId: applyPrefix(prefix, artifact.id),
    packageId: applyPrefix(prefix, pkg.id),
    artifactType: artifact.type,
    displayName: artifact.displayName,
  };
}

function recordUpdate(stats: RunStats, result: ParameterUpdateResult): void {
  stats.parametersUpdated += result.updated;
  stats.parametersFailed += result.failed;
  stats.batchRequestsExecuted += result.batchRequests;
  stats.individualRequestsUsed += result.individualRequests;
}

export class ArtifactConfigurator {
  constructor(private readonly updater: ParameterUpdater) {}

  async configureAll(
    config: MergedConfiguration,
    settings: RunSettings,
    stats: RunStats
  ): Promise<DeploymentTask[]> {
    const tasks: DeploymentTask[] = [];
    const prefix = config.deploymentPrefix;

    for (const pkg of config.packages) {
      const packageId = applyPrefix(prefix, pkg.id);

      if (!isIncluded(pkg.id, settings.packageFilter)) {
        logger.info(`Skipping package ${packageId} (filtered out)`);
        continue;
      }

      stats.packagesProcessed++;
      logger.info('');
      logger.info(`Processing package: ${packageId}`);
      if (pkg.displayName) {
        logger.info(`   Display Name: ${pkg.displayName}`);
      }

      let packageHasError = false;

      for (const artifact of pkg.artifacts) {
        const artifactId = applyPrefix(prefix, artifact.id);

        if (!isIncluded(artifact.id, settings.artifactFilter)) {
          logger.info(`   Skipping artifact ${artifactId} (filtered out)`);
          continue;
        }

        stats.artifactsProcessed++;
        logger.info('');
        logger.info(`   Configuring artifact: ${artifactId}`);
        if (artifact.displayName) {
          logger.info(`      Display Name: ${artifact.displayName}`);
        }
        logger.info(`      Type: ${artifact.type}`);
        logger.info(`      Version: ${artifact.version}`);
        logger.info(`      Parameters: ${artifact.parameters.length}`);

        if (settings.dryRun) {
          this.preview(pkg, artifact, stats);
          continue;
        }

        let result: ParameterUpdateResult;
        try {
          result = await this.updater.update(artifactId, artifact, {
            batchSize: settings.batchSize,
            disableBatch: settings.disableBatch,
          });
        } catch (error) {
          logger.error(`      Failed to configure artifact ${artifactId}`, error instanceof Error ? error : undefined);
          stats.artifactsFailed++;
          packageHasError = true;
          continue;
        }
        recordUpdate(stats, result);

        if (!result.success) {
          logger.error(`      Failed to configure artifact ${artifactId}: ${result.error ?? 'unknown error'}`);
          stats.artifactsFailed++;
          packageHasError = true;
          continue;
        }

        stats.artifactsConfigured++;
        logger.info(`      Successfully configured ${result.updated} parameters`);

        if (shouldDeploy(pkg, artifact)) {
          tasks.push(toDeploymentTask(prefix, pkg, artifact));
          stats.deploymentTasksQueued++;
          logger.info('      Queued for deployment');
        }
      }

      if (packageHasError) {
        stats.packagesWithErrors++;
      }
    }

    return tasks;
  }

  /**
   * Count what a real run would do, without any remote call
   */
  private preview(pkg: Package, artifact: Artifact, stats: RunStats): void {
    logger.info('      [DRY RUN] Would update the following parameters:');
    for (const param of artifact.parameters) {
      logger.info(`        - ${param.key} = ${param.value}`);
    }
    stats.artifactsConfigured++;
    stats.parametersUpdated += artifact.parameters.length;

    if (shouldDeploy(pkg, artifact)) {
      stats.deploymentTasksQueued++;
      logger.info('      [DRY RUN] Would deploy after configuration');
    }
  }
}
