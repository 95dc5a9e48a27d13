/**
 * Run statistics
 *
 * Phase 1 mutates a single RunStats sequentially. Phase 2 never touches it
 * from the workers: outcomes are collected first and folded in by one caller.
 */

import type { RunStats } from './types.js';
import type { DeploymentOutcome } from './DeploymentRunner.js';

export function createRunStats(): RunStats {
  return {
    packagesProcessed: 0,
    packagesWithErrors: 0,
    artifactsProcessed: 0,
    artifactsConfigured: 0,
    artifactsFailed: 0,
    parametersUpdated: 0,
    parametersFailed: 0,
    batchRequestsExecuted: 0,
    individualRequestsUsed: 0,
    deploymentTasksQueued: 0,
    deploymentTasksSucceeded: 0,
    deploymentTasksFailed: 0,
    artifactsDeployed: 0,
  };
}

/**
 * Fold collected deployment outcomes into the stats
 */
export function recordDeploymentOutcomes(stats: RunStats, outcomes: readonly DeploymentOutcome[]): void {
  for (const outcome of outcomes) {
    if (outcome.state === 'succeeded') {
      stats.deploymentTasksSucceeded++;
      stats.artifactsDeployed++;
    } else {
      stats.deploymentTasksFailed++;
    }
  }
}

/**
 * A run fails when any artifact failed configuration or any deployment failed
 */
export function hasFailures(stats: RunStats): boolean {
  return stats.artifactsFailed > 0 || stats.deploymentTasksFailed > 0;
}
