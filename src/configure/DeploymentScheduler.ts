/**
 * Deployment Scheduler
 *
 * Groups tasks by (prefixed) package id and runs every package at the same
 * time, each behind its own p-limit gate of `parallelDeployments`. The bound
 * is per package, so several packages together may exceed it.
 *
 * Workers only return outcomes; the caller folds them into RunStats once all
 * of them have settled.
 */

import pLimit from 'p-limit';
import { getLogger } from '../logging/index.js';
import { DeploymentError, errorMessage } from './errors.js';
import type { DeploymentOutcome, DeploymentRunner } from './DeploymentRunner.js';
import type { DeploymentTask } from './types.js';

const logger = getLogger('configure.scheduler');

/**
 * Group tasks by package id, keeping first-seen package order and task order
 */
export function groupByPackage(tasks: readonly DeploymentTask[]): Map<string, DeploymentTask[]> {
  const groups = new Map<string, DeploymentTask[]>();
  for (const task of tasks) {
    const group = groups.get(task.packageId);
    if (group) {
      group.push(task);
    } else {
      groups.set(task.packageId, [task]);
    }
  }
  return groups;
}

function unexpectedFailure(task: DeploymentTask, error: unknown): DeploymentOutcome {
  return {
    task,
    state: 'failed',
    polls: 0,
    error: new DeploymentError(`unexpected error: ${errorMessage(error)}`, 'failed', task.artifactId),
  };
}

export class DeploymentScheduler {
  constructor(
    private readonly runner: Pick<DeploymentRunner, 'run'>,
    private readonly parallelDeployments: number
  ) {}

  async deployAll(tasks: readonly DeploymentTask[]): Promise<DeploymentOutcome[]> {
    const groups = groupByPackage(tasks);
    logger.info(`Deploying artifacts across ${groups.size} packages`);

    const units: Promise<DeploymentOutcome>[] = [];
    for (const [packageId, packageTasks] of groups) {
      logger.info(`Package ${packageId}: deploying ${packageTasks.length} artifacts`);
      const limit = pLimit(this.parallelDeployments);
      for (const task of packageTasks) {
        units.push(limit(() => this.runner.run(task)).catch((error: unknown) => unexpectedFailure(task, error)));
      }
    }

    const outcomes = await Promise.all(units);

    for (const outcome of outcomes) {
      if (outcome.state === 'succeeded') {
        logger.info(`  Successfully deployed ${outcome.task.artifactId}`);
      } else {
        logger.error(`  Failed to deploy ${outcome.task.artifactId}: ${outcome.error?.message ?? outcome.state}`);
      }
    }

    return outcomes;
  }
}
