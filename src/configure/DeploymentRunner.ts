/**
 * Deployment state machine for a single task.
 *
 *   triggered → polling (starting) → succeeded | failed(reason) | timed-out
 *
 * A trigger failure is terminal. Each poll waits `delaySeconds` first; a poll
 * that errors only uses up an attempt. Any status other than STARTING or
 * STARTED fails the task after one more wait and an error-detail lookup.
 */

import { getLogger } from '../logging/index.js';
import { DeploymentError, errorMessage } from './errors.js';
import { classifyRuntimeStatus } from './DeploymentStatus.js';
import type { DeploymentApi, RuntimeStatus } from './capabilities.js';
import type { DeploymentTask } from './types.js';

const logger = getLogger('configure.deploy');

export type DeploymentState = 'succeeded' | 'failed' | 'timed-out';

export interface DeploymentOutcome {
  task: DeploymentTask;
  state: DeploymentState;
  /** Number of status polls performed */
  polls: number;
  error?: DeploymentError;
}

export type Sleep = (ms: number) => Promise<void>;

export const sleep: Sleep = (ms) => new Promise((resolve) => setTimeout(resolve, ms));

export interface DeploymentRunnerOptions {
  maxRetries: number;
  delaySeconds: number;
  /** Injected for tests */
  sleep?: Sleep;
}

export class DeploymentRunner {
  private readonly sleep: Sleep;

  constructor(
    private readonly api: DeploymentApi,
    private readonly options: DeploymentRunnerOptions
  ) {
    this.sleep = options.sleep ?? sleep;
  }

  /**
   * Drive one task to a terminal state. Never rejects.
   */
  async run(task: DeploymentTask): Promise<DeploymentOutcome> {
    const { artifactId, artifactType } = task;
    const { maxRetries } = this.options;
    const delayMs = this.options.delaySeconds * 1000;

    logger.info(`    Deploying ${artifactId} (type: ${artifactType})`);
    try {
      await this.api.deploy(artifactId, artifactType);
    } catch (error) {
      return this.fail(task, 0, 'trigger', `failed to initiate deployment: ${errorMessage(error)}`);
    }
    logger.info(`    Deployment triggered for ${artifactId}`);

    for (let attempt = 1; attempt <= maxRetries; attempt++) {
      await this.sleep(delayMs);

      let runtime: RuntimeStatus;
      try {
        runtime = await this.api.getRuntimeStatus(artifactId);
      } catch (error) {
        logger.warn(
          `    Failed to get deployment status of ${artifactId} (attempt ${attempt}/${maxRetries}): ${errorMessage(error)}`
        );
        continue;
      }

      logger.info(
        `    Check ${attempt}/${maxRetries} - ${artifactId} status: ${runtime.status}, version: ${runtime.version}`
      );

      const state = classifyRuntimeStatus(runtime);
      switch (state.kind) {
        case 'not-yet-visible':
        case 'starting':
          continue;
        case 'started':
          return { task, state: 'succeeded', polls: attempt };
        case 'failed':
          return this.fail(task, attempt, 'failed', await this.describeFailure(artifactId, state.status, delayMs));
      }
    }

    return this.fail(task, maxRetries, 'timeout', `deployment status check timed out after ${maxRetries} attempts`);
  }

  private async describeFailure(artifactId: string, status: string, delayMs: number): Promise<string> {
    await this.sleep(delayMs);
    try {
      const detail = await this.api.getErrorInformation(artifactId);
      return `deployment failed with status ${status}: ${detail}`;
    } catch (error) {
      return `deployment failed with status ${status} (error details unavailable: ${errorMessage(error)})`;
    }
  }

  private fail(
    task: DeploymentTask,
    polls: number,
    reason: DeploymentError['reason'],
    message: string
  ): DeploymentOutcome {
    const error = new DeploymentError(message, reason, task.artifactId);
    return { task, state: reason === 'timeout' ? 'timed-out' : 'failed', polls, error };
  }
}
