/**
 * Parameter Update Engine
 *
 * Updates the remote configuration parameters of one artifact, either as a
 * chunked batch or one call per parameter. A batch that fails as a whole is
 * replayed once through individual calls; a batch is never retried.
 *
 * Updates are best-effort: a failed parameter fails the artifact but does not
 * stop the remaining parameters, and values already applied are not rolled back.
 */

import { getLogger } from '../logging/index.js';
import { BatchTransportError, errorMessage } from './errors.js';
import type { BatchExecutor, BatchResult, ParameterApi, SetParameterOperation } from './capabilities.js';
import type { Artifact, Parameter } from './types.js';

const logger = getLogger('configure.updater');

export interface BatchPlan {
  useBatch: boolean;
  batchSize: number;
}

export type UpdateMode = 'batch' | 'individual' | 'fallback';

export interface ParameterUpdateResult {
  success: boolean;
  mode: UpdateMode;
  updated: number;
  failed: number;
  batchRequests: number;
  individualRequests: number;
  /** Declared keys that do not exist on the artifact (batch path only) */
  missingKeys: string[];
  /** Keys whose update failed */
  failedKeys: string[];
  error?: string;
}

export interface UpdateOptions {
  /** Chunk size used when the artifact does not set its own */
  batchSize: number;
  disableBatch: boolean;
}

/**
 * Batch unless disabled globally or by the artifact; artifact chunk size wins.
 */
export function resolveBatchPlan(artifact: Artifact, options: UpdateOptions): BatchPlan {
  const enabled = artifact.batch?.enabled ?? true;
  return {
    useBatch: enabled && !options.disableBatch,
    batchSize: artifact.batch?.batchSize ?? options.batchSize,
  };
}

function emptyResult(mode: UpdateMode): ParameterUpdateResult {
  return {
    success: true,
    mode,
    updated: 0,
    failed: 0,
    batchRequests: 0,
    individualRequests: 0,
    missingKeys: [],
    failedKeys: [],
  };
}

export class ParameterUpdater {
  constructor(
    private readonly parameters: ParameterApi,
    private readonly batch: BatchExecutor
  ) {}

  /**
   * Update all declared parameters of `artifact` on the remote artifact `artifactId`
   * (the prefixed id).
   */
  async update(artifactId: string, artifact: Artifact, options: UpdateOptions): Promise<ParameterUpdateResult> {
    const plan = resolveBatchPlan(artifact, options);

    if (plan.useBatch && artifact.parameters.length > 0) {
      return this.updateBatch(artifactId, artifact.version, artifact.parameters, plan.batchSize);
    }
    return this.updateIndividually(artifactId, artifact.version, artifact.parameters, 'individual');
  }

  async updateBatch(
    artifactId: string,
    version: string,
    parameters: readonly Parameter[],
    batchSize: number
  ): Promise<ParameterUpdateResult> {
    logger.info(`      Using batch operations (batch size: ${batchSize})`);
    const result = emptyResult('batch');

    let existingKeys: Set<string>;
    try {
      const current = await this.parameters.getParameters(artifactId, version);
      existingKeys = new Set(current.map((p) => p.key));
    } catch (error) {
      const message = `failed to get current configuration: ${errorMessage(error)}`;
      logger.error(`      Failed to read parameters of ${artifactId}: ${errorMessage(error)}`);
      return { ...result, success: false, error: message };
    }

    const valid: Parameter[] = [];
    for (const param of parameters) {
      if (existingKeys.has(param.key)) {
        valid.push(param);
      } else {
        logger.warn(`      Parameter ${param.key} not found in artifact, skipping`);
        result.missingKeys.push(param.key);
        result.failed++;
      }
    }

    if (valid.length === 0) {
      logger.warn(`      No declared parameter exists on ${artifactId}, nothing to update`);
      return result;
    }

    const operations: SetParameterOperation[] = valid.map((param) => ({
      artifactId,
      version,
      key: param.key,
      value: param.value,
    }));

    let batchResult: BatchResult;
    try {
      batchResult = await this.batch.execute(operations, batchSize);
    } catch (error) {
      if (!(error instanceof BatchTransportError)) {
        throw error;
      }
      logger.warn(`      Batch operation failed: ${error.message}, falling back to individual requests`);
      // Replays every declared parameter; keys missing remotely fail again here
      const fallback = await this.updateIndividually(artifactId, version, parameters, 'fallback');
      return {
        ...fallback,
        failed: fallback.failed + result.failed,
        missingKeys: result.missingKeys,
      };
    }

    result.batchRequests = batchResult.requestCount;
    for (const op of batchResult.operations) {
      if (op.success) {
        result.updated++;
      } else {
        result.failed++;
        result.failedKeys.push(op.operation.key);
        logger.error(`      Failed to update parameter ${op.operation.key}: ${op.error ?? `HTTP ${op.statusCode ?? '?'}`}`);
      }
    }

    if (result.failedKeys.length > 0) {
      result.success = false;
      result.error = `${result.failedKeys.length} parameters failed to update in batch`;
    }
    return result;
  }

  async updateIndividually(
    artifactId: string,
    version: string,
    parameters: readonly Parameter[],
    mode: UpdateMode
  ): Promise<ParameterUpdateResult> {
    logger.info('      Using individual requests');
    const result = emptyResult(mode);

    for (const param of parameters) {
      result.individualRequests++;
      try {
        await this.parameters.updateParameter(artifactId, version, param.key, param.value);
        result.updated++;
      } catch (error) {
        logger.error(`      Failed to update parameter ${param.key}: ${errorMessage(error)}`);
        result.failed++;
        result.failedKeys.push(param.key);
      }
    }

    if (result.failedKeys.length > 0) {
      result.success = false;
      result.error = `${result.failedKeys.length} parameters failed to update`;
    }
    return result;
  }
}
