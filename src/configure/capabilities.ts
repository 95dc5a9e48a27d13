/**
 * Remote capabilities consumed by the configure engine.
 *
 * The engine only talks to these interfaces; TenantClient is the HTTP
 * implementation, tests use in-process fakes.
 */

import type { ArtifactType } from './types.js';

export interface RemoteParameter {
  key: string;
  value: string;
  dataType?: string;
}

export interface ParameterApi {
  /** Current configuration parameters of an artifact version */
  getParameters(artifactId: string, version: string): Promise<RemoteParameter[]>;
  updateParameter(artifactId: string, version: string, key: string, value: string): Promise<void>;
}

/**
 * One "set parameter value" operation of a batch
 */
export interface SetParameterOperation {
  artifactId: string;
  version: string;
  key: string;
  value: string;
}

export interface OperationResult {
  operation: SetParameterOperation;
  success: boolean;
  statusCode?: number;
  error?: string;
}

export interface BatchResult {
  /** One entry per submitted operation, in submission order */
  operations: OperationResult[];
  /** Number of batch requests (chunks) sent */
  requestCount: number;
}

export interface BatchExecutor {
  /**
   * Submit the operations in chunks of at most `chunkSize`.
   * Throws BatchTransportError when a request as a whole fails.
   */
  execute(operations: SetParameterOperation[], chunkSize: number): Promise<BatchResult>;
}

export interface RuntimeStatus {
  version: string;
  status: string;
}

export interface DeploymentApi {
  deploy(artifactId: string, artifactType: ArtifactType): Promise<void>;
  getRuntimeStatus(artifactId: string): Promise<RuntimeStatus>;
  getErrorInformation(artifactId: string): Promise<string>;
}

/**
 * Split operations into consecutive chunks of at most `chunkSize`
 */
export function chunkOperations<T>(operations: readonly T[], chunkSize: number): T[][] {
  if (!Number.isInteger(chunkSize) || chunkSize <= 0) {
    throw new RangeError(`chunk size must be a positive integer, got ${chunkSize}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < operations.length; i += chunkSize) {
    chunks.push(operations.slice(i, i + chunkSize));
  }
  return chunks;
}
