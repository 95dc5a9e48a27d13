/**
 * Error types raised by the configure engine
 */

/**
 * No usable configuration source (missing path, unparsable single file,
 * or a directory without a single valid file).
 */
export class SourceLoadError extends Error {
  constructor(
    message: string,
    public readonly source?: string
  ) {
    super(message);
    this.name = 'SourceLoadError';
  }
}

/**
 * Invalid input detected before any processing starts (bad prefix, bad settings).
 */
export class ValidationError extends Error {
  constructor(
    message: string,
    public readonly issues: string[] = []
  ) {
    super(message);
    this.name = 'ValidationError';
  }
}

/**
 * The batch request itself failed (connection, HTTP status of the envelope,
 * unreadable response). Individual operation failures are not transport errors.
 */
export class BatchTransportError extends Error {
  constructor(message: string, cause?: unknown) {
    super(message, { cause });
    this.name = 'BatchTransportError';
  }
}

export type DeploymentFailureReason = 'trigger' | 'failed' | 'timeout';

/**
 * Terminal failure of a single deployment task
 */
export class DeploymentError extends Error {
  constructor(
    message: string,
    public readonly reason: DeploymentFailureReason,
    public readonly artifactId: string
  ) {
    super(message);
    this.name = 'DeploymentError';
  }
}

/**
 * Message of an unknown thrown value
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
