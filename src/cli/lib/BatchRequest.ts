/**
 * OData $batch envelope for parameter updates.
 *
 * Every operation travels in its own changeset so the tenant reports one
 * status per operation instead of failing the whole envelope atomically.
 */

import { randomUUID } from 'crypto';

const CRLF = '\r\n';

export interface BatchOperation {
  method: 'PUT' | 'POST' | 'PATCH' | 'DELETE';
  /** Resource path relative to the service root */
  path: string;
  body?: unknown;
}

export interface BatchEnvelope {
  boundary: string;
  body: string;
}

/**
 * Double the single quotes of a value placed inside an OData string literal
 */
export function escapeODataString(value: string): string {
  return value.replace(/'/g, "''");
}

/**
 * Quote a value for use inside an OData key literal in a URL path: Id='...'
 */
export function odataLiteral(value: string): string {
  return encodeURIComponent(escapeODataString(value));
}

export function configurationPath(artifactId: string, version: string, key: string): string {
  return (
    `IntegrationDesigntimeArtifacts(Id='${odataLiteral(artifactId)}',Version='${odataLiteral(version)}')` +
    `/$links/Configurations('${odataLiteral(key)}')`
  );
}

export function buildBatchEnvelope(operations: readonly BatchOperation[], idFactory: () => string = randomUUID): BatchEnvelope {
  const boundary = `batch_${idFactory()}`;
  const lines: string[] = [];

  operations.forEach((operation, index) => {
    const changeset = `changeset_${idFactory()}`;
    const payload = operation.body === undefined ? '' : JSON.stringify(operation.body);

    lines.push(
      `--${boundary}`,
      `Content-Type: multipart/mixed; boundary=${changeset}`,
      '',
      `--${changeset}`,
      'Content-Type: application/http',
      'Content-Transfer-Encoding: binary',
      `Content-ID: ${index + 1}`,
      '',
      `${operation.method} ${operation.path} HTTP/1.1`,
      'Content-Type: application/json',
      'Accept: application/json',
      '',
      payload,
      `--${changeset}--`,
      ''
    );
  });

  lines.push(`--${boundary}--`, '');
  return { boundary, body: lines.join(CRLF) };
}

export interface BatchPartResult {
  statusCode: number;
  /** Raw body of the part, when there is one */
  body?: string;
}

const STATUS_LINE = /^HTTP\/1\.[01] (\d{3})/;

/**
 * Extract the embedded HTTP responses of a $batch reply, in order.
 */
export function parseBatchResponse(text: string): BatchPartResult[] {
  const lines = text.split(/\r?\n/);
  const results: BatchPartResult[] = [];

  let i = 0;
  while (i < lines.length) {
    const match = STATUS_LINE.exec(lines[i] ?? '');
    i++;
    if (!match) continue;

    // headers run until the first blank line
    while (i < lines.length && lines[i] !== '') i++;
    i++;

    const bodyLines: string[] = [];
    while (i < lines.length && !(lines[i] ?? '').startsWith('--')) {
      bodyLines.push(lines[i] ?? '');
      i++;
    }

    const body = bodyLines.join('\n').trim();
    results.push(body ? { statusCode: Number(match[1]), body } : { statusCode: Number(match[1]) });
  }

  return results;
}

function readMessage(value: unknown): string | undefined {
  if (typeof value === 'string') return value;
  if (typeof value === 'object' && value !== null && 'value' in value && typeof value.value === 'string') {
    return value.value;
  }
  return undefined;
}

/**
 * Pull a readable message out of an OData error body; the raw body otherwise
 */
export function extractODataError(body: string | undefined): string | undefined {
  if (!body) return undefined;
  let parsed: unknown;
  try {
    parsed = JSON.parse(body);
  } catch {
    return body;
  }
  if (typeof parsed === 'object' && parsed !== null && 'error' in parsed) {
    const error = parsed.error;
    if (typeof error === 'object' && error !== null && 'message' in error) {
      return readMessage(error.message) ?? body;
    }
  }
  return body;
}
