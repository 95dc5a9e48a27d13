/**
 * HTTP client for the integration tenant API
 *
 * Wraps axios and implements the three remote capabilities the configure
 * engine consumes: parameter reads/updates, chunked $batch updates, and
 * deployment trigger / status / error information.
 *
 * Mutating calls carry a CSRF token fetched once per client (and refetched
 * once when the tenant rejects it).
 */

import axios from 'axios';
import type { AxiosInstance, AxiosRequestConfig, AxiosResponse } from 'axios';
import { getLogger } from '../../logging/index.js';
import { chunkOperations } from '../../configure/capabilities.js';
import type {
  BatchExecutor,
  BatchResult,
  DeploymentApi,
  OperationResult,
  ParameterApi,
  RemoteParameter,
  RuntimeStatus,
  SetParameterOperation,
} from '../../configure/capabilities.js';
import { NOT_DEPLOYED_VERSION } from '../../configure/DeploymentStatus.js';
import { BatchTransportError, errorMessage } from '../../configure/errors.js';
import type { ArtifactType } from '../../configure/types.js';
import {
  buildBatchEnvelope,
  configurationPath,
  escapeODataString,
  extractODataError,
  odataLiteral,
  parseBatchResponse,
} from './BatchRequest.js';

const logger = getLogger('tenant-client');

const API_ROOT = '/api/v1';

const DEPLOY_ENDPOINTS: Record<ArtifactType, string> = {
  Integration: 'DeployIntegrationDesigntimeArtifact',
  MessageMapping: 'DeployMessageMappingDesigntimeArtifact',
  ScriptCollection: 'DeployScriptCollectionDesigntimeArtifact',
  ValueMapping: 'DeployValueMappingDesigntimeArtifact',
};

/**
 * API error with additional context
 */
export class ApiError extends Error {
  constructor(
    message: string,
    public statusCode?: number,
    public response?: unknown
  ) {
    super(message);
    this.name = 'ApiError';
  }
}

export interface TenantClientOptions {
  baseUrl: string;
  username?: string;
  password?: string;
  /** Bearer token obtained by the caller */
  token?: string;
  timeout?: number;
  verbose?: boolean;
}

function isObject(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null;
}

/**
 * OData v2 wraps payloads in { d: ... }
 */
function unwrapD(data: unknown): unknown {
  return isObject(data) && 'd' in data ? data['d'] : data;
}

function describeFailure(response: AxiosResponse): string {
  const body = typeof response.data === 'string' ? response.data : JSON.stringify(response.data ?? '');
  return extractODataError(body) || response.statusText || `HTTP ${response.status}`;
}

function isSuccess(status: number): boolean {
  return status >= 200 && status < 300;
}

export class TenantClient implements ParameterApi, BatchExecutor, DeploymentApi {
  private readonly axios: AxiosInstance;
  private csrfToken?: string;
  private cookies: string[] = [];

  constructor(options: TenantClientOptions) {
    this.axios = axios.create({
      baseURL: options.baseUrl.replace(/\/+$/, ''),
      timeout: options.timeout || 60000,
      headers: {
        Accept: 'application/json',
        ...(options.token ? { Authorization: `Bearer ${options.token}` } : {}),
      },
      ...(options.username && options.password && !options.token
        ? { auth: { username: options.username, password: options.password } }
        : {}),
      // Don't throw on non-2xx responses - we handle them ourselves
      validateStatus: () => true,
    });

    if (options.verbose) {
      this.axios.interceptors.request.use((config) => {
        logger.debug(`[API] ${config.method?.toUpperCase()} ${config.url}`);
        return config;
      });
      this.axios.interceptors.response.use((response) => {
        logger.debug(`[API] Response: ${response.status} ${response.statusText}`);
        return response;
      });
    }
  }

  // ===========================================================================
  // Parameters
  // ===========================================================================

  async getParameters(artifactId: string, version: string): Promise<RemoteParameter[]> {
    const url =
      `${API_ROOT}/IntegrationDesigntimeArtifacts(Id='${odataLiteral(artifactId)}',` +
      `Version='${odataLiteral(version)}')/Configurations`;
    const response = await this.axios.get(url);
    if (!isSuccess(response.status)) {
      throw new ApiError(describeFailure(response), response.status, response.data);
    }

    const payload = unwrapD(response.data);
    const entries: unknown = isObject(payload) ? payload['results'] : undefined;
    const results: unknown[] = Array.isArray(entries) ? entries : [];
    return results.filter(isObject).map((entry) => ({
      key: String(entry['ParameterKey'] ?? ''),
      value: String(entry['ParameterValue'] ?? ''),
      dataType: typeof entry['DataType'] === 'string' ? entry['DataType'] : undefined,
    }));
  }

  async updateParameter(artifactId: string, version: string, key: string, value: string): Promise<void> {
    const response = await this.mutate({
      method: 'PUT',
      url: `${API_ROOT}/${configurationPath(artifactId, version, key)}`,
      data: { ParameterValue: value },
      headers: { 'Content-Type': 'application/json' },
    });
    if (!isSuccess(response.status)) {
      throw new ApiError(describeFailure(response), response.status, response.data);
    }
  }

  // ===========================================================================
  // Batch
  // ===========================================================================

  async execute(operations: SetParameterOperation[], chunkSize: number): Promise<BatchResult> {
    const results: OperationResult[] = [];
    const chunks = chunkOperations(operations, chunkSize);

    for (const [index, chunk] of chunks.entries()) {
      logger.debug(`Sending batch ${index + 1}/${chunks.length} (${chunk.length} operations)`);
      results.push(...(await this.executeChunk(chunk)));
    }

    return { operations: results, requestCount: chunks.length };
  }

  private async executeChunk(chunk: SetParameterOperation[]): Promise<OperationResult[]> {
    const envelope = buildBatchEnvelope(
      chunk.map((op) => ({
        method: 'PUT' as const,
        path: configurationPath(op.artifactId, op.version, op.key),
        body: { ParameterValue: op.value },
      }))
    );

    let response: AxiosResponse;
    try {
      response = await this.mutate({
        method: 'POST',
        url: `${API_ROOT}/$batch`,
        data: envelope.body,
        headers: { 'Content-Type': `multipart/mixed; boundary=${envelope.boundary}` },
        responseType: 'text',
        transformResponse: (data: unknown) => data,
      });
    } catch (error) {
      throw new BatchTransportError(`batch request failed: ${errorMessage(error)}`, error);
    }

    if (!isSuccess(response.status)) {
      throw new BatchTransportError(`batch request returned HTTP ${response.status}: ${describeFailure(response)}`);
    }

    const parts = parseBatchResponse(typeof response.data === 'string' ? response.data : '');
    if (parts.length !== chunk.length) {
      throw new BatchTransportError(
        `batch response contained ${parts.length} results for ${chunk.length} operations`
      );
    }

    return chunk.map((operation, i) => {
      const part = parts[i] ?? { statusCode: 0 };
      return isSuccess(part.statusCode)
        ? { operation, success: true, statusCode: part.statusCode }
        : { operation, success: false, statusCode: part.statusCode, error: extractODataError(part.body) };
    });
  }

  // ===========================================================================
  // Deployment
  // ===========================================================================

  async deploy(artifactId: string, artifactType: ArtifactType): Promise<void> {
    const response = await this.mutate({
      method: 'POST',
      url: `${API_ROOT}/${DEPLOY_ENDPOINTS[artifactType]}`,
      // axios encodes query parameters itself
      params: { Id: `'${escapeODataString(artifactId)}'`, Version: `'active'` },
    });
    if (!isSuccess(response.status)) {
      throw new ApiError(describeFailure(response), response.status, response.data);
    }
  }

  async getRuntimeStatus(artifactId: string): Promise<RuntimeStatus> {
    const response = await this.axios.get(`${API_ROOT}/IntegrationRuntimeArtifacts('${odataLiteral(artifactId)}')`);
    if (response.status === 404) {
      return { version: NOT_DEPLOYED_VERSION, status: '' };
    }
    if (!isSuccess(response.status)) {
      throw new ApiError(describeFailure(response), response.status, response.data);
    }

    const payload = unwrapD(response.data);
    if (!isObject(payload)) {
      throw new ApiError('unexpected runtime status payload', response.status, response.data);
    }
    return { version: String(payload['Version'] ?? ''), status: String(payload['Status'] ?? '') };
  }

  async getErrorInformation(artifactId: string): Promise<string> {
    const response = await this.axios.get(
      `${API_ROOT}/IntegrationRuntimeArtifacts('${odataLiteral(artifactId)}')/ErrorInformation/$value`
    );
    if (!isSuccess(response.status)) {
      throw new ApiError(describeFailure(response), response.status, response.data);
    }

    const data: unknown = response.data;
    if (typeof data === 'string') return data;
    const parameters: unknown = isObject(data) ? data['parameter'] : undefined;
    if (Array.isArray(parameters) && parameters.length > 0) {
      return parameters.map(String).join('; ');
    }
    return JSON.stringify(data);
  }

  // ===========================================================================
  // CSRF handling
  // ===========================================================================

  private async fetchCsrfToken(): Promise<string> {
    const response = await this.axios.get(`${API_ROOT}/`, { headers: { 'X-CSRF-Token': 'Fetch' } });
    const token: unknown = response.headers['x-csrf-token'];
    if (typeof token !== 'string' || token === '') {
      throw new ApiError('tenant did not return a CSRF token', response.status);
    }

    const setCookie: unknown = response.headers['set-cookie'];
    if (Array.isArray(setCookie)) {
      this.cookies = setCookie.map((cookie) => String(cookie).split(';')[0] ?? '').filter((c) => c !== '');
    }
    this.csrfToken = token;
    return token;
  }

  private async sendWithToken(config: AxiosRequestConfig, token: string): Promise<AxiosResponse> {
    return this.axios.request({
      ...config,
      headers: {
        ...config.headers,
        'X-CSRF-Token': token,
        ...(this.cookies.length > 0 ? { Cookie: this.cookies.join('; ') } : {}),
      },
    });
  }

  /**
   * Send a state-changing request; refresh the CSRF token once on 403
   */
  private async mutate(config: AxiosRequestConfig): Promise<AxiosResponse> {
    const token = this.csrfToken ?? (await this.fetchCsrfToken());
    const response = await this.sendWithToken(config, token);
    if (response.status === 403 && String(response.headers['x-csrf-token'] ?? '').toLowerCase() === 'required') {
      return this.sendWithToken(config, await this.fetchCsrfToken());
    }
    return response;
  }
}
