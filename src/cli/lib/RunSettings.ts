/**
 * Settings resolution for the configure command.
 *
 * Layers, highest first: command flags, persisted defaults (ConfigManager),
 * built-in defaults. The merged result is validated before anything runs.
 */

import { z } from 'zod';
import { parseNameFilter } from '../../configure/NameFilter.js';
import { ValidationError } from '../../configure/errors.js';
import { DEFAULT_BATCH_SIZE } from '../../configure/types.js';
import type { RunSettings } from '../../configure/types.js';
import type { TenantClientOptions } from './TenantClient.js';
import type { CliConfig, ConfigureCommandOptions, ConfigureDefaults, GlobalOptions } from '../types/index.js';

export const DEFAULT_DEPLOY_RETRIES = 5;
export const DEFAULT_DEPLOY_DELAY_SECONDS = 15;
export const DEFAULT_PARALLEL_DEPLOYMENTS = 3;

const ConfigureSettingsSchema = z.object({
  configPath: z
    .string({ required_error: '--config-path is required (set via CLI flag or `config set configure.configPath`)' })
    .min(1, '--config-path must not be empty'),
  deploymentPrefix: z.string().optional(),
  packageFilter: z.string().optional(),
  artifactFilter: z.string().optional(),
  dryRun: z.boolean(),
  deployRetries: z.number().int().positive('deploy retries must be a positive integer'),
  deployDelaySeconds: z.number().int().nonnegative('deploy delay must be zero or more seconds'),
  parallelDeployments: z.number().int().positive('parallel deployments must be a positive integer'),
  batchSize: z.number().int().positive('batch size must be a positive integer'),
  disableBatch: z.boolean(),
});

export interface ConfigureInvocation {
  sourcePath: string;
  /** Prefix override; undefined leaves the sources' own prefix in effect */
  deploymentPrefix?: string;
  settings: RunSettings;
}

function issuesOf(error: z.ZodError): string[] {
  return error.issues.map((issue) => issue.message);
}

export function resolveConfigureSettings(
  flags: ConfigureCommandOptions,
  stored: ConfigureDefaults = {}
): ConfigureInvocation {
  const parsed = ConfigureSettingsSchema.safeParse({
    configPath: flags.configPath ?? stored.configPath,
    deploymentPrefix: flags.deploymentPrefix ?? stored.deploymentPrefix,
    packageFilter: flags.packageFilter ?? stored.packageFilter,
    artifactFilter: flags.artifactFilter ?? stored.artifactFilter,
    dryRun: flags.dryRun ?? stored.dryRun ?? false,
    deployRetries: flags.deployRetries ?? stored.deployRetries ?? DEFAULT_DEPLOY_RETRIES,
    deployDelaySeconds: flags.deployDelay ?? stored.deployDelaySeconds ?? DEFAULT_DEPLOY_DELAY_SECONDS,
    parallelDeployments: flags.parallelDeployments ?? stored.parallelDeployments ?? DEFAULT_PARALLEL_DEPLOYMENTS,
    batchSize: flags.batchSize ?? stored.batchSize ?? DEFAULT_BATCH_SIZE,
    disableBatch: flags.disableBatch ?? stored.disableBatch ?? false,
  });

  if (!parsed.success) {
    const issues = issuesOf(parsed.error);
    throw new ValidationError(`Invalid configure settings: ${issues.join('; ')}`, issues);
  }

  const values = parsed.data;
  return {
    sourcePath: values.configPath,
    deploymentPrefix: values.deploymentPrefix || undefined,
    settings: {
      dryRun: values.dryRun,
      deployRetries: values.deployRetries,
      deployDelaySeconds: values.deployDelaySeconds,
      parallelDeployments: values.parallelDeployments,
      batchSize: values.batchSize,
      disableBatch: values.disableBatch,
      packageFilter: parseNameFilter(values.packageFilter),
      artifactFilter: parseNameFilter(values.artifactFilter),
    },
  };
}

/**
 * Tenant connection from global flags, then environment, then stored config.
 * Returns undefined when no URL is known anywhere.
 */
export function resolveConnection(
  globalOpts: GlobalOptions,
  stored: Pick<CliConfig, 'url' | 'username'>,
  env: Record<string, string | undefined> = process.env
): TenantClientOptions | undefined {
  const baseUrl = globalOpts.url ?? env['TENANT_URL'] ?? stored.url;
  if (!baseUrl) {
    return undefined;
  }
  return {
    baseUrl,
    username: globalOpts.user ?? env['TENANT_USER'] ?? stored.username,
    password: globalOpts.password ?? env['TENANT_PASSWORD'],
    token: globalOpts.token ?? env['TENANT_TOKEN'],
    verbose: globalOpts.verbose,
  };
}
