/**
 * Configure Command
 *
 * Applies declared parameter values to the tenant's artifacts and deploys
 * the artifacts that ask for it.
 */

import { Command, InvalidArgumentError } from 'commander';
import ora from 'ora';
import chalk from 'chalk';
import { ConfigManager } from '../lib/ConfigManager.js';
import { OutputFormatter } from '../lib/OutputFormatter.js';
import { resolveConfigureSettings, resolveConnection } from '../lib/RunSettings.js';
import { TenantClient } from '../lib/TenantClient.js';
import type { TenantClientOptions } from '../lib/TenantClient.js';
import { ConfigureOrchestrator } from '../../configure/ConfigureOrchestrator.js';
import type { RemoteServices } from '../../configure/ConfigureOrchestrator.js';
import type { MergedConfiguration } from '../../configure/types.js';
import { SourceLoadError, ValidationError, errorMessage } from '../../configure/errors.js';
import { LogLevel, setGlobalLevel, shutdownLogging } from '../../logging/index.js';
import type { ConfigureCommandOptions, GlobalOptions } from '../types/index.js';

function getRootProgram(cmd: Command): Command {
  let current = cmd;
  while (current.parent) {
    current = current.parent;
  }
  return current;
}

function getGlobalOpts(cmd: Command): GlobalOptions {
  return getRootProgram(cmd).opts<GlobalOptions>();
}

function parseInteger(min: number) {
  return (value: string): number => {
    const parsed = Number(value);
    if (!Number.isInteger(parsed) || parsed < min) {
      throw new InvalidArgumentError(min === 0 ? 'Must be a non-negative integer.' : 'Must be a positive integer.');
    }
    return parsed;
  };
}

/**
 * Services for a dry run without a tenant. Dry runs never call them.
 */
function offlineServices(): RemoteServices {
  const unavailable = (): Promise<never> =>
    Promise.reject(new Error('remote calls are not available in dry-run mode without a tenant URL'));
  return {
    parameters: { getParameters: unavailable, updateParameter: unavailable },
    batch: { execute: unavailable },
    deployments: { deploy: unavailable, getRuntimeStatus: unavailable, getErrorInformation: unavailable },
  };
}

function tenantServices(connection: TenantClientOptions): RemoteServices {
  const client = new TenantClient(connection);
  return { parameters: client, batch: client, deployments: client };
}

export function registerConfigureCommand(program: Command): void {
  program
    .command('configure')
    .description('Update artifact parameters from YAML files and deploy the configured artifacts')
    .option('-c, --config-path <path>', 'Configuration file or folder of *.yml / *.yaml files')
    .option('-p, --deployment-prefix <prefix>', 'Prefix for package and artifact ids (overrides the files)')
    .option('--package-filter <ids>', 'Comma-separated package ids to process')
    .option('--artifact-filter <ids>', 'Comma-separated artifact ids to process')
    .option('--dry-run', 'Show what would change without calling the tenant')
    .option('--deploy-retries <n>', 'Status checks per deployment (default: 5)', parseInteger(1))
    .option('--deploy-delay <seconds>', 'Wait before each status check (default: 15)', parseInteger(0))
    .option('--parallel-deployments <n>', 'Concurrent deployments per package (default: 3)', parseInteger(1))
    .option('--batch-size <n>', 'Parameter operations per batch request (default: 90)', parseInteger(1))
    .option('--disable-batch', 'Update parameters one request at a time')
    .action(async (options: ConfigureCommandOptions, cmd: Command) => {
      const globalOpts = getGlobalOpts(cmd);
      const formatter = new OutputFormatter(globalOpts.json);

      if (globalOpts.verbose) {
        setGlobalLevel(LogLevel.DEBUG);
      }

      try {
        const invocation = resolveConfigureSettings(options, ConfigManager.getConfigureDefaults());
        const connection = resolveConnection(globalOpts, ConfigManager.getAll());

        if (!connection && !invocation.settings.dryRun) {
          formatter.error(
            'No tenant URL configured',
            'Use --url, set TENANT_URL, or run `config set url <url>`'
          );
          process.exitCode = 1;
          return;
        }

        const orchestrator = new ConfigureOrchestrator(connection ? tenantServices(connection) : offlineServices());

        const spinner = ora('Loading configuration...').start();
        let config: MergedConfiguration;
        try {
          config = await orchestrator.load(invocation.sourcePath, invocation.deploymentPrefix);
        } catch (error) {
          spinner.fail('Failed to load configuration');
          throw error;
        }
        spinner.succeed(`Loaded ${config.packages.length} package(s)`);

        const result = await orchestrator.execute(config, invocation.settings);
        formatter.summary(result.stats, invocation.settings.dryRun);

        if (!result.success) {
          process.exitCode = 1;
        }
      } catch (error) {
        if (error instanceof ValidationError || error instanceof SourceLoadError) {
          formatter.error(error.message);
        } else {
          formatter.error('Configuration run failed', errorMessage(error));
        }
        process.exitCode = 1;
      } finally {
        await shutdownLogging();
      }

      if (!globalOpts.json && process.exitCode === 1) {
        console.error(chalk.gray('Run with --verbose or DEBUG_COMPONENTS=configure for more detail.'));
      }
    });
}

export default registerConfigureCommand;
