/**
 * Configuration Commands
 *
 * Manages persisted CLI settings: the tenant URL, a default username and
 * defaults for the configure command (`configure.<option>` keys).
 */

import { Command } from 'commander';
import chalk from 'chalk';
import { ConfigManager } from '../lib/ConfigManager.js';
import { OutputFormatter } from '../lib/OutputFormatter.js';
import { validateDeploymentPrefix } from '../../configure/DeploymentPrefix.js';
import { errorMessage } from '../../configure/errors.js';
import type { ConfigureDefaults, GlobalOptions } from '../types/index.js';

type ValueKind = 'string' | 'boolean' | 'positive' | 'non-negative';

/**
 * Keys of the configure defaults with their value kind
 */
const CONFIGURE_KEYS: Record<keyof ConfigureDefaults, ValueKind> = {
  configPath: 'string',
  deploymentPrefix: 'string',
  packageFilter: 'string',
  artifactFilter: 'string',
  dryRun: 'boolean',
  deployRetries: 'positive',
  deployDelaySeconds: 'non-negative',
  parallelDeployments: 'positive',
  batchSize: 'positive',
  disableBatch: 'boolean',
};

/**
 * Configuration key descriptions
 */
const CONFIG_DESCRIPTIONS: Record<string, string> = {
  url: 'Tenant API base URL',
  username: 'Default username for basic authentication',
  'configure.configPath': 'Configuration file or folder',
  'configure.deploymentPrefix': 'Prefix for package and artifact ids',
  'configure.packageFilter': 'Comma-separated package ids to process',
  'configure.artifactFilter': 'Comma-separated artifact ids to process',
  'configure.dryRun': 'Never call the tenant (true/false)',
  'configure.deployRetries': 'Status checks per deployment',
  'configure.deployDelaySeconds': 'Seconds to wait before each status check',
  'configure.parallelDeployments': 'Concurrent deployments per package',
  'configure.batchSize': 'Parameter operations per batch request',
  'configure.disableBatch': 'Update parameters one request at a time (true/false)',
};

const VALID_CONFIG_KEYS = Object.keys(CONFIG_DESCRIPTIONS);

type ConfigKey =
  | { scope: 'root'; name: 'url' | 'username' }
  | { scope: 'configure'; name: keyof ConfigureDefaults };

function isConfigureKey(name: string): name is keyof ConfigureDefaults {
  return Object.prototype.hasOwnProperty.call(CONFIGURE_KEYS, name);
}

/**
 * "url" → root key, "configure.batchSize" → configure default
 */
export function parseConfigKey(key: string): ConfigKey | undefined {
  if (key === 'url' || key === 'username') {
    return { scope: 'root', name: key };
  }
  if (key.startsWith('configure.')) {
    const name = key.substring('configure.'.length);
    if (isConfigureKey(name)) {
      return { scope: 'configure', name };
    }
  }
  return undefined;
}

/**
 * Convert the command-line text of a configure default to its stored value
 */
export function parseConfigureValue(name: keyof ConfigureDefaults, value: string): string | number | boolean {
  const kind = CONFIGURE_KEYS[name];
  switch (kind) {
    case 'boolean':
      if (value !== 'true' && value !== 'false') {
        throw new Error(`${name} must be "true" or "false"`);
      }
      return value === 'true';
    case 'positive':
    case 'non-negative': {
      const parsed = Number(value);
      const min = kind === 'positive' ? 1 : 0;
      if (!Number.isInteger(parsed) || parsed < min) {
        throw new Error(`${name} must be a ${kind} integer`);
      }
      return parsed;
    }
    case 'string':
      if (name === 'deploymentPrefix') {
        validateDeploymentPrefix(value);
      }
      return value;
  }
}

/**
 * Find the root program to get global options
 */
function getRootProgram(cmd: Command): Command {
  let current = cmd;
  while (current.parent) {
    current = current.parent;
  }
  return current;
}

/**
 * Get global options from any command context
 */
function getGlobalOpts(cmd: Command): GlobalOptions {
  return getRootProgram(cmd).opts<GlobalOptions>();
}

function readValue(key: ConfigKey): unknown {
  return key.scope === 'root' ? ConfigManager.get(key.name) : ConfigManager.getConfigureDefaults()[key.name];
}

function flatten(): Record<string, unknown> {
  const { configure, ...rest } = ConfigManager.getAll();
  const flat: Record<string, unknown> = { ...rest };
  for (const [name, value] of Object.entries(configure ?? {})) {
    flat[`configure.${name}`] = value;
  }
  return flat;
}

/**
 * Register config commands
 */
export function registerConfigCommands(program: Command): void {
  const configCmd = program
    .command('config')
    .description('View or manage CLI configuration');

  // ==========================================================================
  // config (no args) - show all config
  // ==========================================================================
  configCmd.action((_options: unknown, cmd: Command) => {
    const globalOpts = getGlobalOpts(cmd);

    const values = flatten();
    const configPath = ConfigManager.getPath();

    if (globalOpts.json) {
      console.log(JSON.stringify({ path: configPath, config: ConfigManager.getAll() }, null, 2));
      return;
    }

    console.log(chalk.bold('Configuration'));
    console.log(chalk.gray(`  Path: ${configPath}`));
    console.log();

    for (const [key, value] of Object.entries(values)) {
      if (value === undefined) continue;
      console.log(`  ${chalk.cyan(key)}: ${String(value)}`);
      const description = CONFIG_DESCRIPTIONS[key];
      if (description) {
        console.log(chalk.gray(`    ${description}`));
      }
    }
  });

  // ==========================================================================
  // config get <key>
  // ==========================================================================
  configCmd
    .command('get <key>')
    .description('Get a configuration value')
    .action((key: string, _options: unknown, cmd: Command) => {
      const globalOpts = getGlobalOpts(cmd);
      const formatter = new OutputFormatter(globalOpts.json);

      const parsedKey = parseConfigKey(key);
      if (!parsedKey) {
        formatter.error(`Invalid configuration key: ${key}`, `Valid keys: ${VALID_CONFIG_KEYS.join(', ')}`);
        process.exitCode = 1;
        return;
      }

      const value = readValue(parsedKey);
      if (globalOpts.json) {
        console.log(JSON.stringify({ [key]: value }, null, 2));
      } else if (value !== undefined) {
        console.log(String(value));
      } else {
        console.log(chalk.gray('(not set)'));
      }
    });

  // ==========================================================================
  // config set <key> <value>
  // ==========================================================================
  configCmd
    .command('set <key> <value>')
    .description('Set a configuration value')
    .action((key: string, value: string, _options: unknown, cmd: Command) => {
      const globalOpts = getGlobalOpts(cmd);
      const formatter = new OutputFormatter(globalOpts.json);

      const parsedKey = parseConfigKey(key);
      if (!parsedKey) {
        formatter.error(`Invalid configuration key: ${key}`, `Valid keys: ${VALID_CONFIG_KEYS.join(', ')}`);
        process.exitCode = 1;
        return;
      }

      if (parsedKey.scope === 'root') {
        if (parsedKey.name === 'url') {
          ConfigManager.setServerUrl(value);
        } else {
          ConfigManager.set('username', value);
        }
        formatter.success(`Set ${key} = ${String(ConfigManager.get(parsedKey.name))}`);
        return;
      }

      let parsedValue: string | number | boolean;
      try {
        parsedValue = parseConfigureValue(parsedKey.name, value);
      } catch (error) {
        formatter.error(errorMessage(error));
        process.exitCode = 1;
        return;
      }

      ConfigManager.setConfigureDefault(parsedKey.name, parsedValue);
      formatter.success(`Set ${key} = ${String(parsedValue)}`);
    });

  // ==========================================================================
  // config unset <key>
  // ==========================================================================
  configCmd
    .command('unset <key>')
    .description('Remove a configuration value (reset to default)')
    .action((key: string, _options: unknown, cmd: Command) => {
      const globalOpts = getGlobalOpts(cmd);
      const formatter = new OutputFormatter(globalOpts.json);

      const parsedKey = parseConfigKey(key);
      if (!parsedKey) {
        formatter.error(`Invalid configuration key: ${key}`, `Valid keys: ${VALID_CONFIG_KEYS.join(', ')}`);
        process.exitCode = 1;
        return;
      }

      if (parsedKey.scope === 'root') {
        ConfigManager.delete(parsedKey.name);
      } else {
        ConfigManager.deleteConfigureDefault(parsedKey.name);
      }
      formatter.success(`Unset ${key}`);
    });

  // ==========================================================================
  // config reset
  // ==========================================================================
  configCmd
    .command('reset')
    .description('Reset all configuration to defaults')
    .option('-f, --force', 'Skip confirmation')
    .action((options: { force?: boolean }, cmd: Command) => {
      const globalOpts = getGlobalOpts(cmd);
      const formatter = new OutputFormatter(globalOpts.json);

      if (!options.force && !globalOpts.json) {
        console.log(chalk.yellow('This will reset all configuration to defaults.'));
        console.log('Use --force to skip this confirmation.');
        return;
      }

      ConfigManager.reset();
      formatter.success('Configuration reset to defaults');
    });

  // ==========================================================================
  // config path
  // ==========================================================================
  configCmd
    .command('path')
    .description('Show the path to the configuration file')
    .action((_options: unknown, cmd: Command) => {
      const globalOpts = getGlobalOpts(cmd);
      const configPath = ConfigManager.getPath();

      if (globalOpts.json) {
        console.log(JSON.stringify({ path: configPath }, null, 2));
      } else {
        console.log(configPath);
      }
    });

  // ==========================================================================
  // config list
  // ==========================================================================
  configCmd
    .command('list')
    .description('List all available configuration keys')
    .action((_options: unknown, cmd: Command) => {
      const globalOpts = getGlobalOpts(cmd);

      if (globalOpts.json) {
        const keys = VALID_CONFIG_KEYS.map((key) => ({ key, description: CONFIG_DESCRIPTIONS[key] }));
        console.log(JSON.stringify({ keys }, null, 2));
        return;
      }

      console.log(chalk.bold('Available Configuration Keys:'));
      console.log();
      for (const key of VALID_CONFIG_KEYS) {
        console.log(`  ${chalk.cyan(key)}`);
        console.log(chalk.gray(`    ${CONFIG_DESCRIPTIONS[key] ?? ''}`));
      }
    });
}

export default registerConfigCommands;
