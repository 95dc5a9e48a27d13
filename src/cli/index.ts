#!/usr/bin/env node
/**
 * Integration Configurator CLI
 *
 * Applies declarative parameter values to the artifacts of an integration
 * tenant and deploys the ones that ask for it.
 *
 * Usage: intcfg [options] <command> [subcommand] [arguments]
 *
 * Run `intcfg --help` for detailed usage information.
 */

import 'dotenv/config';
import { Command } from 'commander';
import chalk from 'chalk';
import { registerConfigCommands } from './commands/config.js';
import { registerConfigureCommand } from './commands/configure.js';
import { errorMessage } from '../configure/errors.js';

// Package version - would normally read from package.json
const VERSION = '0.1.0';

/**
 * Create and configure the CLI program
 */
export function createProgram(): Command {
  const program = new Command();

  program
    .name('intcfg')
    .description('Configure and deploy integration artifacts from YAML files')
    .version(VERSION, '-V, --version', 'Output the version number')
    .option('--url <url>', 'Tenant API base URL (env: TENANT_URL)')
    .option('-u, --user <username>', 'Username for basic authentication (env: TENANT_USER)')
    .option('-P, --password <password>', 'Password for basic authentication (env: TENANT_PASSWORD)')
    .option('--token <token>', 'Bearer token, used instead of basic authentication (env: TENANT_TOKEN)')
    .option('--json', 'Output as JSON')
    .option('-v, --verbose', 'Verbose output');

  registerConfigureCommand(program);
  registerConfigCommands(program);

  program.addHelpText(
    'after',
    `
${chalk.bold('Examples:')}
  ${chalk.gray('# Preview the changes of a folder of configuration files')}
  $ intcfg configure -c ./configs --dry-run

  ${chalk.gray('# Configure and deploy with a DEV_ prefix')}
  $ intcfg --url https://tenant.example.com configure -c ./configs -p DEV_

  ${chalk.gray('# Only some packages, no batching')}
  $ intcfg configure -c ./configs --package-filter Orders,Billing --disable-batch

  ${chalk.gray('# Remember the tenant URL')}
  $ intcfg config set url https://tenant.example.com
`
  );

  // Handle unknown commands
  program.on('command:*', () => {
    console.error(chalk.red('Unknown command:'), program.args.join(' '));
    console.log();
    console.log('Run', chalk.cyan('intcfg --help'), 'for usage information.');
    process.exit(1);
  });

  return program;
}

/**
 * Main entry point
 */
async function main(): Promise<void> {
  await createProgram().parseAsync(process.argv);
}

if (require.main === module) {
  main().catch((error: unknown) => {
    console.error(chalk.red('Fatal error:'), errorMessage(error));
    process.exit(1);
  });
}
