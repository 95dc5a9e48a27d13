/**
 * Output Formatter
 *
 * Run summary and status messages, as text or JSON.
 */

import chalk from 'chalk';
import type { RunStats } from '../../configure/types.js';
import { hasFailures } from '../../configure/RunStats.js';

const RULE = '═'.repeat(72);
const LABEL_WIDTH = 29;

/**
 * Format JSON with indentation
 */
export function formatJson(data: unknown): string {
  return JSON.stringify(data, null, 2);
}

function row(label: string, value: number): string {
  return `${`${label}:`.padEnd(LABEL_WIDTH)}${value}`;
}

/**
 * Human-readable run summary, one entry per line.
 * Performance and deployment outcome rows are omitted for dry runs.
 */
export function formatSummary(stats: RunStats, dryRun: boolean): string[] {
  const lines: string[] = [
    RULE,
    chalk.bold(dryRun ? 'DRY RUN SUMMARY' : 'CONFIGURATION SUMMARY'),
    RULE,
    row('Packages processed', stats.packagesProcessed),
    row('Packages with errors', stats.packagesWithErrors),
    row('Artifacts processed', stats.artifactsProcessed),
    row('Artifacts configured', stats.artifactsConfigured),
    row('Artifacts failed', stats.artifactsFailed),
    row('Parameters updated', stats.parametersUpdated),
    row('Parameters failed', stats.parametersFailed),
  ];

  if (!dryRun) {
    lines.push(
      '',
      chalk.bold('Performance:'),
      row('Batch requests executed', stats.batchRequestsExecuted),
      row('Individual requests used', stats.individualRequestsUsed)
    );
  }

  if (stats.deploymentTasksQueued > 0) {
    lines.push('', chalk.bold('Deployment:'), row('Deployment tasks queued', stats.deploymentTasksQueued));
    if (!dryRun) {
      lines.push(
        row('Deployments successful', stats.deploymentTasksSucceeded),
        row('Deployments failed', stats.deploymentTasksFailed),
        row('Artifacts deployed', stats.artifactsDeployed)
      );
    }
  }

  lines.push(RULE);

  if (hasFailures(stats)) {
    lines.push(chalk.red('✖ Configuration/Deployment completed with errors'));
  } else if (dryRun) {
    lines.push(chalk.green('✔ Dry run completed successfully'));
  } else {
    lines.push(chalk.green('✔ Configuration/Deployment completed successfully'));
  }

  return lines;
}

/**
 * Output formatter class for consistent output handling
 */
export class OutputFormatter {
  constructor(private readonly jsonMode: boolean = false) {}

  /**
   * Output data (text or JSON based on mode)
   */
  output(textOutput: string, jsonData: unknown): void {
    console.log(this.jsonMode ? formatJson(jsonData) : textOutput);
  }

  summary(stats: RunStats, dryRun: boolean): void {
    this.output(formatSummary(stats, dryRun).join('\n'), { success: !hasFailures(stats), dryRun, stats });
  }

  success(message: string): void {
    if (this.jsonMode) {
      console.log(formatJson({ success: true, message }));
    } else {
      console.log(chalk.green('✔') + ' ' + message);
    }
  }

  /**
   * Output error message
   */
  error(message: string, details?: unknown): void {
    if (this.jsonMode) {
      console.log(formatJson({ success: false, error: message, details }));
    } else {
      console.error(chalk.red('✖') + ' ' + message);
      if (details) {
        console.error(chalk.gray(typeof details === 'string' ? details : JSON.stringify(details, null, 2)));
      }
    }
  }
}

export default OutputFormatter;
