import chalk from 'chalk';
import { OutputFormatter, formatSummary } from '../../../../src/cli/lib/OutputFormatter.js';
import { createRunStats } from '../../../../src/configure/RunStats.js';

describe('OutputFormatter', () => {
  const originalLevel = chalk.level;

  beforeAll(() => {
    chalk.level = 0;
  });

  afterAll(() => {
    chalk.level = originalLevel;
  });

  describe('formatSummary', () => {
    it('should list phase 1 counters, performance and deployments', () => {
      const stats = {
        ...createRunStats(),
        packagesProcessed: 2,
        artifactsProcessed: 3,
        artifactsConfigured: 3,
        parametersUpdated: 7,
        batchRequestsExecuted: 2,
        individualRequestsUsed: 1,
        deploymentTasksQueued: 2,
        deploymentTasksSucceeded: 2,
        artifactsDeployed: 2,
      };

      const lines = formatSummary(stats, false);

      expect(lines).toContain('CONFIGURATION SUMMARY');
      expect(lines).toContain('Packages processed:          2');
      expect(lines).toContain('Parameters updated:          7');
      expect(lines).toContain('Batch requests executed:     2');
      expect(lines).toContain('Deployments successful:      2');
      expect(lines[lines.length - 1]).toBe('✔ Configuration/Deployment completed successfully');
    });

    it('should leave out performance and deployment outcomes in a dry run', () => {
      const lines = formatSummary({ ...createRunStats(), deploymentTasksQueued: 1 }, true);

      expect(lines).toContain('DRY RUN SUMMARY');
      expect(lines).toContain('Deployment tasks queued:     1');
      expect(lines).not.toContain('Performance:');
      expect(lines.some((line) => line.startsWith('Deployments successful'))).toBe(false);
      expect(lines[lines.length - 1]).toBe('✔ Dry run completed successfully');
    });

    it('should omit the deployment block when nothing was queued', () => {
      expect(formatSummary(createRunStats(), false)).not.toContain('Deployment:');
    });

    it('should end with an error line when anything failed', () => {
      const lines = formatSummary({ ...createRunStats(), artifactsFailed: 1 }, false);
      expect(lines[lines.length - 1]).toBe('✖ Configuration/Deployment completed with errors');
    });
  });

  describe('summary', () => {
    it('should print JSON in json mode', () => {
      const log = jest.spyOn(console, 'log').mockImplementation(() => {});
      const stats = { ...createRunStats(), deploymentTasksFailed: 1 };

      new OutputFormatter(true).summary(stats, false);

      expect(log).toHaveBeenCalledTimes(1);
      expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toEqual({ success: false, dryRun: false, stats });
      log.mockRestore();
    });
  });
});
