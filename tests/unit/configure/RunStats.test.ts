import { describe, it, expect } from '@jest/globals';
import { createRunStats, hasFailures, recordDeploymentOutcomes } from '../../../src/configure/RunStats.js';
import { chunkOperations } from '../../../src/configure/capabilities.js';
import { DeploymentError } from '../../../src/configure/errors.js';
import type { DeploymentTask } from '../../../src/configure/types.js';

const task = (artifactId: string): DeploymentTask => ({ artifactId, packageId: 'P1', artifactType: 'Integration' });

describe('RunStats', () => {
  it('should start with every counter at zero', () => {
    expect(Object.values(createRunStats()).every((value) => value === 0)).toBe(true);
  });

  it('should fold deployment outcomes', () => {
    const stats = createRunStats();

    recordDeploymentOutcomes(stats, [
      { task: task('a'), state: 'succeeded', polls: 1 },
      { task: task('b'), state: 'failed', polls: 0, error: new DeploymentError('x', 'trigger', 'b') },
      { task: task('c'), state: 'timed-out', polls: 5, error: new DeploymentError('y', 'timeout', 'c') },
    ]);

    expect(stats.deploymentTasksSucceeded).toBe(1);
    expect(stats.artifactsDeployed).toBe(1);
    expect(stats.deploymentTasksFailed).toBe(2);
  });

  it('should fail a run with a failed artifact or deployment only', () => {
    const stats = createRunStats();
    stats.parametersFailed = 3;
    expect(hasFailures(stats)).toBe(false);

    expect(hasFailures({ ...stats, artifactsFailed: 1 })).toBe(true);
    expect(hasFailures({ ...stats, deploymentTasksFailed: 1 })).toBe(true);
  });
});

describe('chunkOperations', () => {
  it('should split into consecutive chunks', () => {
    expect(chunkOperations([1, 2, 3, 4, 5], 2)).toEqual([[1, 2], [3, 4], [5]]);
  });

  it('should return no chunks for no operations', () => {
    expect(chunkOperations([], 90)).toEqual([]);
  });

  it.each([0, -1, 1.5])('should reject chunk size %p', (size) => {
    expect(() => chunkOperations([1], size)).toThrow(RangeError);
  });
});
