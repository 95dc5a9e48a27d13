import { describe, it, expect } from '@jest/globals';
import { DeploymentScheduler, groupByPackage } from '../../../src/configure/DeploymentScheduler.js';
import type { DeploymentOutcome } from '../../../src/configure/DeploymentRunner.js';
import type { DeploymentTask } from '../../../src/configure/types.js';

function task(packageId: string, artifactId: string): DeploymentTask {
  return { packageId, artifactId, artifactType: 'Integration' };
}

/**
 * Runner whose tasks stay in flight for a few event-loop turns and that
 * records the highest concurrency seen per package.
 */
function trackingRunner() {
  const active = new Map<string, number>();
  const peak = new Map<string, number>();
  let peakTotal = 0;
  let total = 0;

  const run = async (t: DeploymentTask): Promise<DeploymentOutcome> => {
    const now = (active.get(t.packageId) ?? 0) + 1;
    active.set(t.packageId, now);
    peak.set(t.packageId, Math.max(peak.get(t.packageId) ?? 0, now));
    total++;
    peakTotal = Math.max(peakTotal, total);

    for (let i = 0; i < 5; i++) {
      await new Promise<void>((resolve) => setImmediate(resolve));
    }

    active.set(t.packageId, (active.get(t.packageId) ?? 1) - 1);
    total--;
    return { task: t, state: 'succeeded', polls: 1 };
  };

  return { run, peak, peakTotal: () => peakTotal };
}

describe('groupByPackage', () => {
  it('should keep first-seen package order and task order', () => {
    const groups = groupByPackage([task('P2', 'a'), task('P1', 'b'), task('P2', 'c')]);

    expect([...groups.keys()]).toEqual(['P2', 'P1']);
    expect(groups.get('P2')?.map((t) => t.artifactId)).toEqual(['a', 'c']);
  });
});

describe('DeploymentScheduler', () => {
  it('should bound concurrency per package, not globally', async () => {
    const runner = trackingRunner();
    const tasks = [
      ...Array.from({ length: 6 }, (_, i) => task('DEV_Orders', `O${i}`)),
      ...Array.from({ length: 6 }, (_, i) => task('DEV_Billing', `B${i}`)),
    ];

    const outcomes = await new DeploymentScheduler(runner, 2).deployAll(tasks);

    expect(outcomes).toHaveLength(12);
    expect(runner.peak.get('DEV_Orders')).toBe(2);
    expect(runner.peak.get('DEV_Billing')).toBe(2);
    expect(runner.peakTotal()).toBe(4);
  });

  it('should isolate failures of sibling tasks', async () => {
    const runner = {
      run: async (t: DeploymentTask): Promise<DeploymentOutcome> => {
        if (t.artifactId === 'bad') {
          throw new Error('runner exploded');
        }
        return { task: t, state: 'succeeded', polls: 1 };
      },
    };

    const outcomes = await new DeploymentScheduler(runner, 3).deployAll([
      task('P1', 'good1'),
      task('P1', 'bad'),
      task('P1', 'good2'),
    ]);

    expect(outcomes.map((o) => [o.task.artifactId, o.state])).toEqual([
      ['good1', 'succeeded'],
      ['bad', 'failed'],
      ['good2', 'succeeded'],
    ]);
    expect(outcomes[1]!.error?.message).toBe('unexpected error: runner exploded');
  });

  it('should return nothing for no tasks', async () => {
    const runner = trackingRunner();
    await expect(new DeploymentScheduler(runner, 3).deployAll([])).resolves.toEqual([]);
  });
});
