import { describe, it, expect, beforeEach } from '@jest/globals';
import { ParameterUpdater, resolveBatchPlan } from '../../../src/configure/ParameterUpdater.js';
import { applyArtifactDefaults } from '../../../src/configure/defaults.js';
import type { RawArtifact } from '../../../src/configure/schema.js';
import type { Artifact } from '../../../src/configure/types.js';
import type { BatchExecutor } from '../../../src/configure/capabilities.js';
import { FakeTenant } from '../../helpers/FakeTenant.js';

function artifact(overrides: Partial<RawArtifact> = {}): Artifact {
  return applyArtifactDefaults({ artifactId: 'Flow1', type: 'Integration', ...overrides });
}

function params(count: number): Array<{ key: string; value: string }> {
  return Array.from({ length: count }, (_, i) => ({ key: `P${i + 1}`, value: `v${i + 1}` }));
}

const OPTIONS = { batchSize: 90, disableBatch: false };

describe('ParameterUpdater', () => {
  let tenant: FakeTenant;
  let updater: ParameterUpdater;

  beforeEach(() => {
    tenant = new FakeTenant().withArtifact('DEV_Flow1', { P1: 'old', P2: 'old', P3: 'old', P4: 'old', P5: 'old' });
    updater = new ParameterUpdater(tenant, tenant);
  });

  describe('resolveBatchPlan', () => {
    it('should batch by default with the global size', () => {
      expect(resolveBatchPlan(artifact(), OPTIONS)).toEqual({ useBatch: true, batchSize: 90 });
    });

    it('should let the artifact override the size', () => {
      expect(resolveBatchPlan(artifact({ batch: { batchSize: 2 } }), OPTIONS)).toEqual({ useBatch: true, batchSize: 2 });
    });

    it('should not batch when disabled globally or by the artifact', () => {
      expect(resolveBatchPlan(artifact(), { ...OPTIONS, disableBatch: true }).useBatch).toBe(false);
      expect(resolveBatchPlan(artifact({ batch: { enabled: false } }), OPTIONS).useBatch).toBe(false);
    });
  });

  describe('individual path', () => {
    it('should update each parameter with its own call', async () => {
      const result = await updater.update('DEV_Flow1', artifact({ parameters: params(2) }), {
        ...OPTIONS,
        disableBatch: true,
      });

      expect(result).toMatchObject({ success: true, mode: 'individual', updated: 2, failed: 0, individualRequests: 2 });
      expect(tenant.calls).toEqual(['updateParameter DEV_Flow1 P1', 'updateParameter DEV_Flow1 P2']);
      expect(tenant.value('DEV_Flow1', 'P2')).toBe('v2');
    });

    it('should continue after a failed parameter and fail the artifact', async () => {
      tenant.failUpdates.add('DEV_Flow1/P1');

      const result = await updater.update('DEV_Flow1', artifact({ parameters: params(3) }), {
        ...OPTIONS,
        disableBatch: true,
      });

      expect(result.success).toBe(false);
      expect(result.updated).toBe(2);
      expect(result.failed).toBe(1);
      expect(result.failedKeys).toEqual(['P1']);
      expect(result.error).toBe('1 parameters failed to update');
      expect(tenant.value('DEV_Flow1', 'P3')).toBe('v3');
    });

    it('should succeed with nothing to do', async () => {
      const result = await updater.update('DEV_Flow1', artifact(), OPTIONS);
      expect(result).toMatchObject({ success: true, mode: 'individual', updated: 0, individualRequests: 0 });
      expect(tenant.calls).toEqual([]);
    });
  });

  describe('batch path', () => {
    it('should send ceil(P/S) chunks', async () => {
      const chunkSizes: number[][] = [];
      const executor: BatchExecutor = {
        execute: async (operations, chunkSize) => {
          const result = await tenant.execute(operations, chunkSize);
          const sizes: number[] = [];
          for (let i = 0; i < operations.length; i += chunkSize) {
            sizes.push(Math.min(chunkSize, operations.length - i));
          }
          chunkSizes.push(sizes);
          return result;
        },
      };

      const result = await new ParameterUpdater(tenant, executor).update(
        'DEV_Flow1',
        artifact({ parameters: params(5), batch: { batchSize: 2 } }),
        OPTIONS
      );

      expect(chunkSizes).toEqual([[2, 2, 1]]);
      expect(result).toMatchObject({ success: true, mode: 'batch', updated: 5, batchRequests: 3, individualRequests: 0 });
    });

    it('should read the current parameters of the requested version first', async () => {
      await updater.update('DEV_Flow1', artifact({ parameters: params(1), version: '2.0.0' }), OPTIONS);
      expect(tenant.calls[0]).toBe('getParameters DEV_Flow1 2.0.0');
    });

    it('should skip missing keys without failing the artifact', async () => {
      const result = await updater.update(
        'DEV_Flow1',
        artifact({ parameters: [{ key: 'P1', value: 'new' }, { key: 'Unknown', value: 'x' }] }),
        OPTIONS
      );

      expect(result.success).toBe(true);
      expect(result.updated).toBe(1);
      expect(result.failed).toBe(1);
      expect(result.missingKeys).toEqual(['Unknown']);
      expect(tenant.calls).toEqual(['getParameters DEV_Flow1 active', 'execute 1/90']);
    });

    it('should not call the executor when every key is missing', async () => {
      const result = await updater.update('DEV_Flow1', artifact({ parameters: [{ key: 'Nope', value: 'x' }] }), OPTIONS);

      expect(result).toMatchObject({ success: true, updated: 0, failed: 1, batchRequests: 0 });
      expect(tenant.count('execute')).toBe(0);
    });

    it('should fail the artifact when current parameters cannot be read', async () => {
      tenant.failReads.add('DEV_Flow1');

      const result = await updater.update('DEV_Flow1', artifact({ parameters: params(2) }), OPTIONS);

      expect(result.success).toBe(false);
      expect(result.error).toBe('failed to get current configuration: artifact DEV_Flow1 not found');
      expect(tenant.count('execute')).toBe(0);
      expect(tenant.count('updateParameter')).toBe(0);
    });

    it('should fail the artifact on operation failures without rolling back', async () => {
      tenant.failBatchKeys.add('P2');

      const result = await updater.update('DEV_Flow1', artifact({ parameters: params(3) }), OPTIONS);

      expect(result).toMatchObject({ success: false, mode: 'batch', updated: 2, failed: 1, failedKeys: ['P2'] });
      expect(result.error).toBe('1 parameters failed to update in batch');
      expect(tenant.value('DEV_Flow1', 'P1')).toBe('v1');
      expect(tenant.value('DEV_Flow1', 'P2')).toBe('old');
    });

    it('should fall back to individual calls exactly once on a transport failure', async () => {
      tenant.batchTransportFailure = true;

      const result = await updater.update('DEV_Flow1', artifact({ parameters: params(3) }), OPTIONS);

      expect(tenant.count('execute')).toBe(1);
      expect(tenant.calls.filter((c) => c.startsWith('updateParameter'))).toEqual([
        'updateParameter DEV_Flow1 P1',
        'updateParameter DEV_Flow1 P2',
        'updateParameter DEV_Flow1 P3',
      ]);
      expect(result).toMatchObject({
        success: true,
        mode: 'fallback',
        updated: 3,
        failed: 0,
        batchRequests: 0,
        individualRequests: 3,
        missingKeys: [],
      });
    });

    it('should replay keys missing remotely in the fallback and fail the artifact', async () => {
      tenant.batchTransportFailure = true;
      tenant.failUpdates.add('DEV_Flow1/Unknown');

      const result = await updater.update(
        'DEV_Flow1',
        artifact({ parameters: [{ key: 'P1', value: 'v1' }, { key: 'Unknown', value: 'x' }] }),
        OPTIONS
      );

      expect(tenant.calls).toEqual([
        'getParameters DEV_Flow1 active',
        'execute 1/90',
        'updateParameter DEV_Flow1 P1',
        'updateParameter DEV_Flow1 Unknown',
      ]);
      expect(result).toMatchObject({
        success: false,
        mode: 'fallback',
        updated: 1,
        failed: 2,
        individualRequests: 2,
        failedKeys: ['Unknown'],
        missingKeys: ['Unknown'],
      });
      expect(result.error).toBe('1 parameters failed to update');
      expect(tenant.value('DEV_Flow1', 'P1')).toBe('v1');
    });

    it('should rethrow errors that are not transport failures', async () => {
      const executor: BatchExecutor = {
        execute: async () => {
          throw new TypeError('bug in executor');
        },
      };

      await expect(
        new ParameterUpdater(tenant, executor).update('DEV_Flow1', artifact({ parameters: params(1) }), OPTIONS)
      ).rejects.toThrow(TypeError);
      expect(tenant.count('updateParameter')).toBe(0);
    });
  });
});
