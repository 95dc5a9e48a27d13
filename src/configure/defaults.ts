/**
 * Default application for parsed configuration sources.
 *
 * Pure: takes the validated raw shape, returns the frozen model with every
 * default filled in. Nothing downstream re-applies defaults.
 */

import type { RawArtifact, RawBatchSettings, RawConfiguration, RawPackage } from './schema.js';
import { DEFAULT_ARTIFACT_VERSION, DEFAULT_BATCH_SIZE } from './types.js';
import type { Artifact, BatchSettings, Configuration, Package } from './types.js';

export function applyBatchDefaults(raw: RawBatchSettings): BatchSettings {
  return Object.freeze({
    enabled: raw.enabled ?? true,
    batchSize: raw.batchSize ?? DEFAULT_BATCH_SIZE,
  });
}

export function applyArtifactDefaults(raw: RawArtifact): Artifact {
  const artifact: Artifact = {
    id: raw.artifactId,
    displayName: raw.displayName,
    type: raw.type,
    version: raw.version ?? DEFAULT_ARTIFACT_VERSION,
    deploy: raw.deploy ?? false,
    parameters: Object.freeze((raw.parameters ?? []).map((p) => Object.freeze({ key: p.key, value: p.value }))),
    ...(raw.batch ? { batch: applyBatchDefaults(raw.batch) } : {}),
  };
  return Object.freeze(artifact);
}

export function applyPackageDefaults(raw: RawPackage): Package {
  return Object.freeze({
    id: raw.integrationSuiteId,
    displayName: raw.displayName,
    deploy: raw.deploy ?? false,
    artifacts: Object.freeze((raw.artifacts ?? []).map(applyArtifactDefaults)),
  });
}

export function applyDefaults(raw: RawConfiguration): Configuration {
  return Object.freeze({
    deploymentPrefix: raw.deploymentPrefix,
    packages: Object.freeze((raw.packages ?? []).map(applyPackageDefaults)),
  });
}
