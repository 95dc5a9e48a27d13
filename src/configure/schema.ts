/**
 * Zod schema for configuration source files
 *
 * Fields that have defaults are optional here; defaults are applied afterwards
 * by applyDefaults() so the raw shape stays a faithful picture of the file.
 */

import { z } from 'zod';
import { ARTIFACT_TYPES } from './types.js';

/** Scalars are accepted for values so `MaxRetries: 5` needs no quoting */
const ScalarValueSchema = z
  .union([z.string(), z.number(), z.boolean()])
  .transform((value) => String(value));

export const RawParameterSchema = z.object({
  key: z.string().min(1, 'parameter key must not be empty'),
  value: ScalarValueSchema,
});

export const RawBatchSettingsSchema = z.object({
  enabled: z.boolean().optional(),
  batchSize: z.number().int().positive('batchSize must be greater than 0').optional(),
});

export const RawArtifactSchema = z.object({
  artifactId: z.string().min(1, 'artifactId is required'),
  displayName: z.string().optional(),
  type: z.enum(ARTIFACT_TYPES),
  version: z.string().min(1).optional(),
  deploy: z.boolean().optional(),
  parameters: z.array(RawParameterSchema).nullish(),
  batch: RawBatchSettingsSchema.nullish(),
});

export const RawPackageSchema = z.object({
  integrationSuiteId: z.string().min(1, 'integrationSuiteId is required'),
  displayName: z.string().optional(),
  deploy: z.boolean().optional(),
  artifacts: z.array(RawArtifactSchema).nullish(),
});

export const RawConfigurationSchema = z.object({
  deploymentPrefix: z.string().optional(),
  packages: z.array(RawPackageSchema).nullish(),
});

export type RawParameter = z.infer<typeof RawParameterSchema>;
export type RawBatchSettings = z.infer<typeof RawBatchSettingsSchema>;
export type RawArtifact = z.infer<typeof RawArtifactSchema>;
export type RawPackage = z.infer<typeof RawPackageSchema>;
export type RawConfiguration = z.infer<typeof RawConfigurationSchema>;

/**
 * Flatten zod issues into "packages.0.artifacts.1.type: Invalid enum value" lines
 */
export function formatIssues(error: z.ZodError): string[] {
  return error.issues.map((issue) => {
    const path = issue.path.join('.');
    return path ? `${path}: ${issue.message}` : issue.message;
  });
}
