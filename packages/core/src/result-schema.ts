/**
 * Zod schema for RunResult
 *
 * Describes the YAML document printed by `wheelhouse build --yaml`, so CI
 * scripts and tests can validate it.
 *
 * @packageDocumentation
 */

import { createSafeValidator } from '@wheelhouse/config';
import { z } from 'zod';

export const SkippedProjectSchema = z.object({
  name: z.string().min(1),
  reason: z.enum(['missing-directory', 'missing-descriptor']),
}).strict();

export const FailedBuildSchema = z.object({
  name: z.string().min(1),
  status: z.literal('failure'),
  diagnostic: z.string().min(1),
}).strict();

export const ArtifactSchema = z.object({
  fileName: z.string().min(1),
  sizeBytes: z.number().int().nonnegative(),
}).strict();

/**
 * Run Result Schema
 *
 * Field order follows RunResult: verdict first, verbose diagnostics later.
 */
export const RunResultSchema = z.object({
  passed: z.boolean(),
  timestamp: z.string().datetime(),
  outputDir: z.string().min(1),
  successes: z.array(z.string().min(1)),
  failures: z.array(FailedBuildSchema),
  skipped: z.array(SkippedProjectSchema),
  artifacts: z.array(ArtifactSchema),
  artifactScanError: z.string().min(1).optional(),
}).strict().refine(
  result => result.passed === (result.failures.length === 0),
  { message: 'passed must be true exactly when there are no failures', path: ['passed'] }
);

export type RunResultDocument = z.infer<typeof RunResultSchema>;

/**
 * Safe validation function for RunResult documents
 */
export const safeValidateRunResult = createSafeValidator(RunResultSchema);
