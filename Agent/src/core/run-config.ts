/**
 * Validation of per-run options and task definitions.
 *
 * Both are checked before an episode exists, so every failure here is a
 * ConfigurationError and nothing is persisted.
 */

import { z } from 'zod';
import { ConfigurationError } from '@mender/shared/Types/errors.js';
import type { RunConfig, Task } from './types.js';

const positiveInt = z.number().int().positive();

export const ResourceLimitsSchema = z
  .object({
    memoryMb: positiveInt.optional(),
    cpuSeconds: z.number().positive().optional(),
  })
  .strict();

export const RunConfigSchema = z
  .object({
    maxIterations: positiveInt.default(5),
    perAttemptTimeoutMs: positiveInt.default(15_000),
    maxConsecutiveInfraFailures: positiveInt.default(3),
    resourceLimits: ResourceLimitsSchema.optional(),
  })
  .strict();

export const SuccessPredicateSchema = z
  .object({
    expectedStdout: z.string().optional(),
    stdoutContains: z.string().optional(),
    expectedExitCode: z.number().int().min(0).max(255).optional(),
  })
  .strict();

export const TaskSchema = z
  .object({
    statement: z.string().trim().min(1, 'statement must not be empty'),
    language: z.enum(['python', 'node', 'bash']).default('python'),
    testCode: z.string().optional(),
    predicate: SuccessPredicateSchema.optional(),
  })
  .strict();

export const DEFAULT_RUN_CONFIG: RunConfig = RunConfigSchema.parse({});

function formatIssues(error: z.ZodError): string {
  return error.errors.map((e) => `${e.path.join('.') || '(root)'}: ${e.message}`).join('; ');
}

export function parseRunConfig(input: unknown): RunConfig {
  const result = RunConfigSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid run config: ${formatIssues(result.error)}`, result.error.errors);
  }
  return result.data;
}

export function parseTask(input: unknown): Task {
  const result = TaskSchema.safeParse(input);
  if (!result.success) {
    throw new ConfigurationError(`Invalid task: ${formatIssues(result.error)}`, result.error.errors);
  }
  return result.data;
}

/** Ids double as file names in the JSONL backend */
export const EpisodeIdSchema = z.string().regex(/^[\w-]+$/, 'use letters, digits, _ and - only');

export function parseEpisodeId(input: string): string {
  const result = EpisodeIdSchema.safeParse(input);
  if (!result.success) {
    const reason = result.error.errors[0]?.message ?? 'malformed';
    throw new ConfigurationError(`Invalid episode id ${JSON.stringify(input)}: ${reason}`);
  }
  return result.data;
}
