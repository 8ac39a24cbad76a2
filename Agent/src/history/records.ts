/**
 * Zod schemas for everything read back from storage.
 *
 * Stored JSON is untrusted input as far as the type system goes; it is
 * parsed through these before it becomes an Episode.
 */

import { z } from 'zod';
import { DIAGNOSIS_CATEGORIES } from '../core/types.js';
import { TaskSchema } from '../core/run-config.js';

export const ExecutionResultSchema = z.object({
  stdout: z.string(),
  stderr: z.string(),
  exitStatus: z.number().int().nullable(),
  durationMs: z.number().nonnegative(),
  trace: z.string().optional(),
  timedOut: z.boolean(),
  infraError: z.string().optional(),
  truncated: z.boolean(),
});

export const DiagnosisSchema = z.object({
  category: z.enum(DIAGNOSIS_CATEGORIES),
  feedback: z.string(),
});

export const AttemptSchema = z.object({
  iteration: z.number().int().nonnegative(),
  code: z.string(),
  rationale: z.string(),
  artifactRef: z.string().optional(),
  createdAt: z.string(),
});

export const TripleSchema = z.object({
  attempt: AttemptSchema,
  result: ExecutionResultSchema.nullable(),
  diagnosis: DiagnosisSchema,
});

export const TerminalStatusSchema = z.enum(['SUCCEEDED', 'FAILED', 'ABORTED']);
export const StopReasonSchema = z.enum(['succeeded', 'max_iterations', 'infra_failures', 'cancelled']);

export const HistoryRecordSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('opened'), task: TaskSchema, startedAt: z.string() }),
  z.object({ kind: z.literal('triple'), triple: TripleSchema }),
  z.object({
    kind: z.literal('closed'),
    status: TerminalStatusSchema,
    reason: StopReasonSchema,
    endedAt: z.string(),
    finalCode: z.string().optional(),
  }),
]);
