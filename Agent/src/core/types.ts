/**
 * Core data model of a self-correcting run.
 *
 * Everything here is plain data: an Episode is rebuilt by folding its
 * persisted records, and each prompt is rebuilt from the Episode prefix.
 */

import type { ExecutionResult, Language, ResourceLimits } from '@mender/shared/Types/execution.js';
import type { Prompt } from './prompt.js';

export type { ExecutionResult, Language, ResourceLimits };

/**
 * Machine-checkable success condition, evaluated against an attempt that
 * exited cleanly.
 */
export interface SuccessPredicate {
  /** stdout must equal this, ignoring trailing whitespace on both sides */
  expectedStdout?: string;
  /** stdout must contain this substring */
  stdoutContains?: string;
  /** Exit status a passing attempt ends with (default 0) */
  expectedExitCode?: number;
}

export interface Task {
  readonly statement: string;
  readonly language: Language;
  /** Harness appended to every attempt before it runs */
  readonly testCode?: string;
  readonly predicate?: SuccessPredicate;
}

export interface Attempt {
  readonly iteration: number;
  readonly code: string;
  readonly rationale: string;
  /** Reference returned by the thought renderer, when one ran */
  readonly artifactRef?: string;
  readonly createdAt: string;
}

export const DIAGNOSIS_CATEGORIES = [
  'Success',
  'CodeError',
  'AssertionFailure',
  'Timeout',
  'InfraFailure',
  'GenerationError',
] as const;

export type DiagnosisCategory = (typeof DIAGNOSIS_CATEGORIES)[number];

/** Faults of the collaborators rather than of the generated code */
export const INFRA_CATEGORIES: ReadonlySet<DiagnosisCategory> = new Set(['InfraFailure', 'GenerationError']);

export function isInfraCategory(category: DiagnosisCategory): boolean {
  return INFRA_CATEGORIES.has(category);
}

export interface Diagnosis {
  readonly category: DiagnosisCategory;
  readonly feedback: string;
}

export interface Triple {
  readonly attempt: Attempt;
  /** null when generation failed and nothing was executed */
  readonly result: ExecutionResult | null;
  readonly diagnosis: Diagnosis;
}

export type RunStatus = 'RUNNING' | 'SUCCEEDED' | 'FAILED' | 'ABORTED';

export type TerminalStatus = Exclude<RunStatus, 'RUNNING'>;

export type StopReason = 'succeeded' | 'max_iterations' | 'infra_failures' | 'cancelled';

export interface Episode {
  readonly id: string;
  readonly task: Task;
  readonly triples: readonly Triple[];
  readonly status: RunStatus;
  readonly startedAt: string;
  readonly endedAt?: string;
  readonly stopReason?: StopReason;
  /** Code of the successful attempt (without the test harness) */
  readonly finalCode?: string;
}

/** What Orchestrator.run resolves to: an episode that has stopped */
export type FinishedEpisode = Episode & {
  readonly status: TerminalStatus;
  readonly endedAt: string;
  readonly stopReason: StopReason;
};

export interface RunConfig {
  maxIterations: number;
  perAttemptTimeoutMs: number;
  maxConsecutiveInfraFailures: number;
  resourceLimits?: ResourceLimits;
}

/** Token usage reported for one generation call */
export interface GenerationUsage {
  promptTokens: number;
  completionTokens: number;
  totalTokens: number;
}

export interface Generation {
  code: string;
  rationale: string;
  usage?: GenerationUsage;
}

export interface GenerateOptions {
  signal?: AbortSignal;
}

/**
 * Produces a candidate program. Every failure, whatever its cause, rejects
 * with a GenerationError.
 */
export interface Generator {
  generate(prompt: Prompt, options?: GenerateOptions): Promise<Generation>;
}

export interface RenderContext {
  episodeId: string;
  iteration: number;
}

/** Optional side-channel turning a rationale into an artifact (an image path). */
export interface ThoughtRenderer {
  render(rationale: string, context: RenderContext): Promise<string | null>;
}
