/**
 * In-process stand-ins for the generator, sandbox and history store.
 */

import { GenerationError, HistoryError } from '@mender/shared/Types/errors.js';
import type { ExecuteOptions, ExecutionResult, ExecutionSandbox } from '@mender/shared/Types/execution.js';
import type { Prompt } from '../../src/core/prompt.js';
import type { Episode, Generation, GenerateOptions, Generator } from '../../src/core/types.js';
import type { EpisodeSummary, HistoryRecord, HistoryStore, ListOptions } from '../../src/history/types.js';

export function execResult(overrides: Partial<ExecutionResult> = {}): ExecutionResult {
  return {
    stdout: '',
    stderr: '',
    exitStatus: 0,
    durationMs: 12,
    timedOut: false,
    truncated: false,
    ...overrides,
  };
}

type GeneratorStep = Generation | Error;

/**
 * Replays the given steps in order, repeating the last one once they run out.
 * Errors are thrown as GenerationErrors.
 */
export class ScriptedGenerator implements Generator {
  readonly prompts: Prompt[] = [];

  constructor(private readonly steps: GeneratorStep[]) {}

  async generate(prompt: Prompt, _options?: GenerateOptions): Promise<Generation> {
    this.prompts.push(prompt);
    const step = this.steps[Math.min(this.prompts.length - 1, this.steps.length - 1)];
    if (step instanceof Error) {
      throw step instanceof GenerationError ? step : new GenerationError(step.message, step);
    }
    return step;
  }
}

/** Returns canned results in order, repeating the last one. */
export class FakeSandbox implements ExecutionSandbox {
  readonly calls: Array<{ code: string; options: ExecuteOptions }> = [];

  constructor(private readonly results: Array<ExecutionResult | ((code: string) => ExecutionResult)>) {}

  async execute(code: string, options: ExecuteOptions): Promise<ExecutionResult> {
    this.calls.push({ code, options });
    const next = this.results[Math.min(this.calls.length - 1, this.results.length - 1)];
    return typeof next === 'function' ? next(code) : next;
  }
}

/**
 * Delegates to a real store and fails the append with the given 1-based
 * index, simulating a crash at that point.
 */
export class CrashingHistoryStore implements HistoryStore {
  private appends = 0;

  constructor(
    private readonly inner: HistoryStore,
    private readonly failOnAppend: number,
  ) {}

  async append(episodeId: string, record: HistoryRecord): Promise<void> {
    this.appends++;
    if (this.appends === this.failOnAppend) {
      throw new HistoryError('disk full');
    }
    await this.inner.append(episodeId, record);
  }

  read(episodeId: string): Promise<Episode | null> {
    return this.inner.read(episodeId);
  }

  list(options?: ListOptions): Promise<EpisodeSummary[]> {
    return this.inner.list(options);
  }

  close(): Promise<void> {
    return this.inner.close();
  }
}

export const FIXED_NOW = new Date('2025-03-01T10:00:00.000Z');
