/**
 * Orchestrator: owns the write-run-fix loop for one episode.
 *
 * Per iteration: check for cancellation, build the prompt from the episode
 * so far, generate, optionally render the rationale, execute, classify,
 * persist the triple, and ask the termination policy whether to go on.
 *
 * Iterations are strictly sequential and each triple is persisted before the
 * next iteration starts. A persistence failure rejects run(); the records
 * already written stay a valid prefix of the episode.
 *
 * The stop signal is forwarded to the generator and the sandbox, which cut
 * the in-flight attempt short. That attempt is still recorded, and unless it
 * succeeded the episode ends ABORTED with reason `cancelled`.
 */

import { ConfigurationError, GenerationError, errorMessage } from '@mender/shared/Types/errors.js';
import type { ExecutionSandbox } from '@mender/shared/Types/execution.js';
import { Logger } from '@mender/shared/Utils/logger.js';
import type { HistoryStore } from '../history/types.js';
import { generateEpisodeId } from '../utils/id-generator.js';
import { ResultClassifier } from './classifier.js';
import type { RunEvent, RunEventListener } from './events.js';
import { withTestCode } from './languages.js';
import { buildPrompt } from './prompt.js';
import { parseEpisodeId, parseRunConfig, parseTask } from './run-config.js';
import { TerminationPolicy } from './termination-policy.js';
import type { TerminalDecision } from './termination-policy.js';
import type {
  Attempt,
  Diagnosis,
  ExecutionResult,
  FinishedEpisode,
  GenerationUsage,
  Generator,
  Language,
  RunConfig,
  Task,
  ThoughtRenderer,
  Triple,
} from './types.js';

const logger = new Logger('agent:orchestrator');

export interface OrchestratorDeps {
  generator: Generator;
  /** Sandbox for the task's language */
  createSandbox: (language: Language) => ExecutionSandbox;
  history: HistoryStore;
  classifier?: ResultClassifier;
  renderer?: ThoughtRenderer;
  /** Clock for attempt and episode timestamps */
  now?: () => Date;
}

export interface RunOptions {
  signal?: AbortSignal;
  onEvent?: RunEventListener;
  episodeId?: string;
}

export class Orchestrator {
  private readonly classifier: ResultClassifier;
  private readonly now: () => Date;

  constructor(private readonly deps: OrchestratorDeps) {
    this.classifier = deps.classifier ?? new ResultClassifier();
    this.now = deps.now ?? (() => new Date());
  }

  /**
   * Run one episode to a terminal status.
   *
   * Throws ConfigurationError before anything is persisted when the task,
   * config or episode id is invalid, or the id is already taken. Throws
   * HistoryError when a record cannot be written.
   * FAILED and ABORTED episodes are returned, not thrown.
   */
  async run(taskInput: Task, configInput: Partial<RunConfig> = {}, options: RunOptions = {}): Promise<FinishedEpisode> {
    const task = parseTask(taskInput);
    const config = parseRunConfig(configInput);
    const episodeId = options.episodeId !== undefined ? parseEpisodeId(options.episodeId) : generateEpisodeId();
    if (options.episodeId !== undefined && (await this.deps.history.read(episodeId))) {
      throw new ConfigurationError(`Episode ${episodeId} already exists`);
    }
    const { signal } = options;
    const emit = (event: RunEvent): void => this.emit(options.onEvent, event);

    const sandbox = this.deps.createSandbox(task.language);
    const policy = new TerminationPolicy(config);
    const startedAt = this.timestamp();
    const triples: Triple[] = [];

    await this.deps.history.append(episodeId, { kind: 'opened', task, startedAt });
    logger.info(`Episode ${episodeId} started`, {
      language: task.language,
      maxIterations: config.maxIterations,
      perAttemptTimeoutMs: config.perAttemptTimeoutMs,
    });
    emit({ type: 'episode_started', episodeId, task });

    let outcome: TerminalDecision | null = null;
    while (!outcome) {
      if (signal?.aborted) {
        logger.warn(`Episode ${episodeId} cancelled before iteration ${triples.length}`);
        outcome = policy.cancel();
        break;
      }

      const iteration = triples.length;
      emit({ type: 'attempt_started', episodeId, iteration });

      const triple = await this.iterate(episodeId, iteration, task, config, sandbox, triples, signal, emit);

      await this.deps.history.append(episodeId, { kind: 'triple', triple });
      triples.push(triple);

      const cutShort = signal?.aborted === true && triple.diagnosis.category !== 'Success';
      const decision = cutShort ? policy.cancel() : policy.record(triple.diagnosis.category);
      logger.info(`Attempt ${iteration + 1}/${config.maxIterations}: ${triple.diagnosis.category}`, {
        episodeId,
      });
      if (decision.status !== 'RUNNING') {
        outcome = decision;
      }
    }

    const endedAt = this.timestamp();
    const finalCode = outcome.status === 'SUCCEEDED' ? triples.at(-1)?.attempt.code : undefined;
    await this.deps.history.append(episodeId, {
      kind: 'closed',
      status: outcome.status,
      reason: outcome.reason,
      endedAt,
      ...(finalCode !== undefined ? { finalCode } : {}),
    });

    const episode: FinishedEpisode = {
      id: episodeId,
      task,
      triples,
      status: outcome.status,
      startedAt,
      endedAt,
      stopReason: outcome.reason,
      ...(finalCode !== undefined ? { finalCode } : {}),
    };

    logger.info(`Episode ${episodeId} finished: ${episode.status} (${outcome.reason}) after ${triples.length} attempt(s)`);
    emit({ type: 'episode_finished', episode });
    return episode;
  }

  private async iterate(
    episodeId: string,
    iteration: number,
    task: Task,
    config: RunConfig,
    sandbox: ExecutionSandbox,
    triples: readonly Triple[],
    signal: AbortSignal | undefined,
    emit: (event: RunEvent) => void,
  ): Promise<Triple> {
    const prompt = buildPrompt(task, triples);

    let code: string;
    let rationale: string;
    let usage: GenerationUsage | undefined;
    try {
      const generation = await this.deps.generator.generate(prompt, { signal });
      if (generation.code.trim() === '') {
        throw new GenerationError('generator returned no code');
      }
      ({ code, rationale, usage } = generation);
    } catch (error) {
      const cause = error instanceof GenerationError ? error.details : error;
      logger.warn(`Generation failed on attempt ${iteration + 1}: ${errorMessage(error)}`, { episodeId, cause });
      const attempt: Attempt = { iteration, code: '', rationale: '', createdAt: this.timestamp() };
      const diagnosis: Diagnosis = { category: 'GenerationError', feedback: errorMessage(error) };
      emit({ type: 'attempt_executed', episodeId, iteration, result: null });
      emit({ type: 'attempt_diagnosed', episodeId, iteration, diagnosis });
      return { attempt, result: null, diagnosis };
    }

    const artifactRef = await this.render(rationale, episodeId, iteration);
    const attempt: Attempt = {
      iteration,
      code,
      rationale,
      ...(artifactRef ? { artifactRef } : {}),
      createdAt: this.timestamp(),
    };
    emit({ type: 'attempt_generated', episodeId, attempt, ...(usage ? { usage } : {}) });

    const result = await this.execute(sandbox, withTestCode(code, task.language, task.testCode), config, signal);
    emit({ type: 'attempt_executed', episodeId, iteration, result });

    const diagnosis = this.classifier.classify(result, task);
    emit({ type: 'attempt_diagnosed', episodeId, iteration, diagnosis });

    return { attempt, result, diagnosis };
  }

  private async execute(
    sandbox: ExecutionSandbox,
    source: string,
    config: RunConfig,
    signal: AbortSignal | undefined,
  ): Promise<ExecutionResult> {
    try {
      return await sandbox.execute(source, {
        timeoutMs: config.perAttemptTimeoutMs,
        limits: config.resourceLimits,
        signal,
      });
    } catch (error) {
      // The sandbox contract is to report failures in the result; a throw is still an infra fault
      logger.error('Sandbox threw instead of returning a result', error);
      return {
        stdout: '',
        stderr: '',
        exitStatus: null,
        durationMs: 0,
        timedOut: false,
        infraError: `sandbox error: ${errorMessage(error)}`,
        truncated: false,
      };
    }
  }

  private async render(rationale: string, episodeId: string, iteration: number): Promise<string | undefined> {
    const renderer = this.deps.renderer;
    if (!renderer || rationale.trim() === '') {
      return undefined;
    }
    try {
      const ref = await renderer.render(rationale, { episodeId, iteration });
      return ref ?? undefined;
    } catch (error) {
      logger.warn(`Thought rendering failed on attempt ${iteration + 1}`, error);
      return undefined;
    }
  }

  private emit(listener: RunEventListener | undefined, event: RunEvent): void {
    if (!listener) return;
    try {
      listener(event);
    } catch (error) {
      logger.warn(`Event listener threw on ${event.type}`, error);
    }
  }

  private timestamp(): string {
    return this.now().toISOString();
  }
}
