/**
 * TerminationPolicy: decides after every diagnosis whether the episode stops.
 *
 * - Success ends the run as SUCCEEDED, even on the last allowed iteration.
 * - Consecutive InfraFailure/GenerationError diagnoses trip like a circuit
 *   breaker: reaching the bound ends the run as ABORTED. Any other category
 *   resets the counter.
 * - Otherwise reaching maxIterations ends the run as FAILED.
 *
 * Cancellation is observed by the orchestrator before an iteration and
 * reported through cancel().
 */

import { Logger } from '@mender/shared/Utils/logger.js';
import { isInfraCategory } from './types.js';
import type { DiagnosisCategory, RunConfig, RunStatus, StopReason, TerminalStatus } from './types.js';

const logger = new Logger('agent:termination');

export interface TerminalDecision {
  readonly status: TerminalStatus;
  readonly reason: StopReason;
}

export type Decision = { readonly status: 'RUNNING' } | TerminalDecision;

export class TerminationPolicy {
  private status: RunStatus = 'RUNNING';
  private iterations = 0;
  private consecutiveInfraFailures = 0;

  constructor(private readonly config: Pick<RunConfig, 'maxIterations' | 'maxConsecutiveInfraFailures'>) {}

  /** Feed the diagnosis of the attempt that just finished. */
  record(category: DiagnosisCategory): Decision {
    if (this.status !== 'RUNNING') {
      throw new Error(`Episode already terminated with status ${this.status}`);
    }
    this.iterations++;

    if (category === 'Success') {
      return this.stop('SUCCEEDED', 'succeeded');
    }

    if (isInfraCategory(category)) {
      this.consecutiveInfraFailures++;
      if (this.consecutiveInfraFailures >= this.config.maxConsecutiveInfraFailures) {
        logger.error(
          `Aborting: ${this.consecutiveInfraFailures} consecutive infrastructure/generation failures`,
        );
        return this.stop('ABORTED', 'infra_failures');
      }
    } else {
      this.consecutiveInfraFailures = 0;
    }

    if (this.iterations >= this.config.maxIterations) {
      return this.stop('FAILED', 'max_iterations');
    }

    return { status: 'RUNNING' };
  }

  cancel(): TerminalDecision {
    if (this.status !== 'RUNNING') {
      throw new Error(`Episode already terminated with status ${this.status}`);
    }
    return this.stop('ABORTED', 'cancelled');
  }

  getState(): { status: RunStatus; iterations: number; consecutiveInfraFailures: number } {
    return {
      status: this.status,
      iterations: this.iterations,
      consecutiveInfraFailures: this.consecutiveInfraFailures,
    };
  }

  private stop(status: TerminalStatus, reason: StopReason): TerminalDecision {
    this.status = status;
    return { status, reason };
  }
}
