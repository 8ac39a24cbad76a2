/**
 * ResultClassifier: maps one execution result to a diagnosis.
 *
 * Rules are checked in order and the first match wins:
 *   1. infra error        -> InfraFailure
 *   2. timed out          -> Timeout
 *   3. trace / bad exit   -> CodeError
 *   4. predicate false    -> AssertionFailure
 *   5. otherwise          -> Success
 *
 * The feedback text depends on nothing but (result, task), so re-classifying
 * a persisted result always reproduces the stored diagnosis.
 */

import { truncateTail } from '@mender/shared/Utils/truncate.js';
import type { Diagnosis, ExecutionResult, SuccessPredicate, Task } from './types.js';

export const TIMEOUT_FEEDBACK = 'execution exceeded time limit';

export const TRUNCATED_NOTE =
  'output was cut at the sandbox limit (MENDER_SANDBOX_MAX_OUTPUT_CHARS) before the comparison';

export interface ClassifierOptions {
  /** Cap on the trailing output quoted in CodeError feedback */
  maxFeedbackChars?: number;
}

export class ResultClassifier {
  private readonly maxFeedbackChars: number;

  constructor(options: ClassifierOptions = {}) {
    this.maxFeedbackChars = options.maxFeedbackChars ?? 2_000;
  }

  classify(result: ExecutionResult, task: Task): Diagnosis {
    if (result.infraError) {
      return { category: 'InfraFailure', feedback: `sandbox failure: ${result.infraError}` };
    }

    if (result.timedOut) {
      return { category: 'Timeout', feedback: TIMEOUT_FEEDBACK };
    }

    const expectedExit = task.predicate?.expectedExitCode ?? 0;
    const trace = result.trace?.trim() ?? '';
    if (trace !== '' || result.exitStatus !== expectedExit) {
      return { category: 'CodeError', feedback: this.codeErrorFeedback(result, trace) };
    }

    const mismatch = task.predicate ? checkPredicate(task.predicate, result.stdout, this.maxFeedbackChars) : null;
    if (mismatch) {
      // The sandbox keeps only the head and tail of long output, so an
      // expected stdout beyond its limit can never match
      const feedback = result.truncated ? `${mismatch}\n${TRUNCATED_NOTE}` : mismatch;
      return { category: 'AssertionFailure', feedback };
    }

    return { category: 'Success', feedback: 'all checks passed' };
  }

  private codeErrorFeedback(result: ExecutionResult, trace: string): string {
    let header: string;
    if (trace !== '') {
      header = 'raised an exception';
    } else if (result.exitStatus === null) {
      header = 'terminated by a signal';
    } else {
      header = `exited with status ${result.exitStatus}`;
    }

    const detail = trace || result.stderr.trim() || result.stdout.trim();
    if (detail === '') {
      return header;
    }
    return `${header}\n${truncateTail(detail, this.maxFeedbackChars).text}`;
  }
}

/**
 * Returns a mismatch description, or null when stdout satisfies the predicate.
 */
export function checkPredicate(predicate: SuccessPredicate, stdout: string, maxChars: number): string | null {
  if (predicate.expectedStdout !== undefined) {
    const expected = predicate.expectedStdout.trimEnd();
    const actual = stdout.trimEnd();
    if (actual !== expected) {
      const shown = truncateTail(actual, maxChars).text;
      return `stdout mismatch: expected ${JSON.stringify(expected)}, got ${JSON.stringify(shown)}`;
    }
  }

  if (predicate.stdoutContains !== undefined && !stdout.includes(predicate.stdoutContains)) {
    return `stdout does not contain ${JSON.stringify(predicate.stdoutContains)}`;
  }

  return null;
}
