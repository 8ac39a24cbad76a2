/**
 * Contract between the agent loop and an isolation environment.
 *
 * The loop only ever sees these shapes; how a sandbox isolates, limits and
 * cancels a run is its own business.
 */

export type Language = 'python' | 'node' | 'bash';

export const LANGUAGES: readonly Language[] = ['python', 'node', 'bash'];

export interface ResourceLimits {
  /** Virtual memory ceiling for the attempt, in megabytes */
  memoryMb?: number;
  /** CPU time ceiling for the attempt, in seconds */
  cpuSeconds?: number;
}

export interface ExecuteOptions {
  timeoutMs: number;
  limits?: ResourceLimits;
  /** Aborting cancels the in-flight run the same way a timeout does. */
  signal?: AbortSignal;
}

export interface ExecutionResult {
  stdout: string;
  stderr: string;
  /** null when the process was killed by a signal */
  exitStatus: number | null;
  durationMs: number;
  /** Captured exception/trace text, when the runtime produced one */
  trace?: string;
  /** The run was forcibly terminated after exceeding its time budget */
  timedOut: boolean;
  /**
   * The run did not complete for reasons outside the submitted code:
   * workspace setup failed, the interpreter could not be spawned, or the
   * caller cancelled it.
   */
  infraError?: string;
  /** stdout or stderr was cut down to the sandbox output limit */
  truncated: boolean;
}

export interface ExecutionSandbox {
  execute(code: string, options: ExecuteOptions): Promise<ExecutionResult>;
}
