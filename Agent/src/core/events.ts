import type { Attempt, Diagnosis, Episode, ExecutionResult, GenerationUsage, Task } from './types.js';

/** Progress notifications emitted while an episode runs. */
export type RunEvent =
  | { type: 'episode_started'; episodeId: string; task: Task }
  | { type: 'attempt_started'; episodeId: string; iteration: number }
  | { type: 'attempt_generated'; episodeId: string; attempt: Attempt; usage?: GenerationUsage }
  | { type: 'attempt_executed'; episodeId: string; iteration: number; result: ExecutionResult | null }
  | { type: 'attempt_diagnosed'; episodeId: string; iteration: number; diagnosis: Diagnosis }
  | { type: 'episode_finished'; episode: Episode };

export type RunEventListener = (event: RunEvent) => void;
