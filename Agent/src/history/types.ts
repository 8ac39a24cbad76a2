import type { Episode, Language, RunStatus, StopReason, Task, TerminalStatus, Triple } from '../core/types.js';

export interface OpenedRecord {
  readonly kind: 'opened';
  readonly task: Task;
  readonly startedAt: string;
}

export interface TripleRecord {
  readonly kind: 'triple';
  readonly triple: Triple;
}

export interface ClosedRecord {
  readonly kind: 'closed';
  readonly status: TerminalStatus;
  readonly reason: StopReason;
  readonly endedAt: string;
  readonly finalCode?: string;
}

/** The only things ever written for an episode, in this order: opened, triple*, closed */
export type HistoryRecord = OpenedRecord | TripleRecord | ClosedRecord;

export interface EpisodeSummary {
  id: string;
  statement: string;
  language: Language;
  status: RunStatus;
  attempts: number;
  startedAt: string;
  endedAt?: string;
  stopReason?: StopReason;
}

export interface ListOptions {
  limit?: number;
  status?: RunStatus;
}

/**
 * Append-only episode log. append() is the only mutation and each call is
 * one atomic write; a record that would break the episode's ordering is
 * rejected with a HistoryError.
 */
export interface HistoryStore {
  append(episodeId: string, record: HistoryRecord): Promise<void>;
  read(episodeId: string): Promise<Episode | null>;
  /** Most recent first */
  list(options?: ListOptions): Promise<EpisodeSummary[]>;
  close(): Promise<void>;
}

export type HistoryBackend = 'sqlite' | 'jsonl';
