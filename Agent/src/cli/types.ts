import type { Config } from '../config.js';
import type { Orchestrator } from '../core/orchestrator.js';
import type { Language } from '../core/types.js';
import type { HistoryStore } from '../history/types.js';

/** Raw writers; callers include their own newlines */
export interface CliIO {
  stdout: (text: string) => void;
  stderr: (text: string) => void;
}

export interface CliDeps {
  io: CliIO;
  loadConfig: () => Config;
  openHistory: (config: Config) => HistoryStore;
  createOrchestrator: (config: Config, history: HistoryStore, language: Language) => Orchestrator;
  /** Cancels a running episode; SIGINT is used when absent */
  signal?: AbortSignal;
}

export interface CliState {
  exitCode: number;
}
