import { join } from 'node:path';
import { JsonlHistoryStore } from './jsonl-store.js';
import { SqliteHistoryStore } from './sqlite-store.js';
import type { HistoryBackend, HistoryStore } from './types.js';

export function createHistoryStore(backend: HistoryBackend, historyDir: string): HistoryStore {
  switch (backend) {
    case 'sqlite':
      return new SqliteHistoryStore(join(historyDir, 'history.db'));
    case 'jsonl':
      return new JsonlHistoryStore(join(historyDir, 'episodes'));
  }
}

export { applyRecord, foldRecords } from './fold.js';
export { JsonlHistoryStore, summarize } from './jsonl-store.js';
export { SqliteHistoryStore } from './sqlite-store.js';
export type {
  ClosedRecord,
  EpisodeSummary,
  HistoryBackend,
  HistoryRecord,
  HistoryStore,
  ListOptions,
  OpenedRecord,
  TripleRecord,
} from './types.js';
