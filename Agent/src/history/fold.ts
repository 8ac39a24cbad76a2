/**
 * Rebuild an Episode from its records.
 *
 * applyRecord() is the single place where record ordering is enforced. The
 * JSONL store folds every line through it on read; the SQLite store runs
 * the same checks against the rows it already has before inserting.
 */

import { HistoryError } from '@mender/shared/Types/errors.js';
import type { Episode } from '../core/types.js';
import type { HistoryRecord } from './types.js';

export function applyRecord(episodeId: string, episode: Episode | null, record: HistoryRecord): Episode {
  if (record.kind === 'opened') {
    if (episode) {
      throw new HistoryError(`Episode ${episodeId} is already opened`);
    }
    return { id: episodeId, task: record.task, triples: [], status: 'RUNNING', startedAt: record.startedAt };
  }

  if (!episode) {
    throw new HistoryError(`Episode ${episodeId} has not been opened`);
  }
  if (episode.status !== 'RUNNING') {
    throw new HistoryError(`Episode ${episodeId} is closed (${episode.status})`);
  }

  if (record.kind === 'triple') {
    assertNextIteration(episodeId, episode.triples.length, record.triple.attempt.iteration);
    return { ...episode, triples: [...episode.triples, record.triple] };
  }

  return {
    ...episode,
    status: record.status,
    stopReason: record.reason,
    endedAt: record.endedAt,
    ...(record.finalCode !== undefined ? { finalCode: record.finalCode } : {}),
  };
}

export function assertNextIteration(episodeId: string, expected: number, actual: number): void {
  if (actual !== expected) {
    throw new HistoryError(`Episode ${episodeId} expects iteration ${expected}, got ${actual}`, {
      expected,
      actual,
    });
  }
}

export function foldRecords(episodeId: string, records: Iterable<HistoryRecord>): Episode | null {
  let episode: Episode | null = null;
  for (const record of records) {
    episode = applyRecord(episodeId, episode, record);
  }
  return episode;
}
