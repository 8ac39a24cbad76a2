/**
 * JSONL-backed episode history: one `<episodeId>.jsonl` file per episode,
 * one record per line.
 *
 * A record is a single appendFile call. A torn final line (crash mid-write)
 * fails to parse and is skipped on read, so the episode ends at the last
 * complete record.
 */

import { appendFile, mkdir, readFile, readdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { join } from 'node:path';
import { HistoryError, errorMessage } from '@mender/shared/Types/errors.js';
import { parseJsonLines } from '@mender/shared/Logging/jsonl.js';
import { Logger } from '@mender/shared/Utils/logger.js';
import type { Episode } from '../core/types.js';
import { applyRecord, foldRecords } from './fold.js';
import { HistoryRecordSchema } from './records.js';
import type { EpisodeSummary, HistoryRecord, HistoryStore, ListOptions } from './types.js';

const logger = new Logger('agent:history');

const EPISODE_ID = /^[\w-]+$/;

export class JsonlHistoryStore implements HistoryStore {
  private initialized = false;

  constructor(private readonly dir: string) {}

  private pathFor(episodeId: string): string {
    if (!EPISODE_ID.test(episodeId)) {
      throw new HistoryError(`Invalid episode id: ${episodeId}`);
    }
    return join(this.dir, `${episodeId}.jsonl`);
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;
    if (!existsSync(this.dir)) {
      await mkdir(this.dir, { recursive: true });
    }
    this.initialized = true;
  }

  private async load(episodeId: string): Promise<{ content: string; records: HistoryRecord[] } | null> {
    const path = this.pathFor(episodeId);
    if (!existsSync(path)) {
      return null;
    }
    const content = await readFile(path, 'utf-8');
    const records: HistoryRecord[] = [];
    for (const raw of parseJsonLines<unknown>(content)) {
      const parsed = HistoryRecordSchema.safeParse(raw);
      if (parsed.success) {
        records.push(parsed.data);
      } else {
        logger.warn('Skipping invalid history line', { episodeId, error: parsed.error.message });
      }
    }
    return { content, records };
  }

  async append(episodeId: string, record: HistoryRecord): Promise<void> {
    const path = this.pathFor(episodeId);
    const existing = await this.load(episodeId);

    // Throws on ordering violations before anything is written
    applyRecord(episodeId, existing ? foldRecords(episodeId, existing.records) : null, record);

    // Start on a fresh line if the previous write was torn
    const prefix = existing && existing.content !== '' && !existing.content.endsWith('\n') ? '\n' : '';
    try {
      await this.ensureDir();
      await appendFile(path, `${prefix}${JSON.stringify(record)}\n`, 'utf-8');
    } catch (error) {
      throw new HistoryError(`Failed to append ${record.kind} record: ${errorMessage(error)}`, { episodeId, error });
    }
  }

  async read(episodeId: string): Promise<Episode | null> {
    const existing = await this.load(episodeId);
    return existing ? foldRecords(episodeId, existing.records) : null;
  }

  async list(options: ListOptions = {}): Promise<EpisodeSummary[]> {
    if (!existsSync(this.dir)) {
      return [];
    }

    const files = (await readdir(this.dir)).filter((f) => f.endsWith('.jsonl'));
    const summaries: EpisodeSummary[] = [];
    for (const file of files) {
      const episode = await this.read(file.slice(0, -'.jsonl'.length));
      if (!episode) continue;
      if (options.status && episode.status !== options.status) continue;
      summaries.push(summarize(episode));
    }

    summaries.sort((a, b) => b.startedAt.localeCompare(a.startedAt));
    return summaries.slice(0, options.limit ?? 20);
  }

  async close(): Promise<void> {
    // Nothing held open between appends
  }
}

export function summarize(episode: Episode): EpisodeSummary {
  const summary: EpisodeSummary = {
    id: episode.id,
    statement: episode.task.statement,
    language: episode.task.language,
    status: episode.status,
    attempts: episode.triples.length,
    startedAt: episode.startedAt,
  };
  if (episode.endedAt) summary.endedAt = episode.endedAt;
  if (episode.stopReason) summary.stopReason = episode.stopReason;
  return summary;
}
