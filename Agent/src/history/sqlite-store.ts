/**
 * SQLite-backed episode history (better-sqlite3, WAL mode).
 *
 * Each append is one transaction: the ordering checks and the INSERT commit
 * together, so a crash leaves either the whole record or none of it.
 * UPDATE and DELETE are refused by triggers.
 */

import Database from 'better-sqlite3';
import { existsSync, mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { z } from 'zod';
import { HistoryError, errorMessage } from '@mender/shared/Types/errors.js';
import { Logger } from '@mender/shared/Utils/logger.js';
import type { Episode, RunStatus } from '../core/types.js';
import { assertNextIteration, foldRecords } from './fold.js';
import { HistoryRecordSchema } from './records.js';
import { SCHEMA_SQL } from './schema.js';
import type { AttemptRow, EpisodeRow, OutcomeRow, SummaryRow } from './schema.js';
import type { EpisodeSummary, HistoryRecord, HistoryStore, ListOptions } from './types.js';

const logger = new Logger('agent:history');

const SummaryStatusSchema = z.enum(['RUNNING', 'SUCCEEDED', 'FAILED', 'ABORTED']);
const LanguageSchema = z.enum(['python', 'node', 'bash']);
const StopReasonSchema = z.enum(['succeeded', 'max_iterations', 'infra_failures', 'cancelled']);

function parseJsonColumn(text: string, column: string): unknown {
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new HistoryError(`Corrupt ${column} column: ${errorMessage(error)}`);
  }
}

function parseRecord(raw: unknown, episodeId: string): HistoryRecord {
  const result = HistoryRecordSchema.safeParse(raw);
  if (!result.success) {
    throw new HistoryError(`Stored record for episode ${episodeId} is invalid: ${result.error.message}`);
  }
  return result.data;
}

export class SqliteHistoryStore implements HistoryStore {
  private readonly db: Database.Database;
  private readonly appendTx: (episodeId: string, record: HistoryRecord) => void;

  constructor(dbPath: string) {
    if (dbPath !== ':memory:') {
      const dir = dirname(dbPath);
      if (!existsSync(dir)) {
        mkdirSync(dir, { recursive: true });
        logger.info('Created history directory', { path: dir });
      }
    }

    try {
      this.db = new Database(dbPath);
      this.db.pragma('journal_mode = WAL');
      this.db.pragma('busy_timeout = 5000');
      this.db.pragma('foreign_keys = ON');
      this.db.exec(SCHEMA_SQL);
    } catch (error) {
      throw new HistoryError(`Failed to open history database: ${errorMessage(error)}`, { path: dbPath, error });
    }

    this.appendTx = this.db.transaction((episodeId: string, record: HistoryRecord) => {
      this.appendRecord(episodeId, record);
    });

    logger.debug('History database ready', { path: dbPath });
  }

  async append(episodeId: string, record: HistoryRecord): Promise<void> {
    try {
      this.appendTx(episodeId, record);
    } catch (error) {
      if (error instanceof HistoryError) throw error;
      throw new HistoryError(`Failed to append ${record.kind} record: ${errorMessage(error)}`, { episodeId, error });
    }
  }

  private appendRecord(episodeId: string, record: HistoryRecord): void {
    const episode = this.db
      .prepare<[string], Pick<EpisodeRow, 'id'>>('SELECT id FROM episodes WHERE id = ?')
      .get(episodeId);

    if (record.kind === 'opened') {
      if (episode) {
        throw new HistoryError(`Episode ${episodeId} is already opened`);
      }
      this.db
        .prepare<[string, string, string, string, string]>(
          'INSERT INTO episodes (id, statement, language, task_json, started_at) VALUES (?, ?, ?, ?, ?)',
        )
        .run(episodeId, record.task.statement, record.task.language, JSON.stringify(record.task), record.startedAt);
      return;
    }

    if (!episode) {
      throw new HistoryError(`Episode ${episodeId} has not been opened`);
    }
    const outcome = this.db
      .prepare<[string], Pick<OutcomeRow, 'status'>>('SELECT status FROM episode_outcomes WHERE episode_id = ?')
      .get(episodeId);
    if (outcome) {
      throw new HistoryError(`Episode ${episodeId} is closed (${outcome.status})`);
    }

    if (record.kind === 'triple') {
      const { attempt, result, diagnosis } = record.triple;
      const count = this.db
        .prepare<[string], { count: number }>('SELECT COUNT(*) AS count FROM attempts WHERE episode_id = ?')
        .get(episodeId);
      assertNextIteration(episodeId, count?.count ?? 0, attempt.iteration);

      this.db
        .prepare<[string, number, string, string, string | null, string, string | null, string, string]>(
          `INSERT INTO attempts
             (episode_id, iteration, code, rationale, artifact_ref, created_at, result_json, category, feedback)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?, ?)`,
        )
        .run(
          episodeId,
          attempt.iteration,
          attempt.code,
          attempt.rationale,
          attempt.artifactRef ?? null,
          attempt.createdAt,
          result ? JSON.stringify(result) : null,
          diagnosis.category,
          diagnosis.feedback,
        );
      return;
    }

    this.db
      .prepare<[string, string, string, string, string | null]>(
        'INSERT INTO episode_outcomes (episode_id, status, reason, ended_at, final_code) VALUES (?, ?, ?, ?, ?)',
      )
      .run(episodeId, record.status, record.reason, record.endedAt, record.finalCode ?? null);
  }

  async read(episodeId: string): Promise<Episode | null> {
    const row = this.db
      .prepare<[string], EpisodeRow>('SELECT * FROM episodes WHERE id = ?')
      .get(episodeId);
    if (!row) {
      return null;
    }

    const records: HistoryRecord[] = [
      parseRecord(
        { kind: 'opened', task: parseJsonColumn(row.task_json, 'task_json'), startedAt: row.started_at },
        episodeId,
      ),
    ];

    const attempts = this.db
      .prepare<[string], AttemptRow>('SELECT * FROM attempts WHERE episode_id = ? ORDER BY iteration ASC')
      .all(episodeId);
    for (const a of attempts) {
      records.push(
        parseRecord(
          {
            kind: 'triple',
            triple: {
              attempt: {
                iteration: a.iteration,
                code: a.code,
                rationale: a.rationale,
                artifactRef: a.artifact_ref ?? undefined,
                createdAt: a.created_at,
              },
              result: a.result_json === null ? null : parseJsonColumn(a.result_json, 'result_json'),
              diagnosis: { category: a.category, feedback: a.feedback },
            },
          },
          episodeId,
        ),
      );
    }

    const outcome = this.db
      .prepare<[string], OutcomeRow>('SELECT * FROM episode_outcomes WHERE episode_id = ?')
      .get(episodeId);
    if (outcome) {
      records.push(
        parseRecord(
          {
            kind: 'closed',
            status: outcome.status,
            reason: outcome.reason,
            endedAt: outcome.ended_at,
            finalCode: outcome.final_code ?? undefined,
          },
          episodeId,
        ),
      );
    }

    return foldRecords(episodeId, records);
  }

  async list(options: ListOptions = {}): Promise<EpisodeSummary[]> {
    const limit = options.limit ?? 20;
    const params: Array<string | number> = [];
    let sql = `
      SELECT e.id, e.statement, e.language, e.started_at,
             o.status, o.reason, o.ended_at,
             (SELECT COUNT(*) FROM attempts a WHERE a.episode_id = e.id) AS attempts
      FROM episodes e
      LEFT JOIN episode_outcomes o ON o.episode_id = e.id`;

    if (options.status) {
      sql += ` WHERE COALESCE(o.status, 'RUNNING') = ?`;
      params.push(options.status);
    }
    sql += ' ORDER BY e.started_at DESC, e.rowid DESC LIMIT ?';
    params.push(limit);

    const rows = this.db.prepare<Array<string | number>, SummaryRow>(sql).all(...params);
    return rows.map((row) => toSummary(row));
  }

  async close(): Promise<void> {
    if (this.db.open) {
      this.db.close();
      logger.debug('History database closed');
    }
  }
}

function toSummary(row: SummaryRow): EpisodeSummary {
  const status: RunStatus = SummaryStatusSchema.parse(row.status ?? 'RUNNING');
  const summary: EpisodeSummary = {
    id: row.id,
    statement: row.statement,
    language: LanguageSchema.parse(row.language),
    status,
    attempts: row.attempts,
    startedAt: row.started_at,
  };
  if (row.ended_at !== null) summary.endedAt = row.ended_at;
  if (row.reason !== null) summary.stopReason = StopReasonSchema.parse(row.reason);
  return summary;
}
