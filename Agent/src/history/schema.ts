// SQL schema for the episode history database

export const SCHEMA_SQL = `
-- One row per episode, written when the run starts
CREATE TABLE IF NOT EXISTS episodes (
    id TEXT PRIMARY KEY,
    statement TEXT NOT NULL,
    language TEXT NOT NULL,
    task_json TEXT NOT NULL,
    started_at TEXT NOT NULL
);

CREATE INDEX IF NOT EXISTS idx_episodes_started ON episodes(started_at);

-- One row per attempt; result_json is NULL when generation failed
CREATE TABLE IF NOT EXISTS attempts (
    episode_id TEXT NOT NULL REFERENCES episodes(id),
    iteration INTEGER NOT NULL,
    code TEXT NOT NULL,
    rationale TEXT NOT NULL,
    artifact_ref TEXT,
    created_at TEXT NOT NULL,
    result_json TEXT,
    category TEXT NOT NULL,
    feedback TEXT NOT NULL,
    PRIMARY KEY (episode_id, iteration)
);

-- Terminal status, written once when the loop exits
CREATE TABLE IF NOT EXISTS episode_outcomes (
    episode_id TEXT PRIMARY KEY REFERENCES episodes(id),
    status TEXT NOT NULL CHECK (status IN ('SUCCEEDED', 'FAILED', 'ABORTED')),
    reason TEXT NOT NULL,
    ended_at TEXT NOT NULL,
    final_code TEXT
);

-- History is append-only
CREATE TRIGGER IF NOT EXISTS episodes_no_update BEFORE UPDATE ON episodes
BEGIN SELECT RAISE(ABORT, 'episodes are append-only'); END;
CREATE TRIGGER IF NOT EXISTS episodes_no_delete BEFORE DELETE ON episodes
BEGIN SELECT RAISE(ABORT, 'episodes are append-only'); END;
CREATE TRIGGER IF NOT EXISTS attempts_no_update BEFORE UPDATE ON attempts
BEGIN SELECT RAISE(ABORT, 'attempts are append-only'); END;
CREATE TRIGGER IF NOT EXISTS attempts_no_delete BEFORE DELETE ON attempts
BEGIN SELECT RAISE(ABORT, 'attempts are append-only'); END;
CREATE TRIGGER IF NOT EXISTS outcomes_no_update BEFORE UPDATE ON episode_outcomes
BEGIN SELECT RAISE(ABORT, 'episode outcomes are append-only'); END;
CREATE TRIGGER IF NOT EXISTS outcomes_no_delete BEFORE DELETE ON episode_outcomes
BEGIN SELECT RAISE(ABORT, 'episode outcomes are append-only'); END;
`;

export interface EpisodeRow {
  id: string;
  statement: string;
  language: string;
  task_json: string;
  started_at: string;
}

export interface AttemptRow {
  episode_id: string;
  iteration: number;
  code: string;
  rationale: string;
  artifact_ref: string | null;
  created_at: string;
  result_json: string | null;
  category: string;
  feedback: string;
}

export interface OutcomeRow {
  episode_id: string;
  status: string;
  reason: string;
  ended_at: string;
  final_code: string | null;
}

export interface SummaryRow {
  id: string;
  statement: string;
  language: string;
  started_at: string;
  status: string | null;
  reason: string | null;
  ended_at: string | null;
  attempts: number;
}
