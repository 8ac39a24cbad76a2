/**
 * Execution audit log entry (one line per sandbox run, daily rotation).
 */

import type { BaseAuditEntry } from '@mender/shared/Logging/jsonl.js';
import type { Language } from '@mender/shared/Types/execution.js';

export interface ExecutionLogEntry extends BaseAuditEntry {
  type: 'execution';
  execution_id: string;
  language: Language;
  code: string;
  stdout: string;
  stderr: string;
  exit_status: number | null;
  timed_out: boolean;
  infra_error: string | null;
  duration_ms: number;
  timeout_ms: number;
  sandbox_mode: 'subprocess';
  working_dir: string;
}
