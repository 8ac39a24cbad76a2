/**
 * JSONL execution log with daily rotation.
 */

import { join } from 'node:path';
import { JsonlLogger } from '@mender/shared/Logging/jsonl.js';
import { Logger } from '@mender/shared/Utils/logger.js';
import type { SandboxConfig } from '../config.js';
import type { ExecutionLogEntry } from './types.js';

const logger = new Logger('sandbox:log');

const writers = new Map<string, JsonlLogger<ExecutionLogEntry>>();

export function executionLogPath(logDir: string, date: Date = new Date()): string {
  const day = date.toISOString().slice(0, 10); // YYYY-MM-DD
  return join(logDir, `executions-${day}.jsonl`);
}

/**
 * Append an execution entry to today's log file. Write failures are logged,
 * never thrown: the audit log must not change the outcome of a run.
 */
export async function logExecution(config: SandboxConfig, entry: ExecutionLogEntry): Promise<void> {
  if (!config.logExecutions) return;

  const path = executionLogPath(config.logDir);
  let writer = writers.get(path);
  if (!writer) {
    writer = new JsonlLogger<ExecutionLogEntry>(path);
    writers.set(path, writer);
  }

  try {
    await writer.write(entry);
  } catch (err) {
    logger.error('Failed to write execution log', err);
  }
}
