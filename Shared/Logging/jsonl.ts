/**
 * Generic JSONL (JSON Lines) audit logger
 */

import { appendFile, mkdir } from 'node:fs/promises';
import { existsSync } from 'node:fs';
import { dirname } from 'node:path';

/**
 * All audit entries carry an ISO timestamp.
 */
export interface BaseAuditEntry {
  timestamp: string;
  [key: string]: unknown;
}

/**
 * Append-only JSONL audit trail.
 *
 * @example
 * ```typescript
 * interface ExecutionAuditEntry extends BaseAuditEntry {
 *   execution_id: string;
 *   exit_status: number | null;
 * }
 *
 * const audit = new JsonlLogger<ExecutionAuditEntry>('/tmp/executions.jsonl');
 * await audit.write({ timestamp: new Date().toISOString(), execution_id: 'exec_1', exit_status: 0 });
 * ```
 */
export class JsonlLogger<T extends BaseAuditEntry> {
  private logPath: string;
  private initialized: boolean = false;

  constructor(logPath: string) {
    this.logPath = logPath;
  }

  private async ensureDir(): Promise<void> {
    if (this.initialized) return;

    const dir = dirname(this.logPath);
    if (!existsSync(dir)) {
      await mkdir(dir, { recursive: true });
    }
    this.initialized = true;
  }

  /**
   * Write an entry as a single line. One appendFile call per entry, so
   * concurrent writers never interleave within a line.
   */
  async write(entry: T): Promise<void> {
    await this.ensureDir();
    const line = JSON.stringify(entry) + '\n';
    await appendFile(this.logPath, line, 'utf-8');
  }
}

/**
 * Parse JSONL content, skipping blank and unparseable lines.
 */
export function parseJsonLines<T>(content: string): T[] {
  const entries: T[] = [];
  for (const line of content.split('\n')) {
    if (!line.trim()) continue;
    try {
      entries.push(JSON.parse(line));
    } catch {
      // torn or foreign line
    }
  }
  return entries;
}
