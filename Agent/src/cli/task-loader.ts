/**
 * Assemble a Task from a JSON task file and/or command-line flags.
 * Flags override fields of the file.
 */

import { readFile } from 'node:fs/promises';
import { ConfigurationError, errorMessage } from '@mender/shared/Types/errors.js';
import { parseTask } from '../core/run-config.js';
import type { Language, Task } from '../core/types.js';

export interface TaskSources {
  task?: string;
  statement?: string;
  statementFile?: string;
  testFile?: string;
  language?: Language;
  expectStdout?: string;
  expectContains?: string;
  expectExit?: number;
}

async function readText(path: string, what: string): Promise<string> {
  try {
    return await readFile(path, 'utf-8');
  } catch (error) {
    throw new ConfigurationError(`Cannot read ${what} ${path}: ${errorMessage(error)}`);
  }
}

async function readTaskFile(path: string): Promise<Record<string, unknown>> {
  const text = await readText(path, 'task file');
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    throw new ConfigurationError(`Task file ${path} is not valid JSON: ${errorMessage(error)}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new ConfigurationError(`Task file ${path} must contain a JSON object`);
  }
  return { ...parsed };
}

export async function loadTask(sources: TaskSources): Promise<Task> {
  const base = sources.task ? await readTaskFile(sources.task) : {};
  const merged: Record<string, unknown> = { ...base };

  if (sources.statementFile) {
    merged.statement = await readText(sources.statementFile, 'statement file');
  }
  if (sources.statement !== undefined) {
    merged.statement = sources.statement;
  }
  if (sources.testFile) {
    merged.testCode = await readText(sources.testFile, 'test file');
  }
  if (sources.language) {
    merged.language = sources.language;
  }

  const predicate: Record<string, unknown> = {};
  if (sources.expectStdout !== undefined) predicate.expectedStdout = sources.expectStdout;
  if (sources.expectContains !== undefined) predicate.stdoutContains = sources.expectContains;
  if (sources.expectExit !== undefined) predicate.expectedExitCode = sources.expectExit;
  if (Object.keys(predicate).length > 0) {
    const filePredicate = typeof merged.predicate === 'object' && merged.predicate !== null ? merged.predicate : {};
    merged.predicate = { ...filePredicate, ...predicate };
  }

  if (merged.statement === undefined) {
    throw new ConfigurationError('A task statement is required (--statement, --statement-file or --task)');
  }

  return parseTask(merged);
}
