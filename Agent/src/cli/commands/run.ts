/**
 * run command - solve one task and exit with a code for its final status
 */

import { Option } from 'commander';
import type { Command } from 'commander';
import { LANGUAGES } from '@mender/shared/Types/execution.js';
import { validateProviderConfig } from '../../config.js';
import type { Config } from '../../config.js';
import type { RunEvent } from '../../core/events.js';
import { parseRunConfig } from '../../core/run-config.js';
import type { Language, ResourceLimits, RunConfig } from '../../core/types.js';
import { saveSolution } from '../../output/solution-writer.js';
import { exitCodeFor } from '../exit-codes.js';
import { formatEvent, formatOutcome } from '../format.js';
import { parseExitCode, parsePositiveInt, parsePositiveNumber } from '../options.js';
import { loadTask } from '../task-loader.js';
import type { CliDeps, CliState } from '../types.js';

interface RunCommandOptions {
  task?: string;
  statement?: string;
  statementFile?: string;
  testFile?: string;
  language?: Language;
  expectStdout?: string;
  expectContains?: string;
  expectExit?: number;
  maxIterations?: number;
  timeout?: number;
  maxInfraFailures?: number;
  memory?: number;
  cpu?: number;
  episodeId?: string;
  json?: boolean;
  save: boolean;
}

function resolveRunConfig(config: Config, options: RunCommandOptions): RunConfig {
  const limits: ResourceLimits = {};
  const memoryMb = options.memory ?? config.memoryLimitMb;
  const cpuSeconds = options.cpu ?? config.cpuLimitSeconds;
  if (memoryMb !== undefined) limits.memoryMb = memoryMb;
  if (cpuSeconds !== undefined) limits.cpuSeconds = cpuSeconds;

  return parseRunConfig({
    maxIterations: options.maxIterations ?? config.maxIterations,
    perAttemptTimeoutMs: options.timeout ?? config.perAttemptTimeoutMs,
    maxConsecutiveInfraFailures: options.maxInfraFailures ?? config.maxConsecutiveInfraFailures,
    ...(Object.keys(limits).length > 0 ? { resourceLimits: limits } : {}),
  });
}

export function registerRunCommand(program: Command, deps: CliDeps, state: CliState): void {
  program
    .command('run')
    .description('Generate, run and fix code until the task passes or a bound is reached')
    .option('--task <file>', 'JSON task file ({ statement, language, testCode, predicate })')
    .option('-s, --statement <text>', 'Problem statement')
    .option('--statement-file <file>', 'Read the problem statement from a file')
    .option('--test-file <file>', 'Test harness appended to every attempt')
    .addOption(new Option('-l, --language <language>', 'Language of the solution').choices(LANGUAGES))
    .option('--expect-stdout <text>', 'Required stdout (trailing whitespace ignored)')
    .option('--expect-contains <text>', 'Text stdout must contain')
    .option('--expect-exit <code>', 'Required exit status', parseExitCode)
    .option('-n, --max-iterations <n>', 'Maximum attempts', parsePositiveInt)
    .option('-t, --timeout <ms>', 'Time limit per attempt in milliseconds', parsePositiveInt)
    .option('--max-infra-failures <n>', 'Consecutive generation/sandbox failures before aborting', parsePositiveInt)
    .option('--memory <mb>', 'Memory limit per attempt in MB', parsePositiveInt)
    .option('--cpu <seconds>', 'CPU time limit per attempt in seconds', parsePositiveNumber)
    .option('--episode-id <id>', 'Episode id (default: generated)')
    .option('--json', 'Print the full episode as JSON')
    .option('--no-save', 'Do not write the solution file')
    .action(async (options: RunCommandOptions) => {
      const config = deps.loadConfig();
      validateProviderConfig(config);
      const task = await loadTask(options);
      const runConfig = resolveRunConfig(config, options);

      const controller = new AbortController();
      const onSigint = (): void => {
        deps.io.stderr('Cancelling: the running attempt is stopped and the episode ends\n');
        controller.abort();
      };
      if (!deps.signal) {
        process.once('SIGINT', onSigint);
      }

      const history = deps.openHistory(config);
      try {
        const orchestrator = deps.createOrchestrator(config, history, task.language);
        const episode = await orchestrator.run(task, runConfig, {
          signal: deps.signal ?? controller.signal,
          episodeId: options.episodeId,
          onEvent: (event: RunEvent) => {
            const line = formatEvent(event);
            if (line) deps.io.stderr(`${line}\n`);
          },
        });

        const solution = options.save ? await saveSolution(config.solutionsDir, episode) : null;

        if (options.json) {
          deps.io.stdout(`${JSON.stringify(episode, null, 2)}\n`);
        } else {
          deps.io.stdout(`${formatOutcome(episode, solution)}\n`);
        }

        state.exitCode = exitCodeFor(episode.status);
      } finally {
        process.off('SIGINT', onSigint);
        await history.close();
      }
    });
}
