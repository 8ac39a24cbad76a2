/**
 * Mender CLI
 *
 * Usage:
 *   mender run --statement "..." [--test-file tests.py] [--expect-stdout 42] [-n 5]
 *   mender show <episodeId> [--json]
 *   mender list [--limit 20] [--status FAILED]
 *
 * Exit codes of `run`: 0 succeeded, 1 failed, 2 aborted, 3 configuration
 * error, 4 unexpected error.
 */

import { Command, CommanderError } from 'commander';
import { ConfigurationError, errorMessage } from '@mender/shared/Types/errors.js';
import { Logger } from '@mender/shared/Utils/logger.js';
import { loadConfig } from '../config.js';
import { createOrchestrator, openHistory } from '../runtime.js';
import { registerHistoryCommands } from './commands/history.js';
import { registerRunCommand } from './commands/run.js';
import { EXIT_CODES } from './exit-codes.js';
import type { CliDeps, CliState } from './types.js';

const logger = new Logger('agent:cli');

export function defaultDeps(): CliDeps {
  return {
    io: {
      stdout: (text) => process.stdout.write(text),
      stderr: (text) => process.stderr.write(text),
    },
    loadConfig,
    openHistory,
    createOrchestrator,
  };
}

export function buildProgram(deps: CliDeps, state: CliState): Command {
  const program = new Command();

  program
    .name('mender')
    .description('Self-correcting code generation: write, run, diagnose, fix')
    .version('0.1.0')
    .exitOverride()
    .configureOutput({
      writeOut: (text) => deps.io.stdout(text),
      writeErr: (text) => deps.io.stderr(text),
    });

  registerRunCommand(program, deps, state);
  registerHistoryCommands(program, deps, state);

  return program;
}

/**
 * Parse argv (including the node and script entries) and run the command.
 * Resolves to the process exit code; never rejects.
 */
export async function main(argv: string[], deps: CliDeps = defaultDeps()): Promise<number> {
  const state: CliState = { exitCode: EXIT_CODES.SUCCEEDED };
  const program = buildProgram(deps, state);

  try {
    await program.parseAsync(argv);
    return state.exitCode;
  } catch (error) {
    if (error instanceof CommanderError) {
      // Commander has already printed usage or the parse error
      return error.exitCode === 0 ? EXIT_CODES.SUCCEEDED : EXIT_CODES.CONFIGURATION_ERROR;
    }
    if (error instanceof ConfigurationError) {
      deps.io.stderr(`Configuration error: ${error.message}\n`);
      return EXIT_CODES.CONFIGURATION_ERROR;
    }
    logger.error('Unexpected error', error);
    deps.io.stderr(`Error: ${errorMessage(error)}\n`);
    return EXIT_CODES.UNEXPECTED_ERROR;
  }
}
