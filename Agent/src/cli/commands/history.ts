/**
 * show and list commands - read back persisted episodes
 */

import { Option } from 'commander';
import type { Command } from 'commander';
import type { RunStatus } from '../../core/types.js';
import { EXIT_CODES } from '../exit-codes.js';
import { formatEpisode, formatSummaries } from '../format.js';
import { parsePositiveInt } from '../options.js';
import type { CliDeps, CliState } from '../types.js';

const RUN_STATUSES: readonly RunStatus[] = ['RUNNING', 'SUCCEEDED', 'FAILED', 'ABORTED'];

export function registerHistoryCommands(program: Command, deps: CliDeps, state: CliState): void {
  program
    .command('show')
    .description('Show one episode with every attempt')
    .argument('<episodeId>', 'Episode id')
    .option('--json', 'Print the episode as JSON')
    .action(async (episodeId: string, options: { json?: boolean }) => {
      const history = deps.openHistory(deps.loadConfig());
      try {
        const episode = await history.read(episodeId);
        if (!episode) {
          deps.io.stderr(`Episode ${episodeId} not found\n`);
          state.exitCode = EXIT_CODES.FAILED;
          return;
        }
        deps.io.stdout(options.json ? `${JSON.stringify(episode, null, 2)}\n` : `${formatEpisode(episode)}\n`);
      } finally {
        await history.close();
      }
    });

  program
    .command('list')
    .description('List recent episodes')
    .option('--limit <n>', 'Number of episodes', parsePositiveInt, 20)
    .addOption(new Option('--status <status>', 'Only episodes with this status').choices(RUN_STATUSES))
    .action(async (options: { limit: number; status?: RunStatus }) => {
      const history = deps.openHistory(deps.loadConfig());
      try {
        const summaries = await history.list({ limit: options.limit, status: options.status });
        deps.io.stdout(`${formatSummaries(summaries)}\n`);
      } finally {
        await history.close();
      }
    });
}
