import { Command, InvalidArgumentError } from 'commander';
import { ConfigLoader } from '@diffwatch/core';
import { createCheckpointStore } from '@diffwatch/checkpoint';
import { HistoryConfigSchema } from '@diffwatch/shared';
import { repositoryNameFromUrl } from '@diffwatch/repo';
import { OutputRenderer } from '../output/renderer';
import type { CliDeps, GlobalOptions } from './types';

interface HistoryOptions {
  limit: number;
  branch?: string;
}

function parseLimit(value: string): number {
  const limit = Number(value);
  if (!Number.isInteger(limit) || limit < 1) {
    throw new InvalidArgumentError('Limit must be a positive integer.');
  }
  return limit;
}

export function registerHistoryCommand(program: Command, deps: CliDeps) {
  program
    .command('history')
    .description('List recorded scans for the configured repository and branch, newest first')
    .option('--limit <n>', 'Number of scans to show', parseLimit, 20)
    .option('--branch <name>', 'Override the configured branch')
    .action(async (options: HistoryOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);

      // Only the repository and the database are needed here.
      const config = ConfigLoader.loadWith(HistoryConfigSchema, {
        configPath: globalOpts.config,
        envFile: globalOpts.envFile,
        env: deps.env,
        flags: options.branch ? { repository: { branch: options.branch } } : {},
      });
      const identity = {
        repository: repositoryNameFromUrl(config.repository.url),
        branch: config.repository.branch,
      };

      const store = createCheckpointStore();
      store.init({ dbPath: config.checkpoint.dbPath });
      try {
        renderer.renderHistory(identity, store.listScans(identity, options.limit));
      } finally {
        store.close();
      }
    });
}
