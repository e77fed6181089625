import { Command } from 'commander';
import { ConfigLoader } from '@diffwatch/core';
import type { ConfigFlags } from '@diffwatch/core';
import { repositoryNameFromUrl } from '@diffwatch/repo';
import { OutputRenderer } from '../output/renderer';
import { createLogger } from './logger';
import type { CliDeps, GlobalOptions } from './types';

interface ScanOptions {
  dryRun?: boolean;
  branch?: string;
}

export function registerScanCommand(program: Command, deps: CliDeps) {
  program
    .command('scan')
    .description('Scan the repository for commits since the last run and email the analysis')
    .option('--dry-run', 'Build the prompt and print it; dispatch, send and record nothing')
    .option('--branch <name>', 'Override the configured branch')
    .action(async (options: ScanOptions) => {
      const globalOpts = program.opts<GlobalOptions>();
      const renderer = new OutputRenderer(!!globalOpts.json);

      const flags: ConfigFlags = options.branch ? { repository: { branch: options.branch } } : {};
      const config = ConfigLoader.load({
        configPath: globalOpts.config,
        envFile: globalOpts.envFile,
        env: deps.env,
        flags,
      });

      const logger = createLogger(globalOpts, {
        repo: repositoryNameFromUrl(config.repository.url),
        branch: config.repository.branch,
      });
      if (globalOpts.verbose) renderer.log(`Scanning ${config.repository.url} (${config.repository.branch})`);

      const runtime = deps.createRuntime(config, logger);
      try {
        const result = await runtime.pipeline.run({ dryRun: options.dryRun });
        renderer.renderScan(result);
      } finally {
        runtime.close();
      }
    });
}
