import type { Config, Logger } from '@diffwatch/shared';
import type { ScanPipeline } from '@diffwatch/core';

export interface GlobalOptions {
  json?: boolean;
  verbose?: boolean;
  config?: string;
  envFile?: string;
  logFile?: string;
}

export interface CliRuntime {
  pipeline: Pick<ScanPipeline, 'run'>;
  close(): void;
}

/**
 * Seams the commands reach the outside world through; tests replace them.
 */
export interface CliDeps {
  env: NodeJS.ProcessEnv;
  createRuntime(config: Config, logger: Logger): CliRuntime;
}
