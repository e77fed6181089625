import type { Config, Logger } from '@diffwatch/shared';
import { AnalysisDispatcher } from '@diffwatch/adapters';
import { createCheckpointStore } from '@diffwatch/checkpoint';
import type { CheckpointStore } from '@diffwatch/checkpoint';
import { Notifier, createSmtpTransport } from '@diffwatch/notify';
import { RepositoryMirror } from '@diffwatch/repo';
import { ScanPipeline } from './pipeline';

export interface ScanRuntime {
  pipeline: ScanPipeline;
  checkpoints: CheckpointStore;
  /** Releases the database handle and the SMTP pool */
  close(): void;
}

/**
 * Wires the production collaborators for one invocation.
 */
export function createScanRuntime(config: Config, logger: Logger): ScanRuntime {
  const checkpoints = createCheckpointStore();
  checkpoints.init({ dbPath: config.checkpoint.dbPath, lookbackDays: config.checkpoint.lookbackDays });

  const notifier = new Notifier({
    from: config.smtp.from,
    transport: createSmtpTransport(config.smtp),
    logger,
  });

  const pipeline = new ScanPipeline({
    config,
    mirror: new RepositoryMirror({
      mirrorDir: config.repository.mirrorDir,
      timeoutMs: config.git.timeoutMs,
      logger,
    }),
    checkpoints,
    analyzer: new AnalysisDispatcher(config.analysis),
    notifier,
    logger,
  });

  return {
    pipeline,
    checkpoints,
    close: () => {
      checkpoints.close();
      notifier.close();
    },
  };
}
