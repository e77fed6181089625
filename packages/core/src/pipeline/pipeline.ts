import { AppError, toError } from '@diffwatch/shared';
import type { Config, Logger, PipelineEventInput, PipelineState } from '@diffwatch/shared';
import type { AnalysisAdapter } from '@diffwatch/adapters';
import type { CheckpointStore, ScanIdentity } from '@diffwatch/checkpoint';
import type { Notifier } from '@diffwatch/notify';
import { ChangeHarvester, GitService, ScopedCredential, repositoryNameFromUrl } from '@diffwatch/repo';
import type { ChangeDigest, RepositoryMirror } from '@diffwatch/repo';
import { PromptBuilder } from '../prompt/builder';
import type { BuiltPrompt } from '../prompt/builder';
import { PipelineStateMachine } from './state';

const EVENT_SCHEMA_VERSION = 1;

export interface Harvester {
  harvest(since: Date): Promise<ChangeDigest>;
}

export interface ScanPipelineOptions {
  config: Config;
  mirror: Pick<RepositoryMirror, 'ensureMirror'>;
  checkpoints: CheckpointStore;
  analyzer: AnalysisAdapter;
  notifier: Pick<Notifier, 'notify'>;
  logger: Logger;
  promptBuilder?: PromptBuilder;
  /** Builds the harvester for a mirror path; defaults to git */
  createHarvester?: (mirrorPath: string) => Harvester;
  now?: () => Date;
}

export interface RunOptions {
  runId?: string;
  /** Stop after building the prompt; dispatch, send and record nothing */
  dryRun?: boolean;
}

export interface ScanResult {
  runId: string;
  outcome: 'notified' | 'no-changes' | 'dry-run';
  repository: string;
  branch: string;
  /** Lower bound of the scanned range */
  since: Date;
  /** The recorded checkpoint; absent in dry runs */
  checkpoint?: Date;
  commitCount: number;
  fileCount: number;
  /** The composed prompt, in dry runs */
  prompt?: string;
  durationMs: number;
}

export function subjectFor(repository: string, branch: string): string {
  return `${repository} (branch: ${branch}) code update`;
}

/**
 * One incremental scan: mirror, read the checkpoint, harvest, analyze, notify and
 * advance the checkpoint. The checkpoint is only written once everything before
 * it succeeded.
 */
export class ScanPipeline {
  private readonly config: Config;
  private readonly mirror: Pick<RepositoryMirror, 'ensureMirror'>;
  private readonly checkpoints: CheckpointStore;
  private readonly analyzer: AnalysisAdapter;
  private readonly notifier: Pick<Notifier, 'notify'>;
  private readonly logger: Logger;
  private readonly promptBuilder: PromptBuilder;
  private readonly createHarvester: (mirrorPath: string) => Harvester;
  private readonly now: () => Date;

  constructor(options: ScanPipelineOptions) {
    this.config = options.config;
    this.mirror = options.mirror;
    this.checkpoints = options.checkpoints;
    this.analyzer = options.analyzer;
    this.notifier = options.notifier;
    this.logger = options.logger;
    this.promptBuilder =
      options.promptBuilder ?? new PromptBuilder({ projectDescription: options.config.project.description });
    this.createHarvester =
      options.createHarvester ??
      ((mirrorPath) =>
        new ChangeHarvester(
          new GitService({ repoRoot: mirrorPath, timeoutMs: options.config.git.timeoutMs }),
          options.config.repository.branch,
        ));
    this.now = options.now ?? (() => new Date());
  }

  get identity(): ScanIdentity {
    return {
      repository: repositoryNameFromUrl(this.config.repository.url),
      branch: this.config.repository.branch,
    };
  }

  async run(options: RunOptions = {}): Promise<ScanResult> {
    const runId = options.runId ?? Date.now().toString();
    const dryRun = options.dryRun ?? false;
    const startedAt = Date.now();
    const machine = new PipelineStateMachine(dryRun);
    const { url, token } = this.config.repository;

    const emit = async (event: PipelineEventInput): Promise<void> => {
      await this.logger.log({
        ...event,
        schemaVersion: EVENT_SCHEMA_VERSION,
        timestamp: this.now().toISOString(),
        runId,
      });
    };

    const enter = async (to: PipelineState): Promise<void> => {
      const from = machine.transition(to);
      await emit({ type: 'StateChanged', payload: { from, to } });
    };

    const finish = async (result: Omit<ScanResult, 'runId' | 'durationMs'>): Promise<ScanResult> => {
      await enter('DONE');
      const durationMs = Date.now() - startedAt;
      await emit({ type: 'RunFinished', payload: { outcome: result.outcome, durationMs } });
      return { ...result, runId, durationMs };
    };

    try {
      await emit({
        type: 'RunStarted',
        payload: { url, branch: this.config.repository.branch, dryRun },
      });

      await enter('MIRRORING');
      const identity = this.identity;
      const credential = token ? new ScopedCredential(token) : undefined;
      const mirror = await this.mirror.ensureMirror(url, identity.branch, credential);
      if (mirror.updateError !== undefined) {
        await emit({ type: 'MirrorUpdateFailed', payload: { error: mirror.updateError } });
      }
      await emit({ type: 'MirrorReady', payload: { fresh: mirror.fresh, path: mirror.path } });

      await enter('CHECKPOINT_READ');
      const since = this.checkpoints.getLastScan(identity, mirror.fresh);
      await emit({ type: 'CheckpointRead', payload: { since: since.toISOString(), fresh: mirror.fresh } });

      await enter('HARVESTING');
      // Commits landing while this run is in flight are picked up next time.
      const harvestStartedAt = this.now();
      const digest = await this.createHarvester(mirror.path).harvest(since);
      const commitCount = digest.kind === 'changes' ? digest.commitCount : 0;
      const fileCount = digest.kind === 'changes' ? digest.fileCount : 0;
      await emit({
        type: 'ChangesHarvested',
        payload: { commitCount, fileCount, digestChars: digest.text.length },
      });

      const prompt: BuiltPrompt = this.promptBuilder.build(digest);
      const base = { repository: identity.repository, branch: identity.branch, since, commitCount, fileCount };
      const checkpoint = harvestStartedAt < since ? since : harvestStartedAt;

      if (prompt.kind === 'noop') {
        await enter('NO_CHANGE');
        await this.logger.info(`No changes on ${identity.branch} since ${since.toISOString()}`);
        if (dryRun) {
          return await finish({ ...base, outcome: 'no-changes' });
        }
        await this.advance(identity, checkpoint, enter, emit);
        return await finish({ ...base, outcome: 'no-changes', checkpoint });
      }

      await enter('PROMPTING');
      await this.logger.debug(`PROMPT: ${prompt.text}`);
      await emit({ type: 'PromptBuilt', payload: { promptChars: prompt.text.length } });
      if (dryRun) {
        return await finish({ ...base, outcome: 'dry-run', prompt: prompt.text });
      }

      await enter('DISPATCHING');
      const dispatchedAt = Date.now();
      const verdict = await this.analyzer.analyze(prompt.text, { runId, logger: this.logger });
      await emit({
        type: 'AnalysisCompleted',
        payload: {
          model: this.analyzer.model(),
          resultChars: verdict.length,
          durationMs: Date.now() - dispatchedAt,
        },
      });

      await enter('NOTIFYING');
      const delivery = await this.notifier.notify(
        this.config.notification.to,
        subjectFor(identity.repository, identity.branch),
        verdict,
      );
      await emit({ type: 'NotificationSent', payload: delivery });

      await this.advance(identity, checkpoint, enter, emit);
      return await finish({ ...base, outcome: 'notified', checkpoint });
    } catch (error) {
      const state = machine.state;
      if (state !== null && state !== 'DONE' && state !== 'FAILED') {
        machine.transition('FAILED');
        const err = toError(error);
        await emit({ type: 'StateChanged', payload: { from: state, to: 'FAILED' } });
        await emit({
          type: 'RunFailed',
          payload: {
            state,
            code: err instanceof AppError ? err.code : 'UnknownError',
            error: err.message,
          },
        });
      }
      throw error;
    }
  }

  private async advance(
    identity: ScanIdentity,
    checkpoint: Date,
    enter: (to: PipelineState) => Promise<void>,
    emit: (event: PipelineEventInput) => Promise<void>,
  ): Promise<void> {
    await enter('CHECKPOINT_ADVANCE');
    this.checkpoints.recordScan(identity, checkpoint);
    await emit({ type: 'CheckpointAdvanced', payload: { checkpoint: checkpoint.toISOString() } });
  }
}
