import { HarvestError, TimeoutError } from '@diffwatch/shared';
import type { GitCommitEntry } from '../git';

/** Digest text when nothing changed since the checkpoint. */
export const NO_CHANGES = 'No changes.';

export interface FileDiff {
  path: string;
  /** Unified diff text */
  diff: string;
}

export interface CommitRecord {
  hash: string;
  parents: string[];
  /** Committer timestamp, ISO 8601 */
  committedAt: string;
  files: FileDiff[];
}

export type ChangeDigest =
  | { kind: 'empty'; text: typeof NO_CHANGES }
  | {
      kind: 'changes';
      text: string;
      commits: CommitRecord[];
      commitCount: number;
      fileCount: number;
    };

export const EMPTY_DIGEST: ChangeDigest = { kind: 'empty', text: NO_CHANGES };

/**
 * The read-only slice of git the harvester needs. `GitService` implements it.
 */
export interface CommitLog {
  listCommitsSince(branch: string, since: Date): Promise<GitCommitEntry[]>;
  emptyTreeHash(): Promise<string>;
  changedPaths(from: string, to: string): Promise<string[]>;
  fileDiff(from: string, to: string, filePath: string): Promise<string>;
}

export function formatCommit(record: CommitRecord): string {
  const lines = [`Commit ${record.hash} - ${record.committedAt}`];
  for (const file of record.files) {
    lines.push(`File: ${file.path}`);
    lines.push(file.diff.endsWith('\n') ? file.diff.slice(0, -1) : file.diff);
  }
  return lines.join('\n');
}

export function formatDigest(commits: CommitRecord[]): string {
  return commits.map(formatCommit).join('\n\n');
}

/**
 * Collects every commit on a branch since a checkpoint together with the
 * per-file diff against its first parent.
 */
export class ChangeHarvester {
  constructor(
    private readonly log: CommitLog,
    private readonly branch: string,
  ) {}

  async harvest(since: Date): Promise<ChangeDigest> {
    try {
      const entries = await this.log.listCommitsSince(this.branch, since);
      if (entries.length === 0) {
        return EMPTY_DIGEST;
      }

      const commits: CommitRecord[] = [];
      for (const entry of entries) {
        commits.push(await this.collect(entry));
      }

      return {
        kind: 'changes',
        text: formatDigest(commits),
        commits,
        commitCount: commits.length,
        fileCount: commits.reduce((sum, commit) => sum + commit.files.length, 0),
      };
    } catch (error) {
      if (error instanceof HarvestError || error instanceof TimeoutError) throw error;
      throw new HarvestError(`Failed to harvest changes on ${this.branch} since ${since.toISOString()}`, {
        cause: error,
      });
    }
  }

  private async collect(entry: GitCommitEntry): Promise<CommitRecord> {
    const base = entry.parents[0] ?? (await this.log.emptyTreeHash());
    const paths = await this.log.changedPaths(base, entry.hash);

    const files: FileDiff[] = [];
    for (const filePath of paths) {
      files.push({ path: filePath, diff: await this.log.fileDiff(base, entry.hash, filePath) });
    }

    return { ...entry, files };
  }
}
