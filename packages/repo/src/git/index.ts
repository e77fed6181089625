import { spawn } from 'child_process';
import { ProcessError, TimeoutError } from '@diffwatch/shared';

export interface GitServiceOptions {
  repoRoot: string;
  /** Kill any single git invocation after this many milliseconds */
  timeoutMs?: number;
}

export interface GitExecOptions {
  /** Run in this directory instead of the repo root (clone runs beside the mirror) */
  cwd?: string;
  /** Written to stdin, which is then closed */
  input?: string;
}

/**
 * A commit as listed by `git log`.
 */
export interface GitCommitEntry {
  hash: string;
  parents: string[];
  /** Committer date, strict ISO 8601 */
  committedAt: string;
}

const FIELD_SEPARATOR = '\x1f';
const LOG_FORMAT = ['%H', '%P', '%cI'].join('%x1f');

// Strips invalid UTF-8 sequences into U+FFFD instead of throwing.
const lenientDecoder = new TextDecoder('utf-8', { fatal: false });

export function decodeLenient(bytes: Uint8Array): string {
  return lenientDecoder.decode(bytes);
}

/**
 * Formats a date the way git's own `%ci` does, which every git date parser accepts.
 * Sub-second precision is dropped, so `--since` stays inclusive.
 */
export function formatGitDate(date: Date): string {
  const iso = date.toISOString();
  return `${iso.slice(0, 10)} ${iso.slice(11, 19)} +0000`;
}

export class GitService {
  private repoRoot: string;
  private readonly timeoutMs?: number;
  private emptyTree?: string;

  constructor(options: GitServiceOptions) {
    this.repoRoot = options.repoRoot;
    this.timeoutMs = options.timeoutMs;
  }

  get root(): string {
    return this.repoRoot;
  }

  private async execRaw(args: string[], options: GitExecOptions = {}): Promise<Buffer> {
    return new Promise((resolve, reject) => {
      const child = spawn('git', args, {
        cwd: options.cwd ?? this.repoRoot,
        timeout: this.timeoutMs,
        // Paths come from git itself and may contain glob characters.
        env: { ...process.env, GIT_TERMINAL_PROMPT: '0', GIT_LITERAL_PATHSPECS: '1' },
      });
      const stdout: Buffer[] = [];
      let stderr = '';

      child.stdout.on('data', (data: Buffer) => {
        stdout.push(data);
      });

      child.stderr.on('data', (data: Buffer) => {
        stderr += data.toString();
      });

      child.on('close', (code, signal) => {
        if (code === 0) {
          resolve(Buffer.concat(stdout));
        } else if (signal && this.timeoutMs !== undefined) {
          reject(
            new TimeoutError(`Git command timed out after ${this.timeoutMs}ms: git ${args[0]}`, {
              details: { signal },
            }),
          );
        } else {
          reject(
            new ProcessError(`Git command failed: git ${args.join(' ')}\n${stderr.trim()}`, {
              exitCode: code ?? undefined,
            }),
          );
        }
      });

      child.on('error', (err) => {
        reject(new ProcessError(`Failed to start git process: ${err.message}`, { cause: err }));
      });

      child.stdin.end(options.input ?? '');
    });
  }

  private async exec(args: string[], options: GitExecOptions = {}): Promise<string> {
    const output = await this.execRaw(args, options);
    return decodeLenient(output).trim();
  }

  async clone(url: string, branch: string, parentDir: string): Promise<void> {
    await this.exec(['clone', '--branch', branch, '--', url, this.repoRoot], { cwd: parentDir });
  }

  /**
   * Fast-forwards the checked-out branch from `url`.
   * Pulling from a URL rather than the `origin` remote keeps credentials out of
   * the mirror's git config.
   */
  async pull(url: string, branch: string): Promise<void> {
    await this.exec(['pull', '--ff-only', '--no-rebase', url, branch]);
  }

  /**
   * Fast-forwards a branch that is not checked out, e.g. after the configured
   * branch changed between runs.
   */
  async fetchBranch(url: string, branch: string): Promise<void> {
    await this.exec(['fetch', url, `${branch}:${branch}`]);
  }

  async setRemoteUrl(remote: string, url: string): Promise<void> {
    await this.exec(['remote', 'set-url', remote, url]);
  }

  async currentBranch(): Promise<string> {
    return this.exec(['rev-parse', '--abbrev-ref', 'HEAD']);
  }

  async getHeadSha(): Promise<string> {
    return this.exec(['rev-parse', 'HEAD']);
  }

  /**
   * Commits reachable from `branch` whose committer date is at or after `since`,
   * oldest first.
   */
  async listCommitsSince(branch: string, since: Date): Promise<GitCommitEntry[]> {
    const output = await this.exec([
      'log',
      '--reverse',
      `--since=${formatGitDate(since)}`,
      `--format=${LOG_FORMAT}`,
      branch,
      '--',
    ]);
    if (!output) return [];

    return output.split('\n').map((line) => {
      const [hash, parents, committedAt] = line.split(FIELD_SEPARATOR);
      return {
        hash,
        parents: parents ? parents.split(' ') : [],
        committedAt,
      };
    });
  }

  /**
   * Hash of the empty tree in this repository's object format.
   */
  async emptyTreeHash(): Promise<string> {
    if (!this.emptyTree) {
      this.emptyTree = await this.exec(['hash-object', '-t', 'tree', '--stdin'], { input: '' });
    }
    return this.emptyTree;
  }

  /**
   * Paths changed between two tree-ish objects. Renames are reported as a delete
   * plus an add, so both paths appear.
   */
  async changedPaths(from: string, to: string): Promise<string[]> {
    const output = await this.execRaw(['diff', '--name-only', '--no-renames', '-z', from, to]);
    return decodeLenient(output)
      .split('\0')
      .filter((p) => p.length > 0);
  }

  /**
   * Unified diff of a single path between two tree-ish objects.
   */
  async fileDiff(from: string, to: string, filePath: string): Promise<string> {
    const output = await this.execRaw([
      'diff',
      '--no-color',
      '--no-ext-diff',
      '--no-renames',
      from,
      to,
      '--',
      filePath,
    ]);
    return decodeLenient(output);
  }
}
