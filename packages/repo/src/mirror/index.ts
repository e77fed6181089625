import * as fs from 'fs/promises';
import * as path from 'path';
import { MirrorError, ProcessError, TimeoutError } from '@diffwatch/shared';
import type { Logger } from '@diffwatch/shared';
import { GitService } from '../git';
import { ScopedCredential } from './credential';

export { ScopedCredential };

export interface RepositoryMirrorOptions {
  /** Directory holding one clone per repository */
  mirrorDir: string;
  /** Per git invocation */
  timeoutMs?: number;
  logger?: Logger;
}

export interface MirrorResult {
  /** True iff this call cloned the repository */
  fresh: boolean;
  /** Absolute path of the working copy */
  path: string;
  /** Redacted reason the existing mirror could not be updated */
  updateError?: string;
}

/**
 * Derives the repository name from its URL: the last path segment, without a
 * `.git` suffix, URL-decoded.
 *
 * @example
 * repositoryNameFromUrl('https://git.example.com/org/my%20repo.git') // 'my repo'
 */
export function repositoryNameFromUrl(url: string): string {
  let pathname: string;
  try {
    pathname = new URL(url).pathname;
  } catch {
    // scp-like syntax, e.g. git@host:org/repo.git
    pathname = url.slice(url.lastIndexOf(':') + 1);
  }
  const segment = pathname.replace(/\/+$/, '').split('/').pop() ?? '';
  const name = decodeURIComponent(segment.replace(/\.git$/, ''));
  if (!name) {
    throw new MirrorError(`Cannot derive a repository name from ${url}`);
  }
  return name;
}

function stripUserInfo(url: string): string {
  try {
    const parsed = new URL(url);
    parsed.username = '';
    parsed.password = '';
    return parsed.toString();
  } catch {
    return url;
  }
}

async function exists(target: string): Promise<boolean> {
  try {
    await fs.access(target);
    return true;
  } catch {
    return false;
  }
}

/**
 * Keeps a local clone of one remote repository per name under `mirrorDir`.
 */
export class RepositoryMirror {
  private readonly mirrorDir: string;
  private readonly timeoutMs?: number;
  private readonly logger?: Logger;

  constructor(options: RepositoryMirrorOptions) {
    this.mirrorDir = path.resolve(options.mirrorDir);
    this.timeoutMs = options.timeoutMs;
    this.logger = options.logger;
  }

  pathFor(url: string): string {
    return path.join(this.mirrorDir, repositoryNameFromUrl(url));
  }

  /**
   * Clones `url` when no mirror exists yet, otherwise fast-forwards `branch`.
   * A failed update leaves the stale mirror in place.
   */
  async ensureMirror(url: string, branch: string, credential?: ScopedCredential): Promise<MirrorResult> {
    const target = this.pathFor(url);
    const git = new GitService({ repoRoot: target, timeoutMs: this.timeoutMs });
    const authUrl = credential ? credential.authenticate(url) : url;
    const redact = (text: string): string => (credential ? credential.redact(text) : text);

    if (!(await exists(path.join(target, '.git')))) {
      await this.clone(git, url, authUrl, branch, redact);
      return { fresh: true, path: target };
    }

    try {
      const current = await git.currentBranch();
      if (current === branch) {
        await git.pull(authUrl, branch);
      } else {
        await git.fetchBranch(authUrl, branch);
      }
      return { fresh: false, path: target };
    } catch (error) {
      const reason = redact(error instanceof Error ? error.message : String(error));
      await this.logger?.warn(`Error updating mirror at ${target}, using the existing copy: ${reason}`);
      return { fresh: false, path: target, updateError: reason };
    }
  }

  private async clone(
    git: GitService,
    url: string,
    authUrl: string,
    branch: string,
    redact: (text: string) => string,
  ): Promise<void> {
    const target = git.root;
    try {
      await fs.mkdir(this.mirrorDir, { recursive: true });
      await git.clone(authUrl, branch, this.mirrorDir);
      // The token was only needed for the clone itself.
      await git.setRemoteUrl('origin', stripUserInfo(url));
      await this.logger?.debug(`Cloned ${stripUserInfo(url)} (${branch}) into ${target}`);
    } catch (error) {
      await fs.rm(target, { recursive: true, force: true });
      if (error instanceof TimeoutError) throw error;

      const reason = error instanceof Error ? error.message : String(error);
      throw new MirrorError(redact(`Failed to clone ${stripUserInfo(url)} (branch ${branch}): ${reason}`), {
        details: error instanceof ProcessError ? { exitCode: error.exitCode } : undefined,
      });
    }
  }
}
