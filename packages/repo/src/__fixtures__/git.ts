import { spawnSync } from 'child_process';
import * as fs from 'fs/promises';
import * as path from 'path';

/**
 * Runs git synchronously and returns trimmed stdout; throws on a non-zero exit.
 */
export function git(cwd: string, args: string[], env: Record<string, string> = {}): string {
  const result = spawnSync('git', args, {
    cwd,
    env: { ...process.env, GIT_TERMINAL_PROMPT: '0', ...env },
    encoding: 'utf-8',
  });
  if (result.error) {
    throw new Error(`The repository tests need git on PATH: ${result.error.message}`);
  }
  if (result.status !== 0) {
    throw new Error(`git ${args.join(' ')} failed: ${result.stderr}`);
  }
  return result.stdout.trim();
}

export async function initRepo(dir: string, branch = 'main'): Promise<void> {
  await fs.mkdir(dir, { recursive: true });
  git(dir, ['init', '-q']);
  git(dir, ['symbolic-ref', 'HEAD', `refs/heads/${branch}`]);
  git(dir, ['config', 'user.email', 'test@example.com']);
  git(dir, ['config', 'user.name', 'Test User']);
  git(dir, ['config', 'commit.gpgsign', 'false']);
}

/**
 * Writes `content` to `file` and commits it with both author and committer
 * date set to `date` (ISO 8601). Returns the new commit hash.
 */
export async function commitFile(
  dir: string,
  file: string,
  content: string | Uint8Array,
  date: string,
  message = `update ${file}`,
): Promise<string> {
  const target = path.join(dir, file);
  await fs.mkdir(path.dirname(target), { recursive: true });
  await fs.writeFile(target, content);
  git(dir, ['add', '-A']);
  git(dir, ['commit', '-q', '-m', message], { GIT_AUTHOR_DATE: date, GIT_COMMITTER_DATE: date });
  return git(dir, ['rev-parse', 'HEAD']);
}
