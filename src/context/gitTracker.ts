import { simpleGit, type SimpleGit } from 'simple-git';
import { join, relative, resolve } from 'node:path';
import { toPosix } from './fileIndexer.js';
import { InvalidArgumentError } from '../errors/context.js';
import { logger } from '../logging/logger.js';

const STAGED = new Set(['A', 'M', 'R', 'C']);

function lines(output: string): string[] {
  return output
    .split('\n')
    .map((l) => l.trim())
    .filter((l) => l !== '');
}

/**
 * Lists files a git working tree reports as changed, for restricting
 * searches to work in progress.
 */
export class GitTracker {
  /** The repository's top-level directory, or null outside a repository. */
  async topLevel(repoPath: string): Promise<string | null> {
    try {
      const top = await this.makeGit(repoPath).revparse(['--show-toplevel']);
      return top.trim();
    } catch {
      return null;
    }
  }

  async isGitRepo(repoPath: string): Promise<boolean> {
    return (await this.topLevel(repoPath)) !== null;
  }

  /**
   * Staged, modified, untracked and rename-target files from `git status`,
   * plus files touched by the last `commits` commits. Paths are relative to
   * `projectRoot`; files outside it are dropped.
   */
  async modifiedFiles(projectRoot: string, commits = 5): Promise<string[]> {
    if (!Number.isInteger(commits) || commits < 1) {
      throw new InvalidArgumentError(`commits must be a positive integer, got ${commits}`);
    }
    const root = resolve(projectRoot);
    const top = await this.topLevel(root);
    if (top === null) throw new InvalidArgumentError(`Not a git repository: ${root}`);

    const git = this.makeGit(root);
    const files = new Set<string>();

    const status = await git.status();
    for (const file of status.files) {
      const untracked = file.index === '?' && file.working_dir === '?';
      if (STAGED.has(file.index) || file.working_dir === 'M' || untracked) files.add(file.path);
    }

    for (const path of await this.recentlyCommitted(git, commits)) files.add(path);

    const result = new Set<string>();
    for (const path of files) {
      const rel = toPosix(relative(root, join(top, path)));
      if (rel !== '' && !rel.startsWith('../')) result.add(rel);
    }
    return [...result].sort();
  }

  private async recentlyCommitted(git: SimpleGit, commits: number): Promise<string[]> {
    try {
      return lines(await git.diff(['--name-only', `HEAD~${commits}..HEAD`]));
    } catch (err) {
      // fewer than `commits` commits: HEAD~n does not resolve
      logger.debug(`git diff HEAD~${commits} failed (${err instanceof Error ? err.message : String(err)}); using git log`);
    }
    try {
      return lines(await git.raw(['log', '--oneline', `-${commits}`, '--name-only', '--format=']));
    } catch (err) {
      // an empty repository has no HEAD at all
      logger.debug(`git log failed: ${err instanceof Error ? err.message : String(err)}`);
      return [];
    }
  }

  private makeGit(cwd: string): SimpleGit {
    return simpleGit(cwd);
  }
}
