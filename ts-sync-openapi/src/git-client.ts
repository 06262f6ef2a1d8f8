import { GitCommandError } from './errors';
import { runCommand } from './shell';
import type { CommandResult, CommandRunner, RunOptions } from './types';

/**
 * Typed wrappers over the git CLI. Every action is scoped to the working
 * directory it is given; failures throw `GitCommandError` except where a
 * method documents otherwise.
 */
export class GitClient {
  private run: CommandRunner;

  constructor(run: CommandRunner = runCommand) {
    this.run = run;
  }

  /**
   * True when `git status` reports no changes to tracked files.
   * A failing git call (not a repository, git missing) reads as not clean.
   */
  async isClean(dir: string): Promise<boolean> {
    const result = await this.run('git', ['status', '--porcelain', '--untracked-files=no'], dir);
    if (!result.success) {
      return false;
    }
    return result.output.trim().length === 0;
  }

  /**
   * Name of the checked-out branch, or '' when git cannot tell
   * (not a repository, no commits yet).
   */
  async currentBranch(dir: string): Promise<string> {
    const result = await this.run('git', ['rev-parse', '--abbrev-ref', 'HEAD'], dir);
    if (!result.success) {
      return '';
    }
    return result.output.trim();
  }

  async add(dir: string, paths: readonly string[]): Promise<void> {
    if (paths.length === 0) {
      return;
    }
    await this.git(dir, ['add', '--', ...paths]);
  }

  async hasStagedChanges(dir: string): Promise<boolean> {
    const result = await this.git(dir, ['diff', '--cached', '--name-only']);
    return result.output.trim().length > 0;
  }

  /**
   * Commits the index with `message` prefilled in the operator's editor.
   */
  async commit(dir: string, message: string): Promise<void> {
    await this.git(dir, ['commit', '--edit', '--message', message], { interactive: true });
  }

  async pull(dir: string): Promise<string> {
    const result = await this.git(dir, ['pull', '--ff-only']);
    return result.output.trim();
  }

  async push(dir: string): Promise<string> {
    const result = await this.git(dir, ['push']);
    // git reports push progress on stderr
    return (result.output + result.error).trim();
  }

  private async git(dir: string, args: string[], options?: RunOptions): Promise<CommandResult> {
    const result = await this.run('git', args, dir, options);
    if (!result.success) {
      throw new GitCommandError(args, result.exitCode, result.error);
    }
    return result;
  }
}
