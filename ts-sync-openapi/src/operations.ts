import fg from 'fast-glob';
import fs from 'fs-extra';
import os from 'os';
import { fetchCredential } from './credential';
import { GitClient } from './git-client';
import { log } from './logger';
import { GithubReleaseClient, type ReleaseClientOptions } from './release-client';
import type { CreatedRelease, RunConfig } from './types';
import { incrementVersion } from './version';

/**
 * Every side effect the sync workflow performs. Each member is a single
 * action; ordering and branching live in `SyncWorkflow`.
 *
 * `abort` and `exitSuccess` end the process in the real implementation.
 * Callers must still return after them, since a test double will not exit.
 */
export interface SyncOperations {
  abort(message: string): void;
  exitSuccess(message: string): void;
  isRepoClean(dir: string): Promise<boolean>;
  copyFile(src: string, dest: string): Promise<void>;
  readFile(filePath: string): Promise<string>;
  writeFile(filePath: string, content: string): Promise<void>;
  directoryExists(dir: string): Promise<boolean>;
  globMatch(pattern: string): Promise<string[]>;
  stageFiles(paths: readonly string[]): Promise<void>;
  anyFilesStaged(): Promise<boolean>;
  commitStaged(message: string): Promise<void>;
  currentBranch(dir: string): Promise<string>;
  currentUser(): string;
  fetchCredential(account: string): Promise<string>;
  createRelease(org: string, repo: string, token: string, tag: string): Promise<CreatedRelease>;
  latestReleaseTag(org: string, repo: string, token: string): Promise<string>;
  incrementVersion(tag: string): string;
  pullLatest(): Promise<string>;
  pushLatest(): Promise<string>;
}

export interface SystemOperationsDeps {
  git?: GitClient;
  releaseClientOptions?: ReleaseClientOptions;
}

/**
 * Real operations: the local filesystem, the git CLI in the target
 * checkout, and the GitHub releases API.
 */
export class SystemOperations implements SyncOperations {
  private config: RunConfig;
  private git: GitClient;
  private releaseClientOptions: ReleaseClientOptions;

  constructor(config: RunConfig, deps: SystemOperationsDeps = {}) {
    this.config = config;
    this.git = deps.git ?? new GitClient();
    this.releaseClientOptions = { baseUrl: config.apiBaseUrl, ...deps.releaseClientOptions };
  }

  abort(message: string): void {
    log.error(message);
    process.exit(1);
  }

  exitSuccess(message: string): void {
    log.success(message);
    process.exit(0);
  }

  isRepoClean(dir: string): Promise<boolean> {
    return this.git.isClean(dir);
  }

  copyFile(src: string, dest: string): Promise<void> {
    return fs.copy(src, dest, { overwrite: true, errorOnExist: false });
  }

  readFile(filePath: string): Promise<string> {
    return fs.readFile(filePath, 'utf-8');
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    await fs.outputFile(filePath, content, 'utf-8');
  }

  async directoryExists(dir: string): Promise<boolean> {
    if (!await fs.pathExists(dir)) {
      return false;
    }
    const stat = await fs.stat(dir);
    return stat.isDirectory();
  }

  /**
   * Files under the target checkout matching `pattern`, relative to it and sorted.
   */
  async globMatch(pattern: string): Promise<string[]> {
    const matches = await fg(pattern, { cwd: this.config.targetDir, onlyFiles: true });
    return matches.sort();
  }

  stageFiles(paths: readonly string[]): Promise<void> {
    return this.git.add(this.config.targetDir, paths);
  }

  anyFilesStaged(): Promise<boolean> {
    return this.git.hasStagedChanges(this.config.targetDir);
  }

  commitStaged(message: string): Promise<void> {
    return this.git.commit(this.config.targetDir, message);
  }

  currentBranch(dir: string): Promise<string> {
    return this.git.currentBranch(dir);
  }

  currentUser(): string {
    return os.userInfo().username;
  }

  fetchCredential(account: string): Promise<string> {
    return fetchCredential(this.config.credentialCommand, account, process.cwd());
  }

  createRelease(org: string, repo: string, token: string, tag: string): Promise<CreatedRelease> {
    return new GithubReleaseClient(org, repo, token, this.releaseClientOptions).create(tag);
  }

  latestReleaseTag(org: string, repo: string, token: string): Promise<string> {
    return new GithubReleaseClient(org, repo, token, this.releaseClientOptions).latestTag();
  }

  incrementVersion(tag: string): string {
    return incrementVersion(tag);
  }

  pullLatest(): Promise<string> {
    return this.git.pull(this.config.targetDir);
  }

  pushLatest(): Promise<string> {
    return this.git.push(this.config.targetDir);
  }
}
