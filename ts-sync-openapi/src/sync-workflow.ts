import path from 'path';
import { yamlToJson } from './converter';
import { buildFileMappings } from './file-mapping';
import { log } from './logger';
import type { SyncOperations } from './operations';
import type { CommitBatch, RunConfig, SyncOutcome } from './types';

/**
 * One end-to-end sync: copy the upstream OpenAPI files into the public
 * checkout, commit them, push, and publish the next release.
 *
 * Each precondition gate short-circuits the run. Git and API failures
 * after the gates are not caught here.
 */
export class SyncWorkflow {
  private config: RunConfig;
  private ops: SyncOperations;

  constructor(config: RunConfig, ops: SyncOperations) {
    this.config = config;
    this.ops = ops;
  }

  async run(): Promise<SyncOutcome> {
    const { config, ops } = this;

    // 1. Credential for the release API
    log.step('Fetching release credential...');
    const token = await ops.fetchCredential(ops.currentUser());
    if (!token) {
      return this.abort('No release credential available. Log in again and re-run.');
    }

    // 2-4. Preconditions, checked before anything is touched
    log.step(`Checking source directory ${config.sourceDir}...`);
    if (!await ops.directoryExists(config.sourceDir)) {
      return this.abort(`Source directory does not exist: ${config.sourceDir}`);
    }

    const branch = await ops.currentBranch(config.sourceDir);
    if (branch !== config.expectedBranch) {
      return this.abort(
        `Source directory is on branch "${branch}", expected "${config.expectedBranch}": ${config.sourceDir}`
      );
    }

    log.step(`Checking target repository ${config.targetDir}...`);
    if (!await ops.isRepoClean(config.targetDir)) {
      return this.abort(`Target repository has uncommitted changes: ${config.targetDir}`);
    }

    // 5. Pull
    log.step('Pulling latest changes...');
    const pullOutput = await ops.pullLatest();
    if (pullOutput) {
      log.detail(pullOutput);
    }

    // 6. Copy and convert
    for (const mapping of buildFileMappings(config.sourceDir, config.targetDir)) {
      log.step(`Copying ${mapping.name}...`);
      await ops.copyFile(mapping.sourcePath, mapping.targetPath);
      const content = await ops.readFile(mapping.targetPath);
      await ops.writeFile(mapping.convertedPath, yamlToJson(content));
      log.detail(`${path.relative(config.targetDir, mapping.targetPath)} -> ${path.basename(mapping.convertedPath)}`);
    }

    // 7. Anything to do?
    if (await ops.isRepoClean(config.targetDir)) {
      ops.exitSuccess('No changes to OpenAPI files, nothing to commit.');
      return { status: 'no-changes' };
    }

    // 8-9. Commit fixtures and specs separately
    const fixturesCommitted = await this.commitBatch({
      label: 'fixtures',
      pattern: config.fixturesPattern,
      message: config.fixturesCommitMessage,
    });
    const specCommitted = await this.commitBatch({
      label: 'spec',
      pattern: config.specPattern,
      message: config.specCommitMessage,
    });

    // 10. Push
    let pushed = false;
    if (config.dryRun) {
      log.info('Dry run: not pushing.');
    } else {
      log.step('Pushing...');
      const pushOutput = await ops.pushLatest();
      if (pushOutput) {
        log.detail(pushOutput);
      }
      pushed = true;
    }

    const outcome: SyncOutcome = {
      status: 'completed',
      committed: { fixtures: fixturesCommitted, spec: specCommitted },
      pushed,
    };

    // 11. Release
    if (config.dryRun) {
      log.info('Dry run: not creating a release.');
      return outcome;
    }
    if (!specCommitted) {
      log.info('OpenAPI spec unchanged, not creating a release.');
      return outcome;
    }

    log.step('Creating release...');
    const latest = await ops.latestReleaseTag(config.org, config.repo, token);
    const next = ops.incrementVersion(latest);
    log.detail(`${latest} -> ${next}`);
    const release = await ops.createRelease(config.org, config.repo, token, next);
    log.success(`Release ${next} created: ${release.htmlUrl}`);

    return { ...outcome, release: { tag: next, url: release.htmlUrl } };
  }

  /**
   * Stages the files matching the batch pattern and commits them if
   * anything ended up staged. Returns whether a commit was made.
   */
  private async commitBatch(batch: CommitBatch): Promise<boolean> {
    const { ops } = this;
    log.step(`Committing ${batch.label}...`);

    const files = await ops.globMatch(batch.pattern);
    await ops.stageFiles(files);
    if (!await ops.anyFilesStaged()) {
      log.info(`No ${batch.label} changes to commit.`);
      return false;
    }

    await ops.commitStaged(batch.message);
    log.success(`Committed ${batch.label}`);
    return true;
  }

  private abort(reason: string): SyncOutcome {
    this.ops.abort(reason);
    return { status: 'aborted', reason };
  }
}
