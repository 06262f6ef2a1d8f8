import path from 'path';
import { describe, expect, it } from 'vitest';
import { isTruthyFlag, loadRunConfig } from '../config';
import { ConfigError } from '../errors';

const BASE_ENV = {
  SYNC_SOURCE_DIR: '/work/api-internal',
  SYNC_ORG: 'example-org',
  SYNC_REPO: 'openapi',
};

describe('loadRunConfig', () => {
  it('fills defaults around the required environment values', () => {
    const config = loadRunConfig({}, BASE_ENV);

    expect(config).toEqual({
      sourceDir: '/work/api-internal',
      targetDir: path.resolve('.'),
      org: 'example-org',
      repo: 'openapi',
      dryRun: false,
      expectedBranch: 'master',
      credentialCommand: ['security', 'find-generic-password', '-s', 'github-release-token', '-w', '-a'],
      apiBaseUrl: 'https://api.github.com',
      fixturesPattern: 'openapi/fixtures*',
      specPattern: 'openapi/spec*',
      fixturesCommitMessage: 'Update OpenAPI fixtures',
      specCommitMessage: 'Update OpenAPI specification',
    });
    expect(Object.isFrozen(config)).toBe(true);
  });

  it('prefers command line options over the environment', () => {
    const config = loadRunConfig(
      { source: '/other/source', target: '/other/target', org: 'cli-org', repo: 'cli-repo', branch: 'main' },
      { ...BASE_ENV, SYNC_TARGET_DIR: '/env/target', SYNC_EXPECTED_BRANCH: 'develop' }
    );

    expect(config.sourceDir).toBe('/other/source');
    expect(config.targetDir).toBe('/other/target');
    expect(config.org).toBe('cli-org');
    expect(config.repo).toBe('cli-repo');
    expect(config.expectedBranch).toBe('main');
  });

  it('reads dry run from the flag or DRY_RUN', () => {
    expect(loadRunConfig({ dryRun: true }, BASE_ENV).dryRun).toBe(true);
    expect(loadRunConfig({}, { ...BASE_ENV, DRY_RUN: '1' }).dryRun).toBe(true);
    expect(loadRunConfig({}, { ...BASE_ENV, DRY_RUN: '0' }).dryRun).toBe(false);
  });

  it('splits a custom credential command into arguments', () => {
    const config = loadRunConfig({}, { ...BASE_ENV, SYNC_CREDENTIAL_CMD: 'pass  show github/release ' });

    expect(config.credentialCommand).toEqual(['pass', 'show', 'github/release']);
  });

  it('takes batch patterns and commit messages from the environment', () => {
    const config = loadRunConfig({}, {
      ...BASE_ENV,
      SYNC_FIXTURES_PATTERN: 'fixtures/**/*',
      SYNC_SPEC_PATTERN: 'spec/**/*',
      SYNC_FIXTURES_COMMIT_MESSAGE: 'Sync fixtures',
      SYNC_SPEC_COMMIT_MESSAGE: 'Sync spec',
    });

    expect(config.fixturesPattern).toBe('fixtures/**/*');
    expect(config.specPattern).toBe('spec/**/*');
    expect(config.fixturesCommitMessage).toBe('Sync fixtures');
    expect(config.specCommitMessage).toBe('Sync spec');
  });

  it('reports every missing required value', () => {
    expect(() => loadRunConfig({}, {})).toThrow(ConfigError);
    expect(() => loadRunConfig({}, {})).toThrow(
      'Invalid configuration:\n' +
        '  sourceDir: source directory is required (--source or SYNC_SOURCE_DIR)\n' +
        '  org: organization is required (--org or SYNC_ORG)\n' +
        '  repo: repository is required (--repo or SYNC_REPO)'
    );
  });

  it('rejects a malformed API URL', () => {
    expect(() => loadRunConfig({}, { ...BASE_ENV, GITHUB_API_URL: 'not a url' })).toThrow('apiBaseUrl');
  });
});

describe('isTruthyFlag', () => {
  it('accepts 1, true and yes in any case', () => {
    expect(['1', 'true', 'TRUE', 'yes', ' Yes '].map(isTruthyFlag)).toEqual([true, true, true, true, true]);
    expect(['', '0', 'false', 'no'].map(isTruthyFlag)).toEqual([false, false, false, false]);
    expect(isTruthyFlag(undefined)).toBe(false);
  });
});
