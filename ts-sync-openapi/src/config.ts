import path from 'path';
import { z } from 'zod';
import { DEFAULT_CREDENTIAL_COMMAND } from './credential';
import { ConfigError } from './errors';
import { DEFAULT_API_BASE_URL } from './release-client';
import type { RunConfig } from './types';

export interface CliOptions {
  source?: string;
  target?: string;
  org?: string;
  repo?: string;
  branch?: string;
  dryRun?: boolean;
}

type Env = Record<string, string | undefined>;

const runConfigSchema = z.object({
  sourceDir: z.string().min(1, 'source directory is required (--source or SYNC_SOURCE_DIR)'),
  targetDir: z.string().min(1),
  org: z.string().min(1, 'organization is required (--org or SYNC_ORG)'),
  repo: z.string().min(1, 'repository is required (--repo or SYNC_REPO)'),
  dryRun: z.boolean(),
  expectedBranch: z.string().min(1),
  credentialCommand: z.array(z.string()).min(1, 'credential command must not be empty'),
  apiBaseUrl: z.string().url(),
  fixturesPattern: z.string().min(1),
  specPattern: z.string().min(1),
  fixturesCommitMessage: z.string().min(1),
  specCommitMessage: z.string().min(1),
});

export function isTruthyFlag(value: string | undefined): boolean {
  if (!value) return false;
  return ['1', 'true', 'yes'].includes(value.trim().toLowerCase());
}

/**
 * Builds the run configuration. Command line options win over the
 * environment, which wins over defaults. Directories are resolved
 * against the current working directory.
 */
export function loadRunConfig(options: CliOptions = {}, env: Env = process.env): RunConfig {
  const sourceDir = options.source ?? env.SYNC_SOURCE_DIR ?? '';
  const targetDir = options.target ?? env.SYNC_TARGET_DIR ?? '.';
  const credentialCommand = env.SYNC_CREDENTIAL_CMD
    ? env.SYNC_CREDENTIAL_CMD.split(/\s+/).filter(part => part.length > 0)
    : [...DEFAULT_CREDENTIAL_COMMAND];

  const parsed = runConfigSchema.safeParse({
    sourceDir: sourceDir ? path.resolve(sourceDir) : '',
    targetDir: path.resolve(targetDir),
    org: options.org ?? env.SYNC_ORG ?? '',
    repo: options.repo ?? env.SYNC_REPO ?? '',
    dryRun: options.dryRun === true || isTruthyFlag(env.DRY_RUN),
    expectedBranch: options.branch ?? env.SYNC_EXPECTED_BRANCH ?? 'master',
    credentialCommand,
    apiBaseUrl: env.GITHUB_API_URL ?? DEFAULT_API_BASE_URL,
    fixturesPattern: env.SYNC_FIXTURES_PATTERN ?? 'openapi/fixtures*',
    specPattern: env.SYNC_SPEC_PATTERN ?? 'openapi/spec*',
    fixturesCommitMessage: env.SYNC_FIXTURES_COMMIT_MESSAGE ?? 'Update OpenAPI fixtures',
    specCommitMessage: env.SYNC_SPEC_COMMIT_MESSAGE ?? 'Update OpenAPI specification',
  });

  if (!parsed.success) {
    const problems = parsed.error.issues.map(issue => `${issue.path.join('.')}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration:\n  ${problems.join('\n  ')}`);
  }
  return Object.freeze(parsed.data);
}
