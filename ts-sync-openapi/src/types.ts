export interface RunConfig {
  readonly sourceDir: string;
  readonly targetDir: string;
  readonly org: string;
  readonly repo: string;
  readonly dryRun: boolean;
  readonly expectedBranch: string;
  readonly credentialCommand: readonly string[];
  readonly apiBaseUrl: string;
  readonly fixturesPattern: string;
  readonly specPattern: string;
  readonly fixturesCommitMessage: string;
  readonly specCommitMessage: string;
}

export interface FileMapping {
  name: string;
  sourcePath: string;
  targetPath: string;
  convertedPath: string;
}

export interface CommitBatch {
  label: 'fixtures' | 'spec';
  pattern: string;
  message: string;
}

export interface CreatedRelease {
  tagName: string;
  htmlUrl: string;
}

export type SyncOutcome =
  | { status: 'aborted'; reason: string }
  | { status: 'no-changes' }
  | {
      status: 'completed';
      committed: { fixtures: boolean; spec: boolean };
      pushed: boolean;
      release?: { tag: string; url: string };
    };

export interface CommandResult {
  success: boolean;
  exitCode: number;
  output: string;
  error: string;
}

export interface RunOptions {
  // Attach the child to this terminal, e.g. so git can open the commit message editor.
  interactive?: boolean;
}

export type CommandRunner = (
  command: string,
  args: readonly string[],
  cwd: string,
  options?: RunOptions
) => Promise<CommandResult>;
