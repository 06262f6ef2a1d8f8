import { log } from './logger';
import { runCommand } from './shell';
import type { CommandRunner } from './types';

export const DEFAULT_CREDENTIAL_COMMAND = [
  'security',
  'find-generic-password',
  '-s',
  'github-release-token',
  '-w',
  '-a',
] as const;

/**
 * Runs the credential command with `account` appended and returns the
 * trimmed secret it prints. An empty string means no credential is
 * available; the cause is logged so a broken keychain is told apart
 * from a missing login.
 */
export async function fetchCredential(
  command: readonly string[],
  account: string,
  cwd: string,
  run: CommandRunner = runCommand
): Promise<string> {
  const [program, ...args] = command;
  if (!program) {
    log.detail('No credential command configured');
    return '';
  }

  const result = await run(program, [...args, account], cwd);
  if (!result.success) {
    log.detail(`Credential command exited with ${result.exitCode}: ${result.error.trim() || 'no output'}`);
    return '';
  }
  return result.output.trim();
}
