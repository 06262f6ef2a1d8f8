import { execFile, spawn } from 'child_process';
import { promisify } from 'util';
import type { CommandResult, CommandRunner } from './types';

const execFileAsync = promisify(execFile);

/**
 * Runs a command without a shell. Failures come back as `success: false`
 * rather than a rejection so callers decide what a non-zero exit means.
 */
export const runCommand: CommandRunner = async (command, args, cwd, options = {}) => {
  if (options.interactive) {
    return runAttached(command, args, cwd);
  }

  try {
    const { stdout, stderr } = await execFileAsync(command, [...args], {
      cwd,
      encoding: 'utf8',
    });
    return { success: true, exitCode: 0, output: stdout, error: stderr };
  } catch (error: unknown) {
    return failureFrom(error);
  }
};

function runAttached(command: string, args: readonly string[], cwd: string): Promise<CommandResult> {
  return new Promise(resolve => {
    const child = spawn(command, [...args], { cwd, stdio: 'inherit' });
    child.on('error', error => {
      resolve({ success: false, exitCode: -1, output: '', error: error.message });
    });
    child.on('close', code => {
      const exitCode = code ?? -1;
      resolve({ success: exitCode === 0, exitCode, output: '', error: '' });
    });
  });
}

function failureFrom(error: unknown): CommandResult {
  if (!(error instanceof Error)) {
    return { success: false, exitCode: -1, output: '', error: String(error) };
  }
  const exitCode = 'code' in error && typeof error.code === 'number' ? error.code : -1;
  const output = 'stdout' in error && typeof error.stdout === 'string' ? error.stdout : '';
  const stderr = 'stderr' in error && typeof error.stderr === 'string' ? error.stderr : '';
  return { success: false, exitCode, output, error: stderr || error.message };
}
