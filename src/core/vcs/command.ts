import { execFile } from 'child_process';
import { promisify } from 'util';

import type { VcsCommandResult } from './types.js';
import { VcsCommandError } from '../../utils/errors.js';
import { logger } from '../../utils/logger.js';

const execFileAsync = promisify(execFile);

interface ExecFailure {
  stderr?: string | Buffer;
  message?: string;
}

function isExecFailure(error: unknown): error is ExecFailure {
  return typeof error === 'object' && error !== null;
}

/**
 * Default command runner: spawns the backend's command-line tool.
 */
export async function runVcsCommand(command: string, args: string[], cwd?: string): Promise<VcsCommandResult> {
  logger.debug(`Running ${command} ${args.join(' ')}`, cwd ? { cwd } : undefined);
  try {
    const { stdout, stderr } = await execFileAsync(command, args, { cwd, encoding: 'utf8' });
    return { stdout, stderr };
  } catch (error) {
    const message = isExecFailure(error)
      ? error.stderr?.toString().trim() || error.message || String(error)
      : String(error);
    throw new VcsCommandError(command, args, message);
  }
}

/**
 * Non-empty trimmed lines of a command's output
 */
export function outputLines(output: string): string[] {
  return output
    .split(/\r?\n/)
    .map(line => line.trim())
    .filter(Boolean);
}
