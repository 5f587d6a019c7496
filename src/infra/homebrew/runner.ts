/**
 * Child process runner used by the Homebrew collaborators
 */

import { execFile } from 'node:child_process';
import { promisify } from 'node:util';

const execFileAsync = promisify(execFile);

/** git log over a large tap can exceed the default 1 MiB buffer */
const MAX_OUTPUT_BYTES = 64 * 1024 * 1024;

/** Runs a command and resolves with its stdout; rejects on spawn failure or non-zero exit */
export type CommandRunner = (command: string, args: readonly string[]) => Promise<string>;

export const execCommand: CommandRunner = async (command, args) => {
  const { stdout } = await execFileAsync(command, [...args], {
    encoding: 'utf-8',
    maxBuffer: MAX_OUTPUT_BYTES,
  });
  return stdout;
};

/** True when the error means the executable itself could not be found */
export function isCommandNotFound(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}
