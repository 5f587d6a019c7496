/**
 * brew command wrappers
 */

import { PrerequisiteMissingError } from '../../shared/utils/error.js';
import { isCommandNotFound, type CommandRunner } from './runner.js';

/** Fails with PrerequisiteMissingError when `brew` cannot be executed. */
export async function ensureBrewAvailable(run: CommandRunner): Promise<void> {
  try {
    await run('brew', ['--version']);
  } catch (err) {
    if (isCommandNotFound(err)) {
      throw new PrerequisiteMissingError('Homebrew', 'Homebrew is not installed.');
    }
    throw err;
  }
}

/** Local checkout of a tap (`brew --repo homebrew/core`). */
export async function getRepoDir(run: CommandRunner, tap: string): Promise<string> {
  const repoDir = (await run('brew', ['--repo', tap])).trim();
  if (repoDir.length === 0) {
    throw new Error(`brew --repo ${tap} returned no path`);
  }
  return repoDir;
}

/** Installed formulae and casks, one name per line of `brew list -1`. */
export async function getInstalledSet(run: CommandRunner): Promise<Set<string>> {
  const stdout = await run('brew', ['list', '-1']);
  return new Set(
    stdout
      .split('\n')
      .map((line) => line.trim())
      .filter((line) => line.length > 0),
  );
}
