/**
 * Change retrieval from a tap's git history
 */

import type { CommandRunner } from './runner.js';

/** git --diff-filter value: A(dded) or M(odified) */
export type ChangeFilter = 'A' | 'M';

export function buildChangeLogArgs(
  repoDir: string,
  days: number,
  filter: ChangeFilter,
  pathPrefix: string,
): string[] {
  return [
    '-C', repoDir,
    'log',
    `--diff-filter=${filter}`,
    `--since=${days} days ago`,
    '--name-only',
    '--pretty=format:',
    '--',
    pathPrefix,
  ];
}

/**
 * Paths of definition files added or modified in the last `days` days.
 * Output order is git's; blank separator lines are dropped.
 */
export async function getRawChanges(
  run: CommandRunner,
  repoDir: string,
  days: number,
  filter: ChangeFilter,
  pathPrefix: string,
): Promise<string[]> {
  const stdout = await run('git', buildChangeLogArgs(repoDir, days, filter, pathPrefix));
  return stdout
    .split('\n')
    .map((line) => line.trim())
    .filter((line) => line.length > 0);
}
