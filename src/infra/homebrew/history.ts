/**
 * Inspection history: packages the user already looked up with
 * `brew info <name>` (or the common `bi <name>` alias).
 */

import { readFile } from 'node:fs/promises';

/** A lookup command and its argument list, up to the end of the command */
const LOOKUP_PATTERN = /(?:^|[\s;&|(])(?:brew\s+info|bi)[ \t]+([^\n;&|)]+)/gm;

/**
 * Extract looked-up package names from shell history content.
 * Works with plain and zsh extended-history (`: <ts>:0;cmd`) lines.
 * Every argument of a lookup counts (`brew info --cask firefox`,
 * `brew info wget curl`); option tokens such as `--json` do not.
 */
export function parseInspectedPackages(content: string): Set<string> {
  const names = new Set<string>();
  for (const match of content.matchAll(LOOKUP_PATTERN)) {
    const args = match[1];
    if (args === undefined) continue;
    for (const token of args.trim().split(/\s+/)) {
      if (token.length === 0 || token.startsWith('-')) continue;
      names.add(token);
    }
  }
  return names;
}

/** Names looked up in the given history file; a missing file yields an empty set. */
export async function getInspectedSet(historyFile: string): Promise<Set<string>> {
  let content: string;
  try {
    content = await readFile(historyFile, 'utf-8');
  } catch (err) {
    if (err instanceof Error && 'code' in err && err.code === 'ENOENT') {
      return new Set();
    }
    throw err;
  }
  return parseInspectedPackages(content);
}
