/**
 * Raw change identifiers → bare package names
 */

import { basename } from 'node:path';
import { PACKAGE_FILE_EXTENSION } from '../../shared/constants.js';

export interface NormalizeOptions {
  /** Only identifiers under this repository path are kept (e.g. `Formula/`) */
  pathPrefix?: string;
  extension?: string;
}

/** Basename of the identifier without its definition-file extension. */
export function normalizePackageName(raw: string, extension: string = PACKAGE_FILE_EXTENSION): string {
  const name = basename(raw.trim());
  return name.endsWith(extension) ? name.slice(0, name.length - extension.length) : name;
}

/**
 * Normalize a raw change list into sorted, unique package names.
 * Blank lines are skipped. With a path prefix, only definition files
 * under that prefix are kept.
 */
export function normalizePackageList(raws: readonly string[], options: NormalizeOptions = {}): string[] {
  const extension = options.extension ?? PACKAGE_FILE_EXTENSION;
  const names = new Set<string>();

  for (const raw of raws) {
    const line = raw.trim();
    if (line.length === 0) continue;
    if (options.pathPrefix !== undefined
      && (!line.startsWith(options.pathPrefix) || !line.endsWith(extension))) {
      continue;
    }
    names.add(normalizePackageName(line, extension));
  }

  return [...names].sort();
}
