/**
 * Homebrew collaborators - barrel exports
 */

export { HomebrewClient, type PackageSource } from './client.js';
export { ensureBrewAvailable, getRepoDir, getInstalledSet } from './brew.js';
export { buildChangeLogArgs, getRawChanges, type ChangeFilter } from './changes.js';
export { parseInspectedPackages, getInspectedSet } from './history.js';
export { execCommand, isCommandNotFound, type CommandRunner } from './runner.js';
