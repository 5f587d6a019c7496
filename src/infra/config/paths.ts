/**
 * Path utilities for brew-recents configuration
 */

import { homedir } from 'node:os';
import { join } from 'node:path';
import { DEFAULT_HISTORY_FILE_NAME } from '../../shared/constants.js';

/** Get global config directory (~/.brew-recents or BREW_RECENTS_CONFIG_DIR) */
export function getGlobalConfigDir(): string {
  return process.env.BREW_RECENTS_CONFIG_DIR || join(homedir(), '.brew-recents');
}

/** Get global config file path */
export function getGlobalConfigPath(): string {
  return join(getGlobalConfigDir(), 'config.yaml');
}

/** Get debug logs directory */
export function getGlobalLogsDir(): string {
  return join(getGlobalConfigDir(), 'logs');
}

/** Get the default inspection history file (~/.zsh_history) */
export function getDefaultHistoryFile(): string {
  return join(homedir(), DEFAULT_HISTORY_FILE_NAME);
}

/** Expand a leading `~/` to the home directory */
export function expandHome(path: string): string {
  if (path === '~') return homedir();
  return path.startsWith('~/') ? join(homedir(), path.slice(2)) : path;
}
