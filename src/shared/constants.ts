/**
 * Application-wide constants
 */

/** Default change window in days */
export const DEFAULT_DAYS = 7;

/** Default per-entry display truncation */
export const DEFAULT_TRUNCATE_CHARS = 25;

/** Shell history scanned for `brew info` lookups when none is configured */
export const DEFAULT_HISTORY_FILE_NAME = '.zsh_history';

/** File extension of formula and cask definitions */
export const PACKAGE_FILE_EXTENSION = '.rb';
