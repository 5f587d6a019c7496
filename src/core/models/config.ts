/**
 * Configuration types
 */

import type { SectionFilter } from './report.js';

/** Debug configuration */
export interface DebugConfig {
  enabled: boolean;
  logFile?: string;
}

/** Global configuration loaded from ~/.brew-recents/config.yaml */
export interface GlobalConfig {
  days: number;
  truncateChars: number;
  dimLookedUp: boolean;
  hideLookedUp: boolean;
  /** Shell history scanned for `brew info` lookups (default: ~/.zsh_history) */
  historyFile?: string;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  verbose: boolean;
  show: SectionFilter;
  debug?: DebugConfig;
}

/** Fully resolved options for a single run (config merged with CLI flags) */
export interface RecentsOptions {
  days: number;
  truncateChars: number;
  dimLookedUp: boolean;
  hideLookedUp: boolean;
  historyFile: string;
  color: boolean;
  plain: boolean;
  show: SectionFilter;
}
