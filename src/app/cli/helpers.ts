/**
 * CLI helper functions
 *
 * Option value parsing and merging of CLI flags over the global config.
 */

import { InvalidArgumentError } from 'commander';
import type { GlobalConfig, RecentsOptions, SectionFilter } from '../../core/models/index.js';
import {
  EXIT_CONFIGURATION_ERROR,
  EXIT_GENERAL_ERROR,
  EXIT_PREREQUISITE_MISSING,
} from '../../shared/exitCodes.js';
import { ConfigurationError, PrerequisiteMissingError } from '../../shared/utils/error.js';

/** Parsed commander options; absent flags stay undefined so config values apply */
export type CliOptions = {
  days?: number;
  truncateChars?: number;
  onlyFormula?: boolean;
  onlyCask?: boolean;
  onlyNew?: boolean;
  onlyUpdated?: boolean;
  /** Per-side toggles; `--no-<side>` sets false */
  formula?: boolean;
  cask?: boolean;
  new?: boolean;
  updated?: boolean;
  dimLookedUp?: boolean;
  hideLookedUp?: boolean;
  /** `--no-color` sets this to false */
  color?: boolean;
  plain?: boolean;
  historyFile?: string;
  verbose?: boolean;
};

/** Commander argument parser for `<n>` values that must be positive integers. */
export function parsePositiveInt(value: string): number {
  const trimmed = value.trim();
  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  const parsed = Number.parseInt(trimmed, 10);
  if (parsed < 1) {
    throw new InvalidArgumentError('Must be a positive integer.');
  }
  return parsed;
}

/**
 * Resolve a pair of `--only-*` flags against the configured visibility.
 * One flag shows only its side; both flags together behave like neither,
 * whatever their order on the command line.
 */
export function resolveOnlyPair(
  onlyFirst: boolean | undefined,
  onlySecond: boolean | undefined,
  configured: readonly [boolean, boolean],
): [boolean, boolean] {
  const first = onlyFirst === true;
  const second = onlySecond === true;
  if (first !== second) {
    return [first, second];
  }
  return [configured[0], configured[1]];
}

/**
 * Per-side toggles replace the configured visibility first; an effective
 * `--only-*` flag then decides its whole pair.
 */
export function resolveSectionFilter(cli: CliOptions, configured: SectionFilter): SectionFilter {
  const toggled: SectionFilter = {
    formulae: cli.formula ?? configured.formulae,
    casks: cli.cask ?? configured.casks,
    new: cli.new ?? configured.new,
    updated: cli.updated ?? configured.updated,
  };
  const [formulae, casks] = resolveOnlyPair(cli.onlyFormula, cli.onlyCask, [toggled.formulae, toggled.casks]);
  const [showNew, updated] = resolveOnlyPair(cli.onlyNew, cli.onlyUpdated, [toggled.new, toggled.updated]);
  return { formulae, casks, new: showNew, updated };
}

export function resolveRecentsOptions(
  cli: CliOptions,
  config: GlobalConfig,
  defaultHistoryFile: string,
): RecentsOptions {
  return {
    days: cli.days ?? config.days,
    truncateChars: cli.truncateChars ?? config.truncateChars,
    dimLookedUp: cli.dimLookedUp ?? config.dimLookedUp,
    hideLookedUp: cli.hideLookedUp ?? config.hideLookedUp,
    historyFile: cli.historyFile ?? config.historyFile ?? defaultHistoryFile,
    color: cli.color !== false,
    plain: cli.plain === true,
    show: resolveSectionFilter(cli, config.show),
  };
}

/** Map a failure that escaped the command to the process exit code. */
export function exitCodeForError(err: unknown): number {
  if (err instanceof ConfigurationError) return EXIT_CONFIGURATION_ERROR;
  if (err instanceof PrerequisiteMissingError) return EXIT_PREREQUISITE_MISSING;
  return EXIT_GENERAL_ERROR;
}
