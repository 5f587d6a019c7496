/**
 * `brew-recents` main flow
 */

import chalk, { type ColorSupportLevel } from 'chalk';
import type { RecentsOptions } from '../../core/models/index.js';
import { buildReport, renderReport } from '../../core/report/index.js';
import { HomebrewClient, type PackageSource } from '../../infra/homebrew/index.js';
import { createLogger, getOutputWidth } from '../../shared/utils/index.js';
import { collectRawChanges, loadMembershipSets } from './collect.js';

const log = createLogger('recents');

export interface RecentsDependencies {
  source: PackageSource;
  outputWidth: number;
  /** Color level used when styling is enabled */
  colorLevel: ColorSupportLevel;
  write: (text: string) => void;
}

function defaultDependencies(): RecentsDependencies {
  return {
    source: new HomebrewClient(),
    outputWidth: getOutputWidth(),
    colorLevel: chalk.level,
    write: (text) => {
      process.stdout.write(text);
    },
  };
}

/**
 * Build and print the report. Returns the rendered text.
 * Throws PrerequisiteMissingError before any work when brew is unavailable.
 */
export async function runRecents(
  options: RecentsOptions,
  deps: RecentsDependencies = defaultDependencies(),
): Promise<string> {
  await deps.source.ensureAvailable();
  log.debug('Running report', { ...options, outputWidth: deps.outputWidth });

  const membership = await loadMembershipSets(deps.source, options.historyFile);
  const { groups, failures } = await collectRawChanges(deps.source, options.days, options.show);

  const done = log.time('build report');
  const report = buildReport(groups, membership, {
    filter: options.show,
    outputWidth: deps.outputWidth,
    colorLevel: deps.colorLevel,
    style: {
      dimInspected: options.dimLookedUp,
      hideInspected: options.hideLookedUp,
      plainOutput: options.plain,
      color: options.color && !options.plain,
      truncateAt: options.truncateChars,
    },
  });
  done();
  log.debug('Global max visible length', report.layout.globalMaxVisibleLength);

  const text = renderReport(report, options.days);
  deps.write(text);
  log.debug('Report written', {
    sections: report.sections.length,
    failedGroups: failures.map((failure) => `${failure.key.catalog}:${failure.key.category}`),
  });
  return text;
}
