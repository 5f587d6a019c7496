/**
 * Commander program setup
 *
 * Creates the Command instance, registers options, and sets up the
 * preAction hook that loads configuration and logging.
 */

import { createRequire } from 'node:module';
import { Command } from 'commander';
import type { GlobalConfig, RecentsOptions } from '../../core/models/index.js';
import { runRecents } from '../../features/recents/index.js';
import {
  getDefaultHistoryFile,
  getGlobalLogsDir,
  loadGlobalConfig,
} from '../../infra/config/index.js';
import { setLogLevel } from '../../shared/ui/index.js';
import { createLogger, initDebugLogger, setVerboseConsole } from '../../shared/utils/debug.js';
import { type CliOptions, parsePositiveInt, resolveRecentsOptions } from './helpers.js';

const log = createLogger('cli');

function readCliVersion(): string {
  const require = createRequire(import.meta.url);
  const pkg: unknown = require('../../../package.json');
  if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') {
    return pkg.version;
  }
  return '0.0.0';
}

export const cliVersion = readCliVersion();

export type RecentsCommand = (options: RecentsOptions) => Promise<unknown>;

export function createProgram(run: RecentsCommand = (options) => runRecents(options)): Command {
  const program = new Command();
  let config: GlobalConfig | undefined;

  program
    .name('brew-recents')
    .description('Show Homebrew formulae and casks added or updated recently')
    .version(cliVersion)
    .option('-d, --days <n>', 'Show packages added/updated in the last N days (default: 7)', parsePositiveInt)
    .option('-t, --truncate-chars <n>', 'Truncate names longer than N characters (default: 25)', parsePositiveInt)
    .option('--only-formula', 'Show only formulae')
    .option('--only-cask', 'Show only casks')
    .option('--only-new', 'Show only new packages')
    .option('--only-updated', 'Show only updated packages')
    .option('-f, --formula', 'Show formulae')
    .option('-F, --no-formula', 'Hide formulae')
    .option('-c, --cask', 'Show casks')
    .option('-C, --no-cask', 'Hide casks')
    .option('-n, --new', 'Show new packages')
    .option('-N, --no-new', 'Hide new packages')
    .option('-u, --updated', 'Show updated packages')
    .option('-U, --no-updated', 'Hide updated packages')
    .option('--dim-looked-up', "Dim packages you've already looked up (default: on)")
    .option('--no-dim-looked-up', "Do not dim packages you've already looked up")
    .option('--hide-looked-up', "Hide packages you've already looked up")
    .option('--no-color', 'Disable colored output')
    .option('--plain', 'Output without formatting')
    .option('--history-file <path>', 'Shell history scanned for `brew info` lookups (default: ~/.zsh_history)')
    .option('--verbose', 'Print debug log to stderr')
    .addHelpText('after', [
      '',
      'Examples:',
      '  brew-recents --days 5 --only-cask',
      '  brew-recents --hide-looked-up',
      '  brew-recents -F -U',
    ].join('\n'));

  program.hook('preAction', () => {
    const opts = program.opts<CliOptions>();
    config = loadGlobalConfig();

    const verbose = opts.verbose === true || config.verbose;
    initDebugLogger(config.debug, getGlobalLogsDir());
    setVerboseConsole(verbose);
    setLogLevel(verbose ? 'debug' : config.logLevel);

    log.info('brew-recents starting', { version: cliVersion, verbose });
  });

  program.action(async () => {
    const loaded = config ?? loadGlobalConfig();
    const options = resolveRecentsOptions(program.opts<CliOptions>(), loaded, getDefaultHistoryFile());
    log.debug('Resolved options', options);
    await run(options);
  });

  return program;
}
