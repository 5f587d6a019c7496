/**
 * Log level management and formatted console output.
 *
 * LogManager is a singleton that encapsulates the current log level state.
 * Warnings and errors go to stderr so they never interleave with the
 * report columns on stdout.
 */

import chalk from 'chalk';

/** Log levels */
export type LogLevel = 'debug' | 'info' | 'warn' | 'error';

/** Log level priorities */
const LOG_PRIORITIES: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Manages console log output level and provides formatted logging.
 * Singleton — use LogManager.getInstance().
 */
export class LogManager {
  private static instance: LogManager | null = null;
  private currentLogLevel: LogLevel = 'info';

  private constructor() {}

  static getInstance(): LogManager {
    if (!LogManager.instance) {
      LogManager.instance = new LogManager();
    }
    return LogManager.instance;
  }

  setLogLevel(level: LogLevel): void {
    this.currentLogLevel = level;
  }

  /** Check if a log level should be shown */
  shouldLog(level: LogLevel): boolean {
    return LOG_PRIORITIES[level] >= LOG_PRIORITIES[this.currentLogLevel];
  }

  warn(message: string): void {
    if (this.shouldLog('warn')) {
      console.error(chalk.yellow(`[WARN] ${message}`));
    }
  }

  error(message: string): void {
    if (this.shouldLog('error')) {
      console.error(chalk.red(`[ERROR] ${message}`));
    }
  }
}

// ---- Module-level functions ----

export function setLogLevel(level: LogLevel): void {
  LogManager.getInstance().setLogLevel(level);
}

export function warn(message: string): void {
  LogManager.getInstance().warn(message);
}

export function error(message: string): void {
  LogManager.getInstance().error(message);
}
