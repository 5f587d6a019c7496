/**
 * Debug logging utilities for brew-recents
 * Writes debug logs to file when enabled in config.
 * When verbose console is enabled, also outputs to stderr.
 */

import { existsSync, appendFileSync, mkdirSync, writeFileSync } from 'node:fs';
import { dirname, join } from 'node:path';
import type { DebugConfig } from '../../core/models/index.js';

/**
 * Debug logger singleton.
 * Manages file-based debug logging and verbose console output.
 */
export class DebugLogger {
  private static instance: DebugLogger | null = null;

  private debugEnabled = false;
  private debugLogFile: string | null = null;
  private initialized = false;
  private verboseConsoleEnabled = false;

  private constructor() {}

  static getInstance(): DebugLogger {
    if (!DebugLogger.instance) {
      DebugLogger.instance = new DebugLogger();
    }
    return DebugLogger.instance;
  }

  private static getDefaultLogFile(logDir: string): string {
    const timestamp = new Date().toISOString().replace(/[:.]/g, '-').slice(0, 19);
    return join(logDir, `debug-${timestamp}.log`);
  }

  /** Initialize debug logger from config */
  init(config?: DebugConfig, logDir?: string): void {
    if (this.initialized) {
      return;
    }

    this.debugEnabled = config?.enabled ?? false;

    if (this.debugEnabled) {
      if (config?.logFile) {
        this.debugLogFile = config.logFile;
      } else if (logDir) {
        this.debugLogFile = DebugLogger.getDefaultLogFile(logDir);
      }

      if (this.debugLogFile) {
        const dir = dirname(this.debugLogFile);
        if (!existsSync(dir)) {
          mkdirSync(dir, { recursive: true });
        }

        const header = [
          '='.repeat(60),
          'brew-recents Debug Log',
          `Started: ${new Date().toISOString()}`,
          '='.repeat(60),
          '',
        ].join('\n');

        writeFileSync(this.debugLogFile, header, 'utf-8');
      }
    }

    this.initialized = true;
  }

  /** Reset state (for testing) */
  reset(): void {
    this.debugEnabled = false;
    this.debugLogFile = null;
    this.initialized = false;
    this.verboseConsoleEnabled = false;
  }

  setVerboseConsole(enabled: boolean): void {
    this.verboseConsoleEnabled = enabled;
  }

  private static formatLogMessage(level: string, component: string, message: string, data?: unknown): string {
    const timestamp = new Date().toISOString();
    const prefix = `[${timestamp}] [${level.toUpperCase()}] [${component}]`;

    let logLine = `${prefix} ${message}`;

    if (data !== undefined) {
      try {
        const dataStr = typeof data === 'string' ? data : JSON.stringify(data, null, 2);
        logLine += `\n${dataStr}`;
      } catch {
        logLine += `\n[Unable to serialize data]`;
      }
    }

    return logLine;
  }

  private static formatConsoleMessage(level: string, component: string, message: string): string {
    const timestamp = new Date().toISOString().slice(11, 23);
    return `[${timestamp}] [${level}] [${component}] ${message}`;
  }

  /** Write a log entry to verbose console (stderr) and/or file */
  writeLog(level: string, component: string, message: string, data?: unknown): void {
    if (this.verboseConsoleEnabled) {
      process.stderr.write(DebugLogger.formatConsoleMessage(level, component, message) + '\n');
    }

    if (!this.debugEnabled || !this.debugLogFile) {
      return;
    }

    const logLine = DebugLogger.formatLogMessage(level, component, message, data);

    try {
      appendFileSync(this.debugLogFile, logLine + '\n', 'utf-8');
    } catch (err) {
      // Logging must not interrupt the report; disable the file sink after the first failure
      process.stderr.write(`[debug] log file write failed: ${err instanceof Error ? err.message : String(err)}\n`);
      this.debugLogFile = null;
    }
  }

  /** Create a scoped logger for a component */
  createLogger(component: string): ScopedLogger {
    return {
      debug: (message: string, data?: unknown) => this.writeLog('DEBUG', component, message, data),
      info: (message: string, data?: unknown) => this.writeLog('INFO', component, message, data),
      error: (message: string, data?: unknown) => this.writeLog('ERROR', component, message, data),
      time: (label: string) => {
        const startedAt = performance.now();
        return () => {
          const elapsedMs = Math.round(performance.now() - startedAt);
          this.writeLog('DEBUG', component, `${label} took ${elapsedMs}ms`);
        };
      },
    };
  }
}

/** Component-scoped logger returned by createLogger */
export interface ScopedLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  /** Start a timed block; call the returned function to log its duration */
  time(label: string): () => void;
}

// ---- Module-level functions ----

export function initDebugLogger(config?: DebugConfig, logDir?: string): void {
  DebugLogger.getInstance().init(config, logDir);
}

export function resetDebugLogger(): void {
  DebugLogger.getInstance().reset();
}

export function setVerboseConsole(enabled: boolean): void {
  DebugLogger.getInstance().setVerboseConsole(enabled);
}

export function createLogger(component: string): ScopedLogger {
  return DebugLogger.getInstance().createLogger(component);
}
