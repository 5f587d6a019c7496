/**
 * Error handling utilities
 */

/**
 * Extract error message from unknown error type
 */
export function getErrorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/**
 * Invalid CLI argument, configuration file or environment override.
 * Reported before any report output is produced.
 */
export class ConfigurationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigurationError';
  }
}

/**
 * A tool the report depends on (brew) is not available.
 */
export class PrerequisiteMissingError extends Error {
  constructor(readonly tool: string, message = `${tool} is not installed.`) {
    super(message);
    this.name = 'PrerequisiteMissingError';
  }
}
