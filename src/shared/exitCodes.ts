/**
 * Process exit codes for the brew-recents CLI
 *
 * Prerequisite and configuration failures share the general error code,
 * but keep their own names so callers can tell them apart in code.
 */

export const EXIT_SUCCESS = 0;
export const EXIT_GENERAL_ERROR = 1;
export const EXIT_CONFIGURATION_ERROR = EXIT_GENERAL_ERROR;
export const EXIT_PREREQUISITE_MISSING = EXIT_GENERAL_ERROR;
export const EXIT_SIGINT = 130; // 128 + SIGINT(2), UNIX convention
