/**
 * brew-recents
 *
 * This module exports the public API for programmatic usage.
 */

// Models
export * from './core/models/index.js';

// Report pipeline
export * from './core/report/index.js';

// Configuration
export * from './infra/config/index.js';

// Homebrew collaborators
export * from './infra/homebrew/index.js';

// Report command
export * from './features/recents/index.js';

// Utilities
export * from './shared/utils/index.js';
export * from './shared/ui/index.js';
export * from './shared/constants.js';
export * from './shared/exitCodes.js';
