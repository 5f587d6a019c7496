/**
 * Configuration - barrel exports
 */

export * from './paths.js';
export * from './global/index.js';
export { applyGlobalConfigEnvOverrides, envVarNameFromPath, ENV_PREFIX } from './env/config-env-overrides.js';
