/**
 * Global configuration loader
 *
 * Manages ~/.brew-recents/config.yaml.
 * GlobalConfigManager encapsulates the config cache as a singleton.
 */

import { readFileSync, existsSync } from 'node:fs';
import { parse as parseYaml } from 'yaml';
import { GlobalConfigSchema } from '../../../core/models/index.js';
import type { GlobalConfig } from '../../../core/models/index.js';
import { ConfigurationError, getErrorMessage } from '../../../shared/utils/error.js';
import { expandHome, getGlobalConfigPath } from '../paths.js';
import { applyGlobalConfigEnvOverrides } from '../env/config-env-overrides.js';

function readRawConfig(configPath: string): Record<string, unknown> {
  const rawConfig: Record<string, unknown> = {};
  if (!existsSync(configPath)) {
    return rawConfig;
  }

  let parsedRaw: unknown;
  try {
    parsedRaw = parseYaml(readFileSync(configPath, 'utf-8'));
  } catch (err) {
    throw new ConfigurationError(`Configuration error: cannot parse ${configPath}: ${getErrorMessage(err)}`);
  }

  if (parsedRaw && typeof parsedRaw === 'object' && !Array.isArray(parsedRaw)) {
    Object.assign(rawConfig, parsedRaw);
  } else if (parsedRaw != null) {
    throw new ConfigurationError(`Configuration error: ${configPath} must be a YAML object.`);
  }
  return rawConfig;
}

/**
 * Manages global configuration loading and caching.
 * Singleton — use GlobalConfigManager.getInstance().
 */
export class GlobalConfigManager {
  private static instance: GlobalConfigManager | null = null;
  private cachedConfig: GlobalConfig | null = null;

  private constructor() {}

  static getInstance(): GlobalConfigManager {
    if (!GlobalConfigManager.instance) {
      GlobalConfigManager.instance = new GlobalConfigManager();
    }
    return GlobalConfigManager.instance;
  }

  /** Reset singleton for testing */
  static resetInstance(): void {
    GlobalConfigManager.instance = null;
  }

  invalidateCache(): void {
    this.cachedConfig = null;
  }

  /** Load global configuration (cached) */
  load(): GlobalConfig {
    if (this.cachedConfig !== null) {
      return this.cachedConfig;
    }
    const configPath = getGlobalConfigPath();
    const rawConfig = readRawConfig(configPath);

    applyGlobalConfigEnvOverrides(rawConfig);

    const result = GlobalConfigSchema.safeParse(rawConfig);
    if (!result.success) {
      const details = result.error.issues
        .map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`)
        .join('; ');
      throw new ConfigurationError(`Configuration error in ${configPath}: ${details}`);
    }

    const parsed = result.data;
    const config: GlobalConfig = {
      days: parsed.days,
      truncateChars: parsed.truncate_chars,
      dimLookedUp: parsed.dim_looked_up,
      hideLookedUp: parsed.hide_looked_up,
      historyFile: parsed.history_file ? expandHome(parsed.history_file) : undefined,
      logLevel: parsed.log_level,
      verbose: parsed.verbose,
      show: { ...parsed.show },
      debug: parsed.debug ? {
        enabled: parsed.debug.enabled,
        logFile: parsed.debug.log_file ? expandHome(parsed.debug.log_file) : undefined,
      } : undefined,
    };
    this.cachedConfig = config;
    return config;
  }
}

export function invalidateGlobalConfigCache(): void {
  GlobalConfigManager.getInstance().invalidateCache();
}

export function loadGlobalConfig(): GlobalConfig {
  return GlobalConfigManager.getInstance().load();
}

