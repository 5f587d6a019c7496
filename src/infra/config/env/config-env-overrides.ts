import { ConfigurationError } from '../../../shared/utils/error.js';

type EnvValueType = 'string' | 'boolean' | 'number' | 'json';

interface EnvSpec {
  path: string;
  type: EnvValueType;
}

export const ENV_PREFIX = 'BREW_RECENTS';

function normalizeEnvSegment(segment: string): string {
  return segment
    .replace(/([a-z0-9])([A-Z])/g, '$1_$2')
    .replace(/[^a-zA-Z0-9]+/g, '_')
    .replace(/_+/g, '_')
    .replace(/^_|_$/g, '')
    .toUpperCase();
}

export function envVarNameFromPath(path: string): string {
  const key = path
    .split('.')
    .map(normalizeEnvSegment)
    .filter((segment) => segment.length > 0)
    .join('_');
  return `${ENV_PREFIX}_${key}`;
}

function parseEnvValue(envKey: string, raw: string, type: EnvValueType): unknown {
  if (type === 'string') {
    return raw;
  }
  if (type === 'boolean') {
    const normalized = raw.trim().toLowerCase();
    if (normalized === 'true') return true;
    if (normalized === 'false') return false;
    throw new ConfigurationError(`${envKey} must be one of: true, false`);
  }
  if (type === 'number') {
    const trimmed = raw.trim();
    const value = Number(trimmed);
    if (trimmed.length === 0 || !Number.isFinite(value)) {
      throw new ConfigurationError(`${envKey} must be a number`);
    }
    return value;
  }
  try {
    return JSON.parse(raw);
  } catch {
    throw new ConfigurationError(`${envKey} must be valid JSON`);
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function setNested(target: Record<string, unknown>, path: string, value: unknown): void {
  const parts = path.split('.');
  let current = target;
  for (let i = 0; i < parts.length - 1; i++) {
    const part = parts[i];
    if (!part) continue;
    const next = current[part];
    if (isRecord(next)) {
      current = next;
    } else {
      const created: Record<string, unknown> = {};
      current[part] = created;
      current = created;
    }
  }
  const leaf = parts[parts.length - 1];
  if (!leaf) return;
  current[leaf] = value;
}

function applyEnvOverrides(
  target: Record<string, unknown>,
  specs: readonly EnvSpec[],
  env: NodeJS.ProcessEnv,
): void {
  for (const spec of specs) {
    const envKey = envVarNameFromPath(spec.path);
    const raw = env[envKey];
    if (raw === undefined) continue;
    setNested(target, spec.path, parseEnvValue(envKey, raw, spec.type));
  }
}

const GLOBAL_ENV_SPECS: readonly EnvSpec[] = [
  { path: 'days', type: 'number' },
  { path: 'truncate_chars', type: 'number' },
  { path: 'dim_looked_up', type: 'boolean' },
  { path: 'hide_looked_up', type: 'boolean' },
  { path: 'history_file', type: 'string' },
  { path: 'log_level', type: 'string' },
  { path: 'verbose', type: 'boolean' },
  { path: 'show', type: 'json' },
  { path: 'show.formulae', type: 'boolean' },
  { path: 'show.casks', type: 'boolean' },
  { path: 'show.new', type: 'boolean' },
  { path: 'show.updated', type: 'boolean' },
  { path: 'debug', type: 'json' },
  { path: 'debug.enabled', type: 'boolean' },
  { path: 'debug.log_file', type: 'string' },
];

export function applyGlobalConfigEnvOverrides(
  target: Record<string, unknown>,
  env: NodeJS.ProcessEnv = process.env,
): void {
  applyEnvOverrides(target, GLOBAL_ENV_SPECS, env);
}
