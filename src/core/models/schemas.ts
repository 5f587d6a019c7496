/**
 * Zod schemas for configuration validation
 *
 * Note: Uses zod v4 syntax.
 */

import { z } from 'zod/v4';
import { DEFAULT_DAYS, DEFAULT_TRUNCATE_CHARS } from '../../shared/constants.js';

export const LogLevelSchema = z.enum(['debug', 'info', 'warn', 'error']);

export const SectionFilterSchema = z.object({
  formulae: z.boolean().default(true),
  casks: z.boolean().default(true),
  new: z.boolean().default(true),
  updated: z.boolean().default(true),
});

export const DebugConfigSchema = z.object({
  enabled: z.boolean().default(false),
  log_file: z.string().min(1).optional(),
});

/** Global config schema (snake_case keys as written in config.yaml) */
export const GlobalConfigSchema = z.object({
  days: z.number().int().positive().default(DEFAULT_DAYS),
  truncate_chars: z.number().int().positive().default(DEFAULT_TRUNCATE_CHARS),
  dim_looked_up: z.boolean().default(true),
  hide_looked_up: z.boolean().default(false),
  history_file: z.string().min(1).optional(),
  log_level: LogLevelSchema.default('info'),
  verbose: z.boolean().default(false),
  show: SectionFilterSchema.default({ formulae: true, casks: true, new: true, updated: true }),
  debug: DebugConfigSchema.optional(),
});

export type RawGlobalConfig = z.infer<typeof GlobalConfigSchema>;
