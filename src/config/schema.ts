/**
 * Zod schemas for configuration validation.
 * Types are inferred from schemas using z.infer<> - no manual type definitions.
 */

import { z } from 'zod';
import {
  CONFIG_VERSION,
  DEFAULT_CATALOG_CHAR_BUDGET,
  DEFAULT_LOG_LEVEL,
  DEFAULT_SKILL_DIR_NAMES,
  LOG_LEVELS,
} from './constants.js';

// -----------------------------------------------------------------------------
// Skills Schema
// -----------------------------------------------------------------------------

/**
 * Skills configuration.
 */
export const SkillsConfigSchema = z.object({
  dirNames: z
    .array(z.string().min(1, 'Directory name cannot be empty'))
    .min(1, 'At least one skills directory name is required')
    .default(() => [...DEFAULT_SKILL_DIR_NAMES])
    .describe('Hidden directory names whose skills/ subdirectory is searched'),
  catalogCharBudget: z
    .number()
    .int()
    .nonnegative()
    .default(DEFAULT_CATALOG_CHAR_BUDGET)
    .describe('Character budget for the <available_skills> catalog'),
  projectRoot: z.string().optional().describe('Project root (defaults to the working directory)'),
  homeDir: z.string().optional().describe('Home directory for user skills (defaults to OS home)'),
});

export type SkillsConfig = z.infer<typeof SkillsConfigSchema>;

// -----------------------------------------------------------------------------
// Root Application Config Schema
// -----------------------------------------------------------------------------

/**
 * Root application configuration schema.
 */
export const AppConfigSchema = z.object({
  version: z.string().default(CONFIG_VERSION).describe('Configuration schema version'),
  logLevel: z.enum(LOG_LEVELS).default(DEFAULT_LOG_LEVEL).describe('Logging level'),
  skills: SkillsConfigSchema.default(() => SkillsConfigSchema.parse({})).describe(
    'Skills configuration'
  ),
});

export type AppConfig = z.infer<typeof AppConfigSchema>;

/**
 * Shape accepted from settings files and the environment before validation.
 */
export const PartialConfigSchema = z.record(z.string(), z.unknown());

export type PartialConfig = z.infer<typeof PartialConfigSchema>;

// -----------------------------------------------------------------------------
// Utility Functions
// -----------------------------------------------------------------------------

/**
 * Get the default configuration with all defaults applied.
 */
export function getDefaultConfig(): AppConfig {
  return AppConfigSchema.parse({});
}

/**
 * Parse and validate a configuration object.
 * Applies schema defaults; unknown fields are stripped by Zod.
 */
export function parseConfig(input: unknown): z.ZodSafeParseResult<AppConfig> {
  return AppConfigSchema.safeParse(input);
}
