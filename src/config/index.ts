/**
 * Configuration module - schema, environment overrides and the settings loader.
 */

export {
  CONFIG_DIR_NAME,
  CONFIG_FILE_NAME,
  CONFIG_VERSION,
  SKILL_FILE_NAME,
  SKILLS_SUBDIR_NAME,
  DEFAULT_SKILL_DIR_NAMES,
  DEFAULT_CATALOG_CHAR_BUDGET,
  DEFAULT_LOG_LEVEL,
  LOG_LEVELS,
} from './constants.js';
export type { LogLevel } from './constants.js';

export {
  AppConfigSchema,
  SkillsConfigSchema,
  PartialConfigSchema,
  getDefaultConfig,
  parseConfig,
} from './schema.js';
export type { AppConfig, SkillsConfig, PartialConfig } from './schema.js';

export { ProcessEnvReader, readEnvConfig, ENV_MAPPINGS } from './env.js';
export type { IEnvReader } from './env.js';

export { ConfigManager, NodeFileSystem, deepMerge, loadConfig } from './manager.js';

export { ConfigError, successResponse, errorResponse } from './types.js';
export type {
  IFileSystem,
  ConfigCallbacks,
  ConfigSource,
  ConfigValidationError,
  ConfigErrorCode,
  ConfigResponse,
  ConfigManagerOptions,
} from './types.js';
