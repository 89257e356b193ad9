/**
 * Default configuration values for skill discovery and cataloging.
 */

// Config file and directory names
export const CONFIG_DIR_NAME = '.agent' as const;
export const CONFIG_FILE_NAME = 'settings.json' as const;
export const CONFIG_VERSION = '1.0' as const;

// Skill document layout
export const SKILL_FILE_NAME = 'SKILL.md' as const;
export const SKILLS_SUBDIR_NAME = 'skills' as const;

/**
 * Hidden directory names searched under both the project root and the home
 * directory. Each one contributes a `<dir>/skills` search root.
 */
export const DEFAULT_SKILL_DIR_NAMES = ['.claude', '.minion'] as const;

// Catalog defaults
export const DEFAULT_CATALOG_CHAR_BUDGET = 15000;

// Logging
export const LOG_LEVELS = ['debug', 'info', 'warn', 'error'] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];
export const DEFAULT_LOG_LEVEL: LogLevel = 'info';
