/**
 * Environment variable parsing utilities for configuration.
 * Maps environment variables to config paths with type coercion.
 */

import { LOG_LEVELS } from './constants.js';
import type { PartialConfig } from './schema.js';

/**
 * Interface for reading environment variables.
 * Enables dependency injection for testing.
 */
export interface IEnvReader {
  /**
   * Get a string environment variable.
   */
  get(name: string): string | undefined;

  /**
   * Get a number environment variable with coercion.
   */
  getNumber(name: string): number | undefined;
}

/**
 * Default implementation using process.env.
 */
export class ProcessEnvReader implements IEnvReader {
  get(name: string): string | undefined {
    return process.env[name];
  }

  getNumber(name: string): number | undefined {
    const value = this.get(name);
    if (value === undefined || value.trim() === '') return undefined;

    const num = Number(value);
    return Number.isNaN(num) ? undefined : num;
  }
}

/**
 * Validator function type for env values.
 */
type EnvValidator = (value: string) => boolean;

/**
 * Environment variable to config path mapping.
 */
interface EnvMapping {
  envVar: string;
  path: string[];
  type: 'string' | 'number';
  /** Optional validator - if provided and returns false, the value is dropped */
  validate?: EnvValidator;
}

function isValidLogLevel(value: string): boolean {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Non-negative integer validator, applied to the raw string.
 */
function isNonNegativeInteger(value: string): boolean {
  if (value.trim() === '') return false;
  const num = Number(value);
  return Number.isInteger(num) && num >= 0;
}

function isNonEmpty(value: string): boolean {
  return value.trim() !== '';
}

/**
 * Static environment variable mappings.
 * Invalid values are silently dropped (fall back to file config or defaults).
 */
export const ENV_MAPPINGS: readonly EnvMapping[] = [
  { envVar: 'SKILLS_LOG_LEVEL', path: ['logLevel'], type: 'string', validate: isValidLogLevel },
  {
    envVar: 'SKILLS_CATALOG_BUDGET',
    path: ['skills', 'catalogCharBudget'],
    type: 'number',
    validate: isNonNegativeInteger,
  },
  {
    envVar: 'SKILLS_PROJECT_ROOT',
    path: ['skills', 'projectRoot'],
    type: 'string',
    validate: isNonEmpty,
  },
  { envVar: 'SKILLS_HOME_DIR', path: ['skills', 'homeDir'], type: 'string', validate: isNonEmpty },
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Set a value at a nested path in an object.
 * Creates intermediate objects as needed.
 */
function setNestedValue(obj: Record<string, unknown>, path: string[], value: unknown): void {
  const [head, ...rest] = path;
  if (head === undefined) return;

  if (rest.length === 0) {
    obj[head] = value;
    return;
  }

  const existing = obj[head];
  const child: Record<string, unknown> = isRecord(existing) ? existing : {};
  obj[head] = child;
  setNestedValue(child, rest, value);
}

/**
 * Read environment variables and return a partial config object.
 * Only includes values that are present and valid.
 */
export function readEnvConfig(envReader: IEnvReader = new ProcessEnvReader()): PartialConfig {
  const config: PartialConfig = {};

  for (const mapping of ENV_MAPPINGS) {
    const rawValue = envReader.get(mapping.envVar);
    if (rawValue === undefined) {
      continue;
    }

    if (mapping.validate !== undefined && !mapping.validate(rawValue)) {
      continue;
    }

    const value = mapping.type === 'number' ? envReader.getNumber(mapping.envVar) : rawValue;
    if (value !== undefined) {
      setNestedValue(config, mapping.path, value);
    }
  }

  return config;
}
