/**
 * Seams and result types for the settings loader.
 */

import type { IEnvReader } from './env.js';
import type { AppConfig } from './schema.js';

export type { AppConfig, IEnvReader };

/**
 * The file operations the settings loader performs. Tests swap in an
 * in-memory implementation.
 */
export interface IFileSystem {
  /** Rejects when the file is missing or unreadable */
  readFile(path: string): Promise<string>;
  exists(path: string): Promise<boolean>;
  /** Expands a leading `~` and makes the path absolute */
  resolvePath(path: string): string;
  isAbsolute(path: string): boolean;
  joinPath(...segments: string[]): string;
  getHomeDir(): string;
  getCwd(): string;
}

/** Settings layer reported to `onConfigLoad`; `merged` marks the validated result */
export type ConfigSource = 'user' | 'project' | 'environment' | 'merged';

export interface ConfigCallbacks {
  onConfigLoad?: (source: ConfigSource, path?: string) => void;
  onValidationError?: (errors: ConfigValidationError[]) => void;
}

export interface ConfigValidationError {
  /** Dotted field path, e.g. `skills.dirNames` */
  path: string;
  message: string;
  code: string;
}

export type ConfigErrorCode = 'VALIDATION_FAILED' | 'FILE_READ_ERROR' | 'PARSE_ERROR';

/**
 * Raised while reading a settings file; `load()` turns it into an error response.
 */
export class ConfigError extends Error {
  constructor(
    message: string,
    public readonly code: ConfigErrorCode,
    public readonly path?: string
  ) {
    super(message);
    this.name = 'ConfigError';
  }
}

export type ConfigResponse<T> =
  | { success: true; result: T; message: string }
  | { success: false; error: ConfigErrorCode; message: string };

export function successResponse<T>(result: T, message: string): ConfigResponse<T> {
  return { success: true, result, message };
}

export function errorResponse<T>(error: ConfigErrorCode, message: string): ConfigResponse<T> {
  return { success: false, error, message };
}

export interface ConfigManagerOptions {
  fileSystem?: IFileSystem;
  envReader?: IEnvReader;
  callbacks?: ConfigCallbacks;
  /** Directory holding the user settings file, `~/.agent` unless set */
  userConfigDir?: string;
  /** Name of the settings directory inside a project, `.agent` unless set */
  projectConfigDirName?: string;
}
