/**
 * Settings loader. Layers merge as defaults < user file < project file < env.
 */

import * as fs from 'node:fs/promises';
import * as path from 'node:path';
import * as os from 'node:os';

import { CONFIG_DIR_NAME, CONFIG_FILE_NAME } from './constants.js';
import { ProcessEnvReader, readEnvConfig, type IEnvReader } from './env.js';
import {
  AppConfigSchema,
  PartialConfigSchema,
  getDefaultConfig,
  type AppConfig,
  type PartialConfig,
} from './schema.js';
import type {
  ConfigCallbacks,
  ConfigManagerOptions,
  ConfigResponse,
  ConfigSource,
  ConfigValidationError,
  IFileSystem,
} from './types.js';
import { ConfigError, errorResponse, successResponse } from './types.js';

function isPlainObject(value: unknown): value is Record<string, unknown> {
  return (
    typeof value === 'object' &&
    value !== null &&
    !Array.isArray(value) &&
    Object.getPrototypeOf(value) === Object.prototype
  );
}

/**
 * Merge `source` over `target` without mutating either. Nested objects merge
 * key by key; arrays and scalars are replaced; `undefined` leaves the target.
 */
export function deepMerge(target: PartialConfig, source: PartialConfig): PartialConfig {
  const result: PartialConfig = { ...target };

  for (const [key, sourceValue] of Object.entries(source)) {
    if (sourceValue === undefined) {
      continue;
    }

    const targetValue = result[key];
    result[key] =
      isPlainObject(sourceValue) && isPlainObject(targetValue)
        ? deepMerge(targetValue, sourceValue)
        : sourceValue;
  }

  return result;
}

export class NodeFileSystem implements IFileSystem {
  readFile(filePath: string): Promise<string> {
    return fs.readFile(filePath, 'utf-8');
  }

  exists(filePath: string): Promise<boolean> {
    return fs.access(filePath).then(
      () => true,
      () => false
    );
  }

  resolvePath(inputPath: string): string {
    if (inputPath === '~' || inputPath.startsWith('~/')) {
      return path.join(this.getHomeDir(), inputPath.slice(1));
    }
    return path.resolve(inputPath);
  }

  isAbsolute(inputPath: string): boolean {
    return path.isAbsolute(inputPath);
  }

  joinPath(...segments: string[]): string {
    return path.join(...segments);
  }

  getHomeDir(): string {
    return os.homedir();
  }

  getCwd(): string {
    return process.cwd();
  }
}

/**
 * Loads `settings.json` from the user and project settings directories,
 * applies environment overrides and validates the result against
 * `AppConfigSchema`.
 */
export class ConfigManager {
  private readonly fileSystem: IFileSystem;
  private readonly envReader: IEnvReader;
  private readonly callbacks: ConfigCallbacks;
  private readonly userConfigDir: string;
  private readonly projectConfigDirName: string;

  constructor(options: ConfigManagerOptions = {}) {
    this.fileSystem = options.fileSystem ?? new NodeFileSystem();
    this.envReader = options.envReader ?? new ProcessEnvReader();
    this.callbacks = options.callbacks ?? {};
    this.userConfigDir = options.userConfigDir ?? `~/${CONFIG_DIR_NAME}`;
    this.projectConfigDirName = options.projectConfigDirName ?? CONFIG_DIR_NAME;
  }

  getDefaults(): AppConfig {
    return getDefaultConfig();
  }

  getUserConfigPath(): string {
    return this.fileSystem.resolvePath(
      this.fileSystem.joinPath(this.userConfigDir, CONFIG_FILE_NAME)
    );
  }

  getProjectConfigPath(projectPath?: string): string {
    const root = projectPath ?? this.fileSystem.getCwd();
    return this.fileSystem.joinPath(root, this.projectConfigDirName, CONFIG_FILE_NAME);
  }

  /**
   * Merge every layer and validate. Relative skill roots resolve against
   * `projectPath`, or the working directory when it is omitted.
   */
  async load(projectPath?: string): Promise<ConfigResponse<AppConfig>> {
    const baseDir = projectPath ?? this.fileSystem.getCwd();
    const files: Array<[ConfigSource, string]> = [
      ['user', this.getUserConfigPath()],
      ['project', this.getProjectConfigPath(baseDir)],
    ];

    let merged: PartialConfig = { ...this.getDefaults() };
    try {
      for (const [source, filePath] of files) {
        const layer = await this.readSettingsFile(filePath);
        if (layer !== undefined) {
          merged = deepMerge(merged, layer);
          this.callbacks.onConfigLoad?.(source, filePath);
        }
      }
    } catch (error) {
      if (error instanceof ConfigError) {
        return errorResponse(error.code, error.message);
      }
      return errorResponse(
        'FILE_READ_ERROR',
        error instanceof Error ? error.message : 'Unknown error loading config'
      );
    }

    const envLayer = readEnvConfig(this.envReader);
    if (Object.keys(envLayer).length > 0) {
      merged = deepMerge(merged, envLayer);
      this.callbacks.onConfigLoad?.('environment');
    }

    const validated = this.validate(merged);
    if (!validated.success) {
      return validated;
    }
    this.callbacks.onConfigLoad?.('merged');
    return successResponse(
      this.resolveSkillRoots(validated.result, baseDir),
      'Configuration loaded successfully'
    );
  }

  validate(config: unknown): ConfigResponse<AppConfig> {
    const parsed = AppConfigSchema.safeParse(config);
    if (parsed.success) {
      return successResponse(parsed.data, 'Configuration is valid');
    }

    const errors: ConfigValidationError[] = parsed.error.issues.map((issue) => ({
      path: issue.path.join('.'),
      message: issue.message,
      code: issue.code,
    }));
    this.callbacks.onValidationError?.(errors);
    const first = errors[0];
    const detail = first !== undefined ? `${first.path}: ${first.message}` : 'Unknown error';
    return errorResponse('VALIDATION_FAILED', `Config validation failed: ${detail}`);
  }

  /** Returns undefined when the file does not exist. */
  private async readSettingsFile(filePath: string): Promise<PartialConfig | undefined> {
    if (!(await this.fileSystem.exists(filePath))) {
      return undefined;
    }

    const text = await this.fileSystem.readFile(filePath);
    let data: unknown;
    try {
      data = JSON.parse(text);
    } catch {
      throw new ConfigError(`Invalid JSON in config file: ${filePath}`, 'PARSE_ERROR', filePath);
    }

    const shape = PartialConfigSchema.safeParse(data);
    if (!shape.success) {
      throw new ConfigError(
        `Config file must contain a JSON object: ${filePath}`,
        'VALIDATION_FAILED',
        filePath
      );
    }
    return shape.data;
  }

  private resolveSkillRoots(config: AppConfig, baseDir: string): AppConfig {
    const resolve = (root: string | undefined): string | undefined => {
      if (root === undefined) return undefined;
      const anchored =
        root === '~' || root.startsWith('~/') || this.fileSystem.isAbsolute(root)
          ? root
          : this.fileSystem.joinPath(baseDir, root);
      return this.fileSystem.resolvePath(anchored);
    };

    return {
      ...config,
      skills: {
        ...config.skills,
        projectRoot: resolve(config.skills.projectRoot),
        homeDir: resolve(config.skills.homeDir),
      },
    };
  }
}

/**
 * Load settings with a fresh manager.
 */
export function loadConfig(
  projectPath?: string,
  options?: ConfigManagerOptions
): Promise<ConfigResponse<AppConfig>> {
  return new ConfigManager(options).load(projectPath);
}
