/**
 * CLI context adapter for running command handlers from the terminal.
 * Provides console output with colors and a stderr debug channel.
 */

import type { CommandContext, OutputType } from './commands/types.js';
import { loadConfig } from '../config/manager.js';
import type { AppConfig } from '../config/schema.js';
import type { ConfigCallbacks } from '../config/types.js';
import { getUserFriendlyMessage } from '../errors/index.js';

/**
 * ANSI color codes for terminal output.
 */
const colors = {
  reset: '\x1b[0m',
  green: '\x1b[32m',
  yellow: '\x1b[33m',
  red: '\x1b[31m',
  cyan: '\x1b[36m',
  dim: '\x1b[2m',
};

export interface CliContextOptions {
  /** Force debug output regardless of configured log level */
  verbose?: boolean;
}

/**
 * Output content to console with optional color coding.
 * Uses process.stdout/stderr directly to avoid eslint console warnings.
 */
function cliOutput(content: string, type?: OutputType): void {
  let color = colors.reset;
  switch (type) {
    case 'success':
      color = colors.green;
      break;
    case 'warning':
      color = colors.yellow;
      break;
    case 'error':
      color = colors.red;
      break;
    case 'info':
      color = colors.cyan;
      break;
  }
  const output = `${color}${content}${colors.reset}\n`;
  if (type === 'error') {
    process.stderr.write(output);
  } else {
    process.stdout.write(output);
  }
}

/**
 * Write a debug line to stderr, dimmed, with optional JSON data.
 */
function cliDebug(msg: string, data?: unknown): void {
  const suffix = data === undefined ? '' : ` ${JSON.stringify(data)}`;
  process.stderr.write(`${colors.dim}[debug] ${msg}${suffix}${colors.reset}\n`);
}

/**
 * Create a CommandContext with a preloaded config.
 */
export function createCliContextWithConfig(
  config: AppConfig | null,
  options: CliContextOptions = {}
): CommandContext {
  const debugEnabled = options.verbose === true || config?.logLevel === 'debug';

  return {
    config,
    onOutput: cliOutput,
    onDebug: debugEnabled ? cliDebug : undefined,
  };
}

/**
 * Create a CommandContext from settings files and the environment.
 * A config that fails to load is reported and replaced by built-in defaults.
 * Settings events are held until the log level is known, then replayed
 * through onDebug.
 */
export async function createCliContext(options: CliContextOptions = {}): Promise<CommandContext> {
  const events: Array<[string, unknown]> = [];
  const callbacks: ConfigCallbacks = {
    onConfigLoad: (source, path) => {
      events.push([`Loaded ${source} settings`, path === undefined ? undefined : { path }]);
    },
    onValidationError: (errors) => {
      events.push(['Settings failed validation', { errors }]);
    },
  };

  const configResult = await loadConfig(undefined, { callbacks });
  if (!configResult.success) {
    cliOutput(
      `Config error: ${configResult.message}. ${getUserFriendlyMessage('CONFIG_ERROR')}`,
      'warning'
    );
  }
  const config: AppConfig | null = configResult.success ? configResult.result : null;

  const context = createCliContextWithConfig(config, options);
  for (const [msg, data] of events) {
    context.onDebug?.(msg, data);
  }
  return context;
}
