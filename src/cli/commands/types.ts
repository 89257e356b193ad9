/**
 * Command handler interfaces and types.
 */

import type { AppConfig } from '../../config/schema.js';

/** Output styles understood by the CLI renderer */
export type OutputType = 'info' | 'success' | 'warning' | 'error';

/** Result of a command execution */
export interface CommandResult {
  /** Whether command executed successfully */
  success: boolean;
  /** Message describing the outcome */
  message?: string;
  /** Additional data from command */
  data?: unknown;
}

/** Context passed to command handlers */
export interface CommandContext {
  /** Current app configuration */
  config: AppConfig | null;
  /** Callback to display output */
  onOutput: (content: string, type?: OutputType) => void;
  /** Debug callback, wired to stderr when logLevel is debug */
  onDebug?: (msg: string, data?: unknown) => void;
}

/** Command handler function signature */
export type CommandHandler = (args: string, context: CommandContext) => Promise<CommandResult>;
