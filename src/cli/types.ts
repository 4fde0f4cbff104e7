/**
 * CLI types and interfaces.
 */

import type { LoggingPort } from '../utils/logger.js';
import type { EnvRecord, PartialRunSettings } from '../settings/index.js';

/**
 * Terminal rendering options.
 */
export interface DisplayOptions {
  /**
   * Whether to use ANSI colors in output.
   */
  colors: boolean;
}

/**
 * Commands the CLI understands.
 */
export type CliCommand = 'run' | 'help' | 'version';

/**
 * Parsed command line.
 */
export interface ParsedArgs {
  command: CliCommand;
  /** Settings given as flags; only flags that were present are set. */
  flags: PartialRunSettings;
}

/**
 * Collaborators of a CLI run. Defaults come from the current process.
 */
export interface CliRunOptions {
  /** Environment variables (defaults to process.env). */
  env?: EnvRecord;
  /** Directory that relative paths resolve against (defaults to process.cwd()). */
  cwd?: string;
  /** Logger to use instead of one built from the run settings. */
  logger?: LoggingPort;
  /** Display options (colors default to whether stderr is a TTY). */
  display?: DisplayOptions;
}

/**
 * Result of a CLI command execution.
 */
export interface CliCommandResult {
  /**
   * Exit code (0 for success, 1 for a failed run, 2 for a usage error).
   */
  exitCode: number;
}
