/**
 * Error handling boundary for CLI commands.
 *
 * The only place where a failure is turned into an exit code.
 */

import type { LoggingPort } from '../../utils/logger.js';
import { errorContextOf, exitCodeFor, formatErrorWithSuggestions } from '../errors.js';
import type { CliCommandResult, DisplayOptions } from '../types.js';

/**
 * Runs a command handler and converts anything it throws into an exit code.
 *
 * - On success: returns the handler's result
 * - On error: logs `command_failed` at critical level, prints the error with
 *   suggestions to stderr, and returns exit code 1 (2 for usage errors)
 *
 * @param fn - The command handler.
 * @param logger - Receives the critical entry.
 * @param display - Display options for the printed error.
 * @returns The command result.
 */
export function withErrorHandling(
  fn: () => CliCommandResult,
  logger: LoggingPort,
  display: DisplayOptions
): CliCommandResult {
  try {
    return fn();
  } catch (error) {
    const context = errorContextOf(error);
    const message = error instanceof Error ? error.message : String(error);

    logger.critical('command_failed', {
      errorType: context.errorType,
      error: error instanceof Error ? error.name : typeof error,
      message,
    });
    console.error(formatErrorWithSuggestions(message, context, display));

    return { exitCode: exitCodeFor(context.errorType) };
  }
}
