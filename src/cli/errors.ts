/**
 * Error suggestion system for the command-line tool.
 *
 * Maps a failure to contextual suggestions so that a failed load or save
 * says what to fix, not just that something went wrong.
 *
 * @packageDocumentation
 */

import {
  ConfigError,
  NotFoundError,
  ParseError,
  TypeMismatchError,
  type ConfigErrorCode,
} from '../errors.js';
import { EnvCoercionError } from '../settings/index.js';
import type { DisplayOptions } from './types.js';

/**
 * Error types that can end a CLI run.
 */
export type ErrorType =
  | 'not_found'
  | 'parse_error'
  | 'type_mismatch'
  | 'invariant_violation'
  | 'usage_error'
  | 'environment_error'
  | 'unknown';

/**
 * Suggestion item for resolving an error.
 */
export interface Suggestion {
  /** Suggestion text. */
  text: string;
  /** Command or action to take (optional). */
  action?: string;
}

/**
 * Error context with details needed for generating suggestions.
 */
export interface ErrorContext {
  /** Type of error that occurred. */
  errorType: ErrorType;
  /** Additional error details (optional). */
  details?: {
    /** Offending config field, e.g. `object_list[1].obj_id`. */
    field?: string;
    /** Accepted shapes for the field. */
    expected?: readonly string[];
    /** Path that was looked up. */
    path?: string;
  };
}

/**
 * Thrown for malformed command lines.
 */
export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

const ERROR_SUGGESTIONS: Readonly<Record<ErrorType, readonly Suggestion[]>> = {
  not_found: [
    {
      text: 'Check that the path exists relative to the working directory',
      action: 'ls -la <path>',
    },
    {
      text: 'Point the tool at another input file',
      action: 'config-roundtrip --input <path>',
    },
  ],

  parse_error: [
    {
      text: 'Make sure the file is valid JSON with an object at the top level',
    },
    {
      text: 'Validate the file with a JSON linter',
      action: 'jq . <path>',
    },
  ],

  type_mismatch: [
    {
      text: 'Change the field to one of the expected types, or set it to null',
    },
    {
      text: 'Booleans may also be written as words: "true", "yes" or "y" (anything else is false)',
    },
  ],

  invariant_violation: [
    {
      text: 'This is an internal consistency error; report it with the log file attached',
    },
  ],

  usage_error: [
    {
      text: 'Show the accepted flags',
      action: 'config-roundtrip --help',
    },
  ],

  environment_error: [
    {
      text: 'Fix or unset the CONFIG_ROUNDTRIP_* variable named above',
      action: 'env | grep CONFIG_ROUNDTRIP_',
    },
  ],

  unknown: [
    {
      text: 'Check the log file for detailed information',
      action: 'tail log.log',
    },
    {
      text: 'Run with debug logging',
      action: 'config-roundtrip --log-level debug',
    },
  ],
};

const CODE_ERROR_TYPES: Readonly<Record<ConfigErrorCode, ErrorType>> = {
  NOT_FOUND: 'not_found',
  PARSE_ERROR: 'parse_error',
  TYPE_MISMATCH: 'type_mismatch',
  INVARIANT_VIOLATION: 'invariant_violation',
};

/**
 * Builds the suggestion context for a thrown value.
 *
 * @param error - What the run threw.
 * @returns Context naming the error type and its field/path details.
 */
export function errorContextOf(error: unknown): ErrorContext {
  if (error instanceof TypeMismatchError) {
    return {
      errorType: 'type_mismatch',
      details: { field: error.field, expected: error.expected },
    };
  }
  if (error instanceof NotFoundError) {
    return {
      errorType: 'not_found',
      details: {
        path: error.path,
        ...(error.field !== undefined ? { field: error.field } : {}),
      },
    };
  }
  if (error instanceof ParseError) {
    return {
      errorType: 'parse_error',
      ...(error.source !== undefined ? { details: { path: error.source } } : {}),
    };
  }
  if (error instanceof ConfigError) {
    return { errorType: CODE_ERROR_TYPES[error.code] };
  }
  if (error instanceof CliUsageError) {
    return { errorType: 'usage_error' };
  }
  if (error instanceof EnvCoercionError) {
    return { errorType: 'environment_error' };
  }
  return { errorType: 'unknown' };
}

function formatSuggestion(suggestion: Suggestion, index: number, options: DisplayOptions): string {
  const yellowCode = options.colors ? '\x1b[33m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const dimCode = options.colors ? '\x1b[2m' : '';

  const prefix = `${yellowCode}${String(index)}.${resetCode}`;
  const actionText = suggestion.action ? `\n    ${dimCode}${suggestion.action}${resetCode}` : '';

  return `  ${prefix} ${suggestion.text}${actionText}`;
}

/**
 * Formats error message with contextual suggestions.
 *
 * @param errorMessage - The error message.
 * @param context - Error type and details.
 * @param options - Display options.
 * @returns Formatted error with suggestions.
 */
export function formatErrorWithSuggestions(
  errorMessage: string,
  context: ErrorContext,
  options: DisplayOptions = { colors: true }
): string {
  const suggestions = ERROR_SUGGESTIONS[context.errorType];

  const boldCode = options.colors ? '\x1b[1m' : '';
  const resetCode = options.colors ? '\x1b[0m' : '';
  const redCode = options.colors ? '\x1b[31m' : '';
  const yellowCode = options.colors ? '\x1b[33m' : '';

  let result = `${redCode}Error:${resetCode} ${errorMessage}`;

  if (context.details?.field !== undefined) {
    result += `\n  ${yellowCode}Field:${resetCode} ${context.details.field}`;
  }

  if (context.details?.expected !== undefined) {
    result += `\n  ${yellowCode}Expected:${resetCode} ${context.details.expected.join(' | ')}`;
  }

  if (context.details?.path !== undefined) {
    result += `\n  ${yellowCode}Path:${resetCode} ${context.details.path}`;
  }

  result += `\n\n${boldCode}Suggestions:${resetCode}`;
  suggestions.forEach((suggestion, i) => {
    result += '\n' + formatSuggestion(suggestion, i + 1, options);
  });

  return result;
}

/**
 * Gets the exit code for an error type.
 *
 * @param errorType - The type of error.
 * @returns 2 for usage errors, 1 otherwise.
 */
export function exitCodeFor(errorType: ErrorType): number {
  switch (errorType) {
    case 'usage_error':
      return 2;
    case 'not_found':
    case 'parse_error':
    case 'type_mismatch':
    case 'invariant_violation':
    case 'environment_error':
    case 'unknown':
      return 1;
    default: {
      // Exhaustive check - if new ErrorType is added, this will error
      const exhaustiveCheck: never = errorType;
      return exhaustiveCheck;
    }
  }
}
