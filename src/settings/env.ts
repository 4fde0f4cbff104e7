/**
 * Environment variable overrides for run settings.
 *
 * Reads CONFIG_ROUNDTRIP_* variables. Command-line flags take precedence over
 * environment variables, which take precedence over defaults.
 *
 * Override precedence: flags > env > defaults
 *
 * @packageDocumentation
 */

import { parseLogLevel } from '../utils/logger.js';
import type { LogLevel } from '../utils/logger.js';
import { DEFAULT_RUN_SETTINGS } from './defaults.js';
import type { PartialRunSettings, RunSettings } from './types.js';

/**
 * Type for environment record (matching process.env structure).
 */
export type EnvRecord = Record<string, string | undefined>;

/**
 * Error class for environment variable coercion errors.
 */
export class EnvCoercionError extends Error {
  /** The environment variable name that failed coercion. */
  public readonly envVar: string;
  /** The raw value from the environment variable. */
  public readonly rawValue: string;
  /** The expected type for the value. */
  public readonly expectedType: string;

  /**
   * Creates a new EnvCoercionError.
   *
   * @param envVar - The environment variable name.
   * @param rawValue - The raw string value from the environment.
   * @param expectedType - The type the value should be coerced to.
   * @param message - Optional detailed error message.
   */
  constructor(envVar: string, rawValue: string, expectedType: string, message?: string) {
    const defaultMessage = `Cannot coerce environment variable '${envVar}' value '${rawValue}' to ${expectedType}`;
    super(message ?? defaultMessage);
    this.name = 'EnvCoercionError';
    this.envVar = envVar;
    this.rawValue = rawValue;
    this.expectedType = expectedType;
  }
}

/**
 * Coerces a string value to a boolean.
 *
 * Accepts: 'true', '1', 'yes', 'on' for true
 * Accepts: 'false', '0', 'no', 'off' for false
 * Case-insensitive.
 *
 * @param value - The string value to coerce.
 * @param envVar - The environment variable name for error reporting.
 * @returns The coerced boolean value.
 * @throws EnvCoercionError if the value cannot be converted to a boolean.
 */
function coerceToBoolean(value: string, envVar: string): boolean {
  const trimmed = value.trim().toLowerCase();

  const truthy = ['true', '1', 'yes', 'on'];
  const falsy = ['false', '0', 'no', 'off'];

  if (truthy.includes(trimmed)) {
    return true;
  }

  if (falsy.includes(trimmed)) {
    return false;
  }

  throw new EnvCoercionError(
    envVar,
    value,
    'boolean',
    `Cannot coerce '${envVar}' value '${value}' to boolean. Expected one of: ${[...truthy, ...falsy].join(', ')}`
  );
}

/**
 * Coerces a string value to a log level name or numeric severity.
 *
 * @throws EnvCoercionError if the value names no level.
 */
function coerceToLogLevel(value: string, envVar: string): LogLevel {
  const level = parseLogLevel(value);
  if (level === undefined) {
    throw new EnvCoercionError(
      envVar,
      value,
      'log level',
      `Cannot coerce '${envVar}' value '${value}' to a log level. Expected one of: debug, info, warning, error, critical (or 10-50)`
    );
  }
  return level;
}

/**
 * One recognized environment variable.
 */
interface EnvVarMapping {
  readonly envVar: string;
  readonly field: keyof RunSettings;
  readonly type: 'string' | 'boolean' | 'log level';
  readonly description: string;
  readonly apply: (overrides: PartialRunSettings, value: string, envVar: string) => void;
}

const ENV_VAR_MAPPINGS: readonly EnvVarMapping[] = [
  {
    envVar: 'CONFIG_ROUNDTRIP_INPUT',
    field: 'input_path',
    type: 'string',
    description: 'Configuration file to load',
    apply: (overrides, value) => {
      overrides.input_path = value;
    },
  },
  {
    envVar: 'CONFIG_ROUNDTRIP_OUTPUT_DIR',
    field: 'output_directory',
    type: 'string',
    description: 'Directory that receives the re-serialized file',
    apply: (overrides, value) => {
      overrides.output_directory = value;
    },
  },
  {
    envVar: 'CONFIG_ROUNDTRIP_OUTPUT_FILE',
    field: 'output_filename',
    type: 'string',
    description: 'Name of the re-serialized file',
    apply: (overrides, value) => {
      overrides.output_filename = value;
    },
  },
  {
    envVar: 'CONFIG_ROUNDTRIP_LOG_FILE',
    field: 'log_file',
    type: 'string',
    description: 'Log file path',
    apply: (overrides, value) => {
      overrides.log_file = value;
    },
  },
  {
    envVar: 'CONFIG_ROUNDTRIP_LOG_TO_FILE',
    field: 'log_to_file',
    type: 'boolean',
    description: 'Enable or disable the log file (true/false)',
    apply: (overrides, value, envVar) => {
      overrides.log_to_file = coerceToBoolean(value, envVar);
    },
  },
  {
    envVar: 'CONFIG_ROUNDTRIP_LOG_LEVEL',
    field: 'log_level',
    type: 'log level',
    description: 'Lowest logged level (debug, info, warning, error, critical)',
    apply: (overrides, value, envVar) => {
      overrides.log_level = coerceToLogLevel(value, envVar);
    },
  },
];

/**
 * Result of reading environment variable overrides.
 */
export interface EnvOverrideResult {
  /** Settings taken from environment variables. */
  overrides: PartialRunSettings;
  /** List of environment variables that were applied. */
  appliedVars: string[];
  /** List of any coercion errors encountered. */
  errors: EnvCoercionError[];
}

/**
 * Reads environment variables and returns settings overrides.
 *
 * Empty values are treated as unset.
 *
 * @param env - The environment object to read from (defaults to process.env).
 * @param options - Set `collectErrors` to gather coercion errors instead of throwing the first.
 * @returns Result containing overrides and any errors.
 *
 * @example
 * ```typescript
 * const result = readEnvOverrides({ CONFIG_ROUNDTRIP_LOG_LEVEL: 'warning' });
 * console.log(result.overrides); // { log_level: 'warning' }
 * ```
 */
export function readEnvOverrides(
  env: EnvRecord = process.env,
  options: { collectErrors?: boolean } = {}
): EnvOverrideResult {
  const { collectErrors = false } = options;

  const overrides: PartialRunSettings = {};
  const appliedVars: string[] = [];
  const errors: EnvCoercionError[] = [];

  for (const mapping of ENV_VAR_MAPPINGS) {
    const value = env[mapping.envVar];

    if (value === undefined || value === '') {
      continue;
    }

    try {
      mapping.apply(overrides, value, mapping.envVar);
      appliedVars.push(mapping.envVar);
    } catch (error) {
      if (error instanceof EnvCoercionError && collectErrors) {
        errors.push(error);
      } else {
        throw error;
      }
    }
  }

  return { overrides, appliedVars, errors };
}

/**
 * Layers defaults, environment overrides and flag overrides.
 *
 * @param flags - Settings given on the command line.
 * @param env - The environment object to read from (defaults to process.env).
 * @returns Complete run settings.
 * @throws EnvCoercionError if an environment variable cannot be coerced.
 */
export function resolveRunSettings(
  flags: PartialRunSettings = {},
  env: EnvRecord = process.env
): RunSettings {
  const { overrides } = readEnvOverrides(env);
  return {
    ...DEFAULT_RUN_SETTINGS,
    ...overrides,
    ...flags,
  };
}

/**
 * Gets documentation for all supported environment variables.
 *
 * @returns Documentation entries in a stable order.
 */
export function getEnvVarDocumentation(): {
  envVar: string;
  field: keyof RunSettings;
  type: string;
  description: string;
}[] {
  return ENV_VAR_MAPPINGS.map(({ envVar, field, type, description }) => ({
    envVar,
    field,
    type,
    description,
  }));
}
