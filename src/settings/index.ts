/**
 * Run settings for the command-line tool: defaults and environment overrides.
 *
 * Override precedence: flags > env > defaults
 *
 * @packageDocumentation
 */

export { DEFAULT_RUN_SETTINGS } from './defaults.js';
export {
  EnvCoercionError,
  getEnvVarDocumentation,
  readEnvOverrides,
  resolveRunSettings,
} from './env.js';
export type { EnvOverrideResult, EnvRecord } from './env.js';
export type { PartialRunSettings, RunSettings } from './types.js';
