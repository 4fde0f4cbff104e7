/**
 * Default run settings.
 *
 * @packageDocumentation
 */

import type { RunSettings } from './types.js';

/**
 * Defaults used when neither the environment nor a flag says otherwise.
 * Relative paths resolve against the working directory.
 */
export const DEFAULT_RUN_SETTINGS: Readonly<RunSettings> = {
  input_path: 'config/config.json',
  output_directory: '.',
  output_filename: 'processed_json.json',
  log_file: 'log.log',
  log_to_file: true,
  log_level: 'debug',
};
