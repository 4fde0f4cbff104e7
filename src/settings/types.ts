/**
 * Runtime settings for the command-line tool.
 *
 * @packageDocumentation
 */

import type { LogLevel } from '../utils/logger.js';

/**
 * Where to read, where to write, and how to log.
 */
export interface RunSettings {
  /** Configuration file to load. */
  input_path: string;
  /** Existing directory that receives the re-serialized file. */
  output_directory: string;
  /** Name of the re-serialized file. */
  output_filename: string;
  /** Log file path. */
  log_file: string;
  /** Whether to write the log file at all. */
  log_to_file: boolean;
  /** Lowest level that is logged. */
  log_level: LogLevel;
}

/**
 * Settings where every field is optional, for layering overrides.
 */
export type PartialRunSettings = Partial<RunSettings>;
