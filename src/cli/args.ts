/**
 * Command-line argument parsing.
 */

import { parseLogLevel } from '../utils/logger.js';
import type { PartialRunSettings } from '../settings/index.js';
import { CliUsageError } from './errors.js';
import type { ParsedArgs } from './types.js';

type ValueFlag = 'input_path' | 'output_directory' | 'output_filename' | 'log_file';

const VALUE_FLAGS: Readonly<Record<string, ValueFlag>> = {
  '--input': 'input_path',
  '-i': 'input_path',
  '--output-dir': 'output_directory',
  '-o': 'output_directory',
  '--output-file': 'output_filename',
  '-f': 'output_filename',
  '--log-file': 'log_file',
};

/**
 * Splits `--flag=value` into its parts.
 */
function splitInlineValue(arg: string): [string, string | undefined] {
  const eq = arg.indexOf('=');
  if (!arg.startsWith('--') || eq === -1) {
    return [arg, undefined];
  }
  return [arg.slice(0, eq), arg.slice(eq + 1)];
}

/**
 * Parses the arguments after the program name.
 *
 * With no arguments the command is `run` with no flags.
 *
 * @param args - Arguments, e.g. `process.argv.slice(2)`.
 * @returns The command and the settings given as flags.
 * @throws CliUsageError for unknown arguments or flags missing their value.
 */
export function parseCliArgs(args: readonly string[]): ParsedArgs {
  const flags: PartialRunSettings = {};
  let command: ParsedArgs['command'] = 'run';

  for (let i = 0; i < args.length; i++) {
    const arg = args[i] ?? '';
    const [name, inlineValue] = splitInlineValue(arg);

    if (name === 'help' || name === '--help' || name === '-h') {
      command = 'help';
      continue;
    }
    if (name === 'version' || name === '--version' || name === '-v') {
      if (command !== 'help') {
        command = 'version';
      }
      continue;
    }
    if (name === '--no-log-file') {
      flags.log_to_file = false;
      continue;
    }

    const takesValue = name === '--log-level' || Object.hasOwn(VALUE_FLAGS, name);
    if (!takesValue) {
      throw new CliUsageError(`Unknown argument: ${arg}`);
    }

    let value = inlineValue;
    if (value === undefined) {
      value = args[i + 1];
      i++;
    }
    if (value === undefined || value === '') {
      throw new CliUsageError(`Missing value for ${name}`);
    }

    if (name === '--log-level') {
      const level = parseLogLevel(value);
      if (level === undefined) {
        throw new CliUsageError(
          `Invalid value for --log-level: '${value}'. Expected one of: debug, info, warning, error, critical`
        );
      }
      flags.log_level = level;
      continue;
    }

    const field = VALUE_FLAGS[name];
    if (field !== undefined) {
      flags[field] = value;
    }
  }

  return { command, flags };
}
