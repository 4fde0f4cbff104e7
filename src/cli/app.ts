/**
 * The command-line application: load a configuration file, validate it and
 * write it back out.
 */

/* eslint-disable no-console */
import * as path from 'node:path';
import { Config } from '../model/index.js';
import { getEnvVarDocumentation, resolveRunSettings } from '../settings/index.js';
import type { EnvRecord, RunSettings } from '../settings/index.js';
import { Logger } from '../utils/logger.js';
import type { LoggingPort } from '../utils/logger.js';
import { parseCliArgs } from './args.js';
import { errorContextOf, exitCodeFor, formatErrorWithSuggestions } from './errors.js';
import type { CliCommand, CliCommandResult, CliRunOptions, DisplayOptions } from './types.js';
import { withErrorHandling } from './utils/errorHandling.js';
import { getVersion } from './version.js';

/**
 * Builds the help text.
 */
export function getHelpText(): string {
  const envLines = getEnvVarDocumentation()
    .map((doc) => `  ${doc.envVar.padEnd(30)} ${doc.description}`)
    .join('\n');

  return `
config-roundtrip v${getVersion()}

Loads a JSON configuration file, validates every field, and writes it back
out as normalized JSON.

USAGE:
  config-roundtrip [options]

OPTIONS:
  --input, -i <path>        Configuration file (default: config/config.json)
  --output-dir, -o <dir>    Output directory (default: working directory)
  --output-file, -f <name>  Output file name (default: processed_json.json)
  --log-file <path>         Log file (default: log.log)
  --no-log-file             Do not write a log file
  --log-level <level>       debug, info, warning, error or critical (default: debug)
  --help, -h                Show this help message
  --version, -v             Show version information

ENVIRONMENT:
${envLines}

EXAMPLES:
  config-roundtrip
  config-roundtrip --input settings.json --output-dir out --log-level info
`;
}

/** Component name of the CLI's own log entries. */
export const CLI_COMPONENT = 'config-roundtrip';

/** Component name of entries logged by the config model during a run. */
export const MODEL_COMPONENT = 'config-model';

function resolveAgainst(cwd: string, target: string): string {
  return path.resolve(cwd, target);
}

/**
 * Creates the process logger from run settings.
 *
 * @param settings - Resolved run settings.
 * @param cwd - Directory a relative log file resolves against.
 */
export function createRunLogger(settings: RunSettings, cwd: string): Logger {
  return new Logger({
    component: CLI_COMPONENT,
    level: settings.log_level,
    ...(settings.log_to_file ? { filePath: resolveAgainst(cwd, settings.log_file) } : {}),
  });
}

/**
 * Loads the configured input file and writes the normalized copy.
 *
 * @param settings - Resolved run settings.
 * @param cwd - Directory relative paths resolve against.
 * @param logger - Logger handed to the config model.
 */
export function runRoundTrip(settings: RunSettings, cwd: string, logger: LoggingPort): void {
  const config = Config.deserialize(resolveAgainst(cwd, settings.input_path), { logger });
  config.serialize(resolveAgainst(cwd, settings.output_directory), settings.output_filename, {
    logger,
  });
}

/**
 * Parses arguments and resolves settings, or reports why that failed.
 */
function prepareRun(
  args: readonly string[],
  env: EnvRecord,
  display: DisplayOptions
): { command: CliCommand; settings: RunSettings } | CliCommandResult {
  try {
    const parsed = parseCliArgs(args);
    return { command: parsed.command, settings: resolveRunSettings(parsed.flags, env) };
  } catch (error) {
    // No logger exists yet: report on stderr only.
    const context = errorContextOf(error);
    const message = error instanceof Error ? error.message : String(error);
    console.error(formatErrorWithSuggestions(message, context, display));
    return { exitCode: exitCodeFor(context.errorType) };
  }
}

/**
 * Runs the CLI.
 *
 * @param args - Arguments after the program name.
 * @param options - Environment, working directory, logger and display overrides.
 * @returns The exit code to end the process with.
 */
export function runCli(args: readonly string[], options: CliRunOptions = {}): CliCommandResult {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const display: DisplayOptions = options.display ?? { colors: process.stderr.isTTY === true };

  const prepared = prepareRun(args, env, display);
  if ('exitCode' in prepared) {
    return prepared;
  }
  const { command, settings } = prepared;

  switch (command) {
    case 'help':
      console.log(getHelpText());
      return { exitCode: 0 };
    case 'version':
      console.log(`config-roundtrip v${getVersion()}`);
      return { exitCode: 0 };
    case 'run':
      break;
  }

  const logger = options.logger ?? createRunLogger(settings, cwd);
  const modelLogger = logger instanceof Logger ? logger.child(MODEL_COMPONENT) : logger;

  return withErrorHandling(
    () => {
      runRoundTrip(settings, cwd, modelLogger);
      logger.debug('program_terminated');
      return { exitCode: 0 };
    },
    logger,
    display
  );
}
