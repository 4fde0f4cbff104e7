/**
 * The configuration record and its JSON round trip.
 *
 * `Config.deserialize` reads and validates a JSON file; `config.serialize`
 * re-validates the in-memory values and writes them back out. Failures are
 * logged at `critical` level and then thrown; the process is never exited
 * from here.
 *
 * @packageDocumentation
 */

import * as path from 'node:path';
import {
  coerce,
  describeValue,
  expectBool,
  expectBoolWord,
  expectInt,
  expectList,
  expectNull,
  expectOneOf,
  expectString,
  isJsonObject,
  toSerializable,
} from '../coercion/index.js';
import type { JsonObject, JsonValue, Serializable } from '../coercion/index.js';
import { NotFoundError, ParseError, TypeMismatchError } from '../errors.js';
import { silentLogger } from '../utils/logger.js';
import type { LoggingPort } from '../utils/logger.js';
import {
  PathValidationError,
  isDirectorySync,
  resolveExistingPath,
  safeReadFileSync,
  safeWriteFileSync,
} from '../utils/safe-fs.js';
import { CONFIG_KEYS } from './keys.js';
import { ObjectEntry } from './object-entry.js';

/**
 * Field values of a {@link Config}. `null` means "no value", whether the key
 * was missing or explicitly `null`.
 */
export interface ConfigFields {
  sample_bool: boolean | null;
  /** Absolute real path, validated to exist when the config was read. */
  sample_path: string | null;
  sample_string: string | null;
  /** Integer. */
  sample_int: number | null;
  simple_list: string[] | null;
  object_list: ObjectEntry[] | null;
}

/**
 * Options shared by the read and write operations.
 */
export interface ConfigIoOptions {
  /**
   * Receives `info` entries on success and a `critical` entry before any
   * failure is thrown.
   * @defaultValue silentLogger
   */
  readonly logger?: LoggingPort;
}

const SAMPLE_BOOL_READ = expectOneOf<boolean | null>([expectBoolWord, expectBool, expectNull]);
const SAMPLE_BOOL_WRITE = expectOneOf<boolean | null>([expectNull, expectBool]);
const OPTIONAL_STRING = expectOneOf<string | null>([expectNull, expectString]);
const OPTIONAL_INT = expectOneOf<number | null>([expectNull, expectInt]);
const SIMPLE_LIST = expectOneOf<string[] | null>([expectList(expectString), expectNull]);
const OBJECT_LIST_READ = expectOneOf<ObjectEntry[] | null>([
  expectList(ObjectEntry.check),
  expectNull,
]);
const OBJECT_LIST_WRITE = expectOneOf<JsonObject[] | null>([
  expectList(toSerializable('ObjectEntry', ObjectEntry.isInstance)),
  expectNull,
]);

/** Indentation of written documents. */
export const OUTPUT_INDENT = 4;

function failureDetails(error: Error): Record<string, unknown> {
  const details: Record<string, unknown> = { error: error.name, message: error.message };
  if (error instanceof TypeMismatchError) {
    details.field = error.field;
    details.expected = error.expected;
    details.received = error.received;
    details.value = error.value;
    if (error.within !== undefined) {
      details.within = error.within;
    }
  } else if (error instanceof NotFoundError) {
    details.path = error.path;
    if (error.field !== undefined) {
      details.field = error.field;
    }
  } else if (error instanceof ParseError && error.source !== undefined) {
    details.source = error.source;
  }
  return details;
}

/**
 * Runs `fn`, logging anything it throws at `critical` level before rethrowing.
 */
function withFailureLogging<T>(logger: LoggingPort, event: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    logger.critical(
      event,
      error instanceof Error ? failureDetails(error) : { message: String(error) }
    );
    throw error;
  }
}

/**
 * Reads a JSON file whose top-level value must be an object.
 *
 * @param filePath - File to read.
 * @returns The decoded object.
 * @throws NotFoundError if the file does not exist or is a directory.
 * @throws ParseError if the file cannot be read, or its text is not JSON or not an object.
 */
export function readJsonObject(filePath: string): JsonObject {
  const resolved = resolveExistingPathOrThrow(filePath);
  if (isDirectorySync(resolved)) {
    throw new NotFoundError(filePath, `Input path '${resolved}' is a directory, not a file`);
  }

  let text: string;
  try {
    text = safeReadFileSync(resolved);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new ParseError(
      `Cannot read '${resolved}': ${cause?.message ?? String(error)}`,
      resolved,
      cause
    );
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch (error) {
    const cause = error instanceof Error ? error : undefined;
    throw new ParseError(
      `Invalid JSON in '${resolved}': ${cause?.message ?? String(error)}`,
      resolved,
      cause
    );
  }

  if (!isJsonObject(parsed)) {
    throw new ParseError(
      `Top-level JSON value in '${resolved}' must be an object, got ${describeValue(parsed)}`,
      resolved
    );
  }
  return parsed;
}

function resolveExistingPathOrThrow(filePath: string, field?: string): string {
  let resolved: string | undefined;
  try {
    resolved = resolveExistingPath(filePath);
  } catch (error) {
    if (error instanceof PathValidationError) {
      const subject = field !== undefined ? `Invalid path for '${field}'` : 'Invalid path';
      throw new NotFoundError(filePath, `${subject}: ${error.message}`, field);
    }
    throw error;
  }
  if (resolved === undefined) {
    const subject = field !== undefined ? `Path for '${field}'` : 'Path';
    throw new NotFoundError(
      filePath,
      `${subject} '${path.resolve(filePath)}' does not exist`,
      field
    );
  }
  return resolved;
}

/**
 * The top-level configuration record.
 *
 * @example
 * ```typescript
 * const config = Config.deserialize('config/config.json', { logger });
 * config.sample_int = 42;
 * config.serialize(process.cwd(), 'processed_json.json', { logger });
 * ```
 */
export class Config implements ConfigFields, Serializable {
  sample_bool: boolean | null;
  sample_path: string | null;
  sample_string: string | null;
  sample_int: number | null;
  simple_list: string[] | null;
  object_list: ObjectEntry[] | null;

  /**
   * Creates a config; omitted fields have no value.
   *
   * Values are not validated here. They are checked when written.
   */
  constructor(fields: Partial<ConfigFields> = {}) {
    this.sample_bool = fields.sample_bool ?? null;
    this.sample_path = fields.sample_path ?? null;
    this.sample_string = fields.sample_string ?? null;
    this.sample_int = fields.sample_int ?? null;
    this.simple_list = fields.simple_list ?? null;
    this.object_list = fields.object_list ?? null;
  }

  /**
   * Reads and validates a configuration file.
   *
   * @param filePath - JSON file to read.
   * @param options - Logging options.
   * @returns The validated config.
   * @throws NotFoundError if the file, or the path in `sample_path`, does not exist.
   * @throws ParseError if the file is not a JSON object.
   * @throws TypeMismatchError naming the first field with an unexpected shape.
   */
  static deserialize(filePath: string, options: ConfigIoOptions = {}): Config {
    const logger = options.logger ?? silentLogger;
    const raw = withFailureLogging(logger, 'config_read_failed', () => readJsonObject(filePath));
    return Config.fromJsonObject(raw, options);
  }

  /**
   * Validates an already-decoded document. Unknown keys are ignored.
   *
   * @param raw - Decoded top-level JSON object.
   * @param options - Logging options.
   * @returns The validated config.
   * @throws NotFoundError if `sample_path` names a path that does not exist.
   * @throws TypeMismatchError naming the first field with an unexpected shape.
   */
  static fromJsonObject(raw: JsonObject, options: ConfigIoOptions = {}): Config {
    const logger = options.logger ?? silentLogger;

    const config = withFailureLogging(logger, 'config_validation_failed', () => {
      const sampleBool = coerce(SAMPLE_BOOL_READ, raw[CONFIG_KEYS.sampleBool], CONFIG_KEYS.sampleBool);
      const samplePath = coerce(OPTIONAL_STRING, raw[CONFIG_KEYS.samplePath], CONFIG_KEYS.samplePath);
      const resolvedPath =
        samplePath === null ? null : resolveExistingPathOrThrow(samplePath, CONFIG_KEYS.samplePath);

      return new Config({
        sample_bool: sampleBool,
        sample_path: resolvedPath,
        sample_string: coerce(
          OPTIONAL_STRING,
          raw[CONFIG_KEYS.sampleString],
          CONFIG_KEYS.sampleString
        ),
        sample_int: coerce(OPTIONAL_INT, raw[CONFIG_KEYS.sampleInt], CONFIG_KEYS.sampleInt),
        simple_list: coerce(SIMPLE_LIST, raw[CONFIG_KEYS.simpleList], CONFIG_KEYS.simpleList),
        object_list: coerce(OBJECT_LIST_READ, raw[CONFIG_KEYS.objectList], CONFIG_KEYS.objectList),
      });
    });

    logger.info('config_deserialized', configToLogData(config));
    return config;
  }

  /**
   * Returns the config as a six-key JSON object, re-validating every field.
   *
   * @throws TypeMismatchError if a field was mutated into an invalid value.
   */
  toJsonObject(): JsonObject {
    return {
      [CONFIG_KEYS.sampleBool]: coerce(SAMPLE_BOOL_WRITE, this.sample_bool, CONFIG_KEYS.sampleBool),
      [CONFIG_KEYS.samplePath]: coerce(OPTIONAL_STRING, this.sample_path, CONFIG_KEYS.samplePath),
      [CONFIG_KEYS.sampleString]: coerce(
        OPTIONAL_STRING,
        this.sample_string,
        CONFIG_KEYS.sampleString
      ),
      [CONFIG_KEYS.sampleInt]: coerce(OPTIONAL_INT, this.sample_int, CONFIG_KEYS.sampleInt),
      [CONFIG_KEYS.simpleList]: coerce(SIMPLE_LIST, this.simple_list, CONFIG_KEYS.simpleList),
      [CONFIG_KEYS.objectList]: coerce(OBJECT_LIST_WRITE, this.object_list, CONFIG_KEYS.objectList),
    };
  }

  /**
   * Writes the config as pretty-printed JSON to `{directory}/{filename}`,
   * replacing any existing file.
   *
   * @param directory - Existing output directory.
   * @param filename - Name of the file to write.
   * @param options - Logging options.
   * @throws NotFoundError if `directory` does not exist or is not a directory.
   * @throws TypeMismatchError if a field holds an invalid value.
   */
  serialize(directory: string, filename: string, options: ConfigIoOptions = {}): void {
    const logger = options.logger ?? silentLogger;

    const target = withFailureLogging(logger, 'config_write_failed', () => {
      const resolvedDirectory = resolveExistingPathOrThrow(directory);
      if (!isDirectorySync(resolvedDirectory)) {
        throw new NotFoundError(
          directory,
          `Output directory '${resolvedDirectory}' is not a directory`
        );
      }
      const document = this.toJsonObject();
      const outputPath = path.join(resolvedDirectory, filename);
      safeWriteFileSync(outputPath, JSON.stringify(document, null, OUTPUT_INDENT));
      return outputPath;
    });

    logger.info('config_serialized', { path: target });
  }
}

/**
 * Returns the JSON-ready form of a config.
 *
 * @throws TypeMismatchError if a field holds an invalid value.
 */
export function configToJson(config: Config): JsonObject {
  return config.toJsonObject();
}

function configToLogData(config: Config): Record<string, JsonValue> {
  return {
    sample_bool: config.sample_bool,
    sample_path: config.sample_path,
    sample_string: config.sample_string,
    sample_int: config.sample_int,
    simple_list: config.simple_list,
    object_list:
      config.object_list?.map((entry) => ({ obj_id: entry.obj_id, obj_desc: entry.obj_desc })) ??
      null,
  };
}
