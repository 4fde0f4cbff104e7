/**
 * config-roundtrip
 *
 * Schema-driven configuration round trip: read a JSON document, validate each
 * field, work with a typed record, and write it back as normalized JSON.
 *
 * @packageDocumentation
 */

// Config model
export {
  Config,
  ObjectEntry,
  CONFIG_KEYS,
  OBJECT_ENTRY_KEYS,
  OUTPUT_INDENT,
  configToJson,
  readJsonObject,
  type ConfigFields,
  type ConfigIoOptions,
} from './model/index.js';

// Field coercion library
export {
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
  type Check,
  type CheckResult,
  type JsonObject,
  type JsonValue,
  type Mismatch,
  type PathSegment,
  type Serializable,
} from './coercion/index.js';

// Errors
export {
  ConfigError,
  InvariantViolationError,
  NotFoundError,
  ParseError,
  TypeMismatchError,
  formatFieldPath,
  type ConfigErrorCode,
} from './errors.js';

// Logging
export {
  Logger,
  LOG_LEVEL_SEVERITY,
  parseLogLevel,
  silentLogger,
  type LogEntry,
  type LogLevel,
  type LoggerOptions,
  type LoggingPort,
} from './utils/logger.js';

// CLI
export { runCli } from './cli/app.js';
export { getVersion } from './cli/version.js';
