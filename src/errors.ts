/**
 * Error taxonomy shared by the coercion library, the config model and the
 * utility layer.
 *
 * @packageDocumentation
 */

import type { Mismatch, PathSegment } from './coercion/types.js';

/**
 * Error codes for programmatic handling.
 */
export type ConfigErrorCode = 'NOT_FOUND' | 'PARSE_ERROR' | 'TYPE_MISMATCH' | 'INVARIANT_VIOLATION';

/**
 * Base class for every failure raised while loading or saving a configuration.
 */
export class ConfigError extends Error {
  /** The error code for programmatic handling. */
  public readonly code: ConfigErrorCode;
  /** The underlying cause if available. */
  public readonly cause: Error | undefined;

  /**
   * Creates a new ConfigError.
   *
   * @param message - Human-readable error message.
   * @param code - The error code.
   * @param cause - The underlying error, if any.
   */
  constructor(message: string, code: ConfigErrorCode, cause?: Error) {
    super(message);
    this.name = 'ConfigError';
    this.code = code;
    this.cause = cause;
  }
}

/**
 * A required path (input file, output directory or a path-valued field) does
 * not exist.
 */
export class NotFoundError extends ConfigError {
  /** The path as it was given. */
  public readonly path: string;
  /** The config field holding the path, when the path came from a field. */
  public readonly field: string | undefined;

  constructor(path: string, message?: string, field?: string) {
    super(message ?? `Path '${path}' does not exist`, 'NOT_FOUND');
    this.name = 'NotFoundError';
    this.path = path;
    this.field = field;
  }
}

/**
 * The document is not valid JSON, or its top-level value is not an object.
 */
export class ParseError extends ConfigError {
  /** The file the text was read from. */
  public readonly source: string | undefined;

  constructor(message: string, source?: string, cause?: Error) {
    super(message, 'PARSE_ERROR', cause);
    this.name = 'ParseError';
    this.source = source;
  }
}

/**
 * Renders a field path such as `object_list[1].obj_id`.
 *
 * @param segments - Keys and list indexes from the root.
 * @returns The dotted path, or `<root>` for an empty path.
 */
export function formatFieldPath(segments: readonly PathSegment[]): string {
  let result = '';
  for (const segment of segments) {
    if (typeof segment === 'number') {
      result += `[${String(segment)}]`;
    } else {
      result += result === '' ? segment : `.${segment}`;
    }
  }
  return result === '' ? '<root>' : result;
}

function previewValue(value: unknown): string {
  if (value === undefined) {
    return '';
  }
  try {
    // JSON.stringify yields undefined for functions and symbols
    const text: string | undefined = JSON.stringify(value);
    if (text === undefined) {
      return ` ${String(value)}`;
    }
    return text.length > 80 ? ` ${text.slice(0, 77)}...` : ` ${text}`;
  } catch {
    return ` ${String(value)}`;
  }
}

/**
 * A value matched none of the shapes its field accepts.
 */
export class TypeMismatchError extends ConfigError {
  /** Full path of the offending field, e.g. `object_list[1].obj_id`. */
  public readonly field: string;
  /** Shape names that were tried, in order. */
  public readonly expected: readonly string[];
  /** Kind of the value that was received. */
  public readonly received: string;
  /** The offending raw value. */
  public readonly value: unknown;
  /** Field path as segments from the document root. */
  public readonly segments: readonly PathSegment[];
  /** Alternatives of the union the failing value sat under, if any. */
  public readonly within: readonly string[] | undefined;

  constructor(segments: readonly PathSegment[], mismatch: Mismatch) {
    const field = formatFieldPath(segments);
    const expected =
      mismatch.expected.length === 1
        ? (mismatch.expected[0] ?? '')
        : `one of (${mismatch.expected.join(', ')})`;
    const context = mismatch.within !== undefined ? ` (in ${mismatch.within.join(' | ')})` : '';
    super(
      `Invalid type for '${field}': expected ${expected}${context}, got ${mismatch.received}${previewValue(mismatch.value)}`,
      'TYPE_MISMATCH'
    );
    this.name = 'TypeMismatchError';
    this.field = field;
    this.expected = mismatch.expected;
    this.received = mismatch.received;
    this.value = mismatch.value;
    this.segments = segments;
    this.within = mismatch.within;
  }
}

/**
 * An internal consistency rule of the utility layer was broken.
 */
export class InvariantViolationError extends ConfigError {
  /** Structured context for the violation. */
  public readonly details: Readonly<Record<string, unknown>>;

  constructor(message: string, details: Readonly<Record<string, unknown>> = {}) {
    super(message, 'INVARIANT_VIOLATION');
    this.name = 'InvariantViolationError';
    this.details = details;
  }
}
