/**
 * Types for the field coercion library.
 *
 * @packageDocumentation
 */

/**
 * Any value `JSON.parse` can produce.
 */
export type JsonValue = null | boolean | number | string | JsonValue[] | JsonObject;

/**
 * A decoded JSON object.
 */
export interface JsonObject {
  [key: string]: JsonValue;
}

/**
 * One step in a field path: an object key or a list index.
 */
export type PathSegment = string | number;

/**
 * Why a value failed a check.
 */
export interface Mismatch {
  /** Location of the failing value, relative to the value that was checked. */
  readonly path: readonly PathSegment[];
  /** Names of the shapes that were tried. */
  readonly expected: readonly string[];
  /** Kind of the value that was received (see `describeValue`). */
  readonly received: string;
  /** The offending raw value. */
  readonly value: unknown;
  /**
   * Alternatives of the innermost union the value was nested in, when the
   * failure lies below one of them.
   */
  readonly within?: readonly string[];
}

/**
 * Tagged outcome of running a check.
 */
export type CheckResult<T> =
  | { readonly ok: true; readonly value: T }
  | { readonly ok: false; readonly mismatch: Mismatch };

/**
 * A named validator that turns a raw decoded value into a typed one.
 *
 * @template T - The type produced on success.
 */
export interface Check<T> {
  /** Shape name used in diagnostics, e.g. `int` or `list<string>`. */
  readonly name: string;
  /** Validates `value` without throwing on a shape mismatch. */
  readonly run: (value: unknown) => CheckResult<T>;
}

/**
 * Capability of records that can produce a JSON-ready mapping of themselves.
 */
export interface Serializable {
  /**
   * Returns the record as a plain JSON object.
   *
   * @throws TypeMismatchError if a field no longer holds a valid value.
   */
  toJsonObject(): JsonObject;
}
