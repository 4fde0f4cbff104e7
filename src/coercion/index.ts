/**
 * Field coercion library.
 *
 * Validates raw decoded JSON values against expected shapes and raises a
 * typed failure on mismatch.
 *
 * @packageDocumentation
 */

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
  failure,
  isJsonObject,
  nestMismatch,
  success,
  toSerializable,
} from './checks.js';
export type {
  Check,
  CheckResult,
  JsonObject,
  JsonValue,
  Mismatch,
  PathSegment,
  Serializable,
} from './types.js';
