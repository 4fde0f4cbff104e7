/**
 * Field checks: validate a decoded JSON value against an expected shape.
 *
 * Checks never throw on a shape mismatch; they return a tagged
 * {@link CheckResult}. {@link coerce} is the throwing entry point used by the
 * config model.
 *
 * @packageDocumentation
 */

import { TypeMismatchError } from '../errors.js';
import { parseBooleanWord } from '../utils/strings.js';
import type {
  Check,
  CheckResult,
  JsonObject,
  Mismatch,
  PathSegment,
  Serializable,
} from './types.js';

/**
 * Names the kind of a raw value for diagnostics.
 *
 * @param value - Any value.
 * @returns One of `absent`, `null`, `bool`, `int`, `unsafe-int`, `float`,
 *   `string`, `array`, `object`, or the `typeof` name for anything else.
 *   `unsafe-int` is an integral number beyond ±(2^53 - 1), which cannot be
 *   held exactly.
 */
export function describeValue(value: unknown): string {
  if (value === undefined) {
    return 'absent';
  }
  if (value === null) {
    return 'null';
  }
  if (Array.isArray(value)) {
    return 'array';
  }
  switch (typeof value) {
    case 'boolean':
      return 'bool';
    case 'number':
      if (Number.isSafeInteger(value)) {
        return 'int';
      }
      return Number.isInteger(value) ? 'unsafe-int' : 'float';
    case 'string':
      return 'string';
    case 'object':
      return 'object';
    default:
      return typeof value;
  }
}

/**
 * Guard for a decoded JSON object (not `null`, not an array).
 */
export function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Builds a successful result.
 */
export function success<T>(value: T): CheckResult<T> {
  return { ok: true, value };
}

/**
 * Builds a failed result for a value that did not have the expected shape.
 *
 * @param expected - Shape names that were tried.
 * @param value - The offending value.
 */
export function failure<T>(expected: readonly string[], value: unknown): CheckResult<T> {
  return {
    ok: false,
    mismatch: { path: [], expected, received: describeValue(value), value },
  };
}

/**
 * Moves a nested mismatch one level down, under `segment`.
 */
export function nestMismatch<T>(segment: PathSegment, mismatch: Mismatch): CheckResult<T> {
  return { ok: false, mismatch: { ...mismatch, path: [segment, ...mismatch.path] } };
}

function defineCheck<T>(name: string, guard: (value: unknown) => value is T): Check<T> {
  return {
    name,
    run: (value) => (guard(value) ? success(value) : failure([name], value)),
  };
}

/** Accepts a JSON boolean. */
export const expectBool: Check<boolean> = defineCheck(
  'bool',
  (value): value is boolean => typeof value === 'boolean'
);

/** Accepts an integral JSON number that survives decoding unrounded. */
export const expectInt: Check<number> = defineCheck(
  'int',
  (value): value is number => typeof value === 'number' && Number.isSafeInteger(value)
);

/** Accepts a JSON string. */
export const expectString: Check<string> = defineCheck(
  'string',
  (value): value is string => typeof value === 'string'
);

/**
 * Accepts JSON `null` or an absent value; both come out as `null`.
 */
export const expectNull: Check<null> = {
  name: 'null',
  run: (value) => (value === null || value === undefined ? success(null) : failure(['null'], value)),
};

/**
 * Accepts a string and reads it with the boolean-word recognizer.
 */
export const expectBoolWord: Check<boolean> = {
  name: 'string',
  run: (value) =>
    typeof value === 'string' ? success(parseBooleanWord(value)) : failure(['string'], value),
};

/**
 * Accepts an array whose every item passes `element`.
 *
 * The first failing item stops the check; its index is prepended to the
 * mismatch path.
 *
 * @param element - Check applied to each item.
 * @returns A check named `list<element>`.
 */
export function expectList<T>(element: Check<T>): Check<T[]> {
  const name = `list<${element.name}>`;
  return {
    name,
    run: (value) => {
      if (!Array.isArray(value)) {
        return failure([name], value);
      }
      const items: T[] = [];
      for (let index = 0; index < value.length; index++) {
        const result = element.run(value[index]);
        if (!result.ok) {
          return nestMismatch(index, result.mismatch);
        }
        items.push(result.value);
      }
      return success(items);
    },
  };
}

/**
 * Tries each check in order and keeps the first success.
 *
 * When every alternative fails, the mismatch names all of them. The exception
 * is an alternative that accepted the outer shape but failed below it (a list
 * with one bad item): if exactly one alternative got that far, its nested
 * mismatch is reported so the path to the bad item is kept, and the
 * alternatives are recorded in its `within`.
 *
 * @param checks - Alternatives, in priority order.
 * @returns A check producing the union of the alternatives' types.
 *
 * @example
 * ```typescript
 * const optionalInt = expectOneOf<number | null>([expectNull, expectInt]);
 * optionalInt.run(3); // { ok: true, value: 3 }
 * optionalInt.run('3'); // { ok: false, mismatch: { expected: ['null', 'int'], ... } }
 * ```
 */
export function expectOneOf<T>(checks: readonly Check<T>[]): Check<T> {
  const names = checks.map((check) => check.name);
  return {
    name: names.join(' | '),
    run: (value) => {
      const nested: Mismatch[] = [];
      for (const check of checks) {
        const result = check.run(value);
        if (result.ok) {
          return result;
        }
        if (result.mismatch.path.length > 0) {
          nested.push(result.mismatch);
        }
      }
      const [only] = nested;
      if (nested.length === 1 && only !== undefined) {
        return { ok: false, mismatch: { ...only, within: only.within ?? names } };
      }
      return failure(names, value);
    },
  };
}

/**
 * Accepts instances of a {@link Serializable} record type and yields their
 * JSON-ready object.
 *
 * Only a {@link TypeMismatchError} thrown by the record is turned into a
 * mismatch; any other error propagates.
 *
 * @param name - Record type name used in diagnostics.
 * @param isInstance - Guard recognising the record type.
 */
export function toSerializable<T extends Serializable>(
  name: string,
  isInstance: (value: unknown) => value is T
): Check<JsonObject> {
  return {
    name,
    run: (value) => {
      if (!isInstance(value)) {
        return failure([name], value);
      }
      try {
        return success(value.toJsonObject());
      } catch (error) {
        if (error instanceof TypeMismatchError) {
          return {
            ok: false,
            mismatch: {
              path: error.segments,
              expected: error.expected,
              received: error.received,
              value: error.value,
              ...(error.within !== undefined ? { within: error.within } : {}),
            },
          };
        }
        throw error;
      }
    },
  };
}

/**
 * Runs a check and throws on mismatch.
 *
 * @param check - The check to run.
 * @param value - Raw value.
 * @param field - Path of the value from the document root.
 * @returns The checked value.
 * @throws TypeMismatchError naming the full path of the failing value.
 */
export function coerce<T>(
  check: Check<T>,
  value: unknown,
  field: PathSegment | readonly PathSegment[]
): T {
  const result = check.run(value);
  if (result.ok) {
    return result.value;
  }
  const root = typeof field === 'string' || typeof field === 'number' ? [field] : field;
  throw new TypeMismatchError([...root, ...result.mismatch.path], result.mismatch);
}
