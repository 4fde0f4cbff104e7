/**
 * String helpers shared by the coercion library and the logger.
 *
 * @packageDocumentation
 */

/**
 * Words that the boolean-word recognizer reads as `true`.
 */
export const BOOLEAN_TRUE_WORDS: readonly string[] = ['true', 'yes', 'y'];

/**
 * Options for {@link matchesAnyOption}.
 */
export interface MatchOptions {
  /**
   * Compare with case preserved.
   * @defaultValue false
   */
  readonly caseSensitive?: boolean;

  /**
   * Require the whole option to equal the value. When `false`, the value only
   * has to occur somewhere inside an option.
   * @defaultValue true
   */
  readonly exactMatch?: boolean;
}

/**
 * Checks a string against a list of options.
 *
 * @param value - The string to look for.
 * @param options - Candidate strings.
 * @param matchOptions - Case and containment rules.
 * @returns Whether any option matches.
 *
 * @example
 * ```typescript
 * matchesAnyOption('YES', ['yes', 'no']); // true
 * matchesAnyOption('arn', ['warning'], { exactMatch: false }); // true
 * ```
 */
export function matchesAnyOption(
  value: string,
  options: readonly string[],
  matchOptions: MatchOptions = {}
): boolean {
  const { caseSensitive = false, exactMatch = true } = matchOptions;
  const needle = caseSensitive ? value : value.toLowerCase();

  return options.some((option) => {
    const candidate = caseSensitive ? option : option.toLowerCase();
    return exactMatch ? candidate === needle : candidate.includes(needle);
  });
}

/**
 * Reads a human-written boolean word.
 *
 * `"true"`, `"yes"` and `"y"` (any case) are `true`; every other string,
 * including `"false"` and `""`, is `false`.
 *
 * @param value - The word to read.
 * @returns The boolean it denotes.
 */
export function parseBooleanWord(value: string): boolean {
  return matchesAnyOption(value, BOOLEAN_TRUE_WORDS);
}
