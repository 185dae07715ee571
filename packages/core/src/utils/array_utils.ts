/**
 * Array Utility Functions
 *
 * @module utils/array_utils
 */

/**
 * Removes duplicates keeping the first occurrence of each value.
 *
 * @example
 * uniqueInOrder(['work', 'q4', 'work']) // ['work', 'q4']
 */
export function uniqueInOrder<T>(values: readonly T[]): T[] {
  return Array.from(new Set(values));
}

/**
 * Splits a comma-separated list, trimming entries and dropping empty ones.
 *
 * @example
 * splitList('work, q4,,') // ['work', 'q4']
 */
export function splitList(value: string): string[] {
  return value
    .split(",")
    .map((entry) => entry.trim())
    .filter((entry) => entry.length > 0);
}
