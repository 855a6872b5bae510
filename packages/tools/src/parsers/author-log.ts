/**
 * Parser for one-author-per-line `git log` output
 */

/**
 * Distinct author names in order of first appearance.
 * Names are compared as exact strings after trimming.
 */
export function parseAuthorLog(output: string): string[] {
  return uniqueInOrder(
    output
      .split(/\r?\n/)
      .map((line) => line.trim())
      .filter((line) => line.length > 0),
  );
}

/**
 * Drop repeated values, keeping the first occurrence
 */
export function uniqueInOrder(values: Iterable<string>): string[] {
  return [...new Set(values)];
}
