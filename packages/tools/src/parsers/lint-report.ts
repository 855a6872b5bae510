/**
 * Parser for the plain-text report of `reuse lint`
 */

/**
 * Heading that ends the per-file sections of the report
 */
export const SUMMARY_HEADING = '# SUMMARY';

/**
 * Prefix of a file entry in the report
 */
const ITEM_PREFIX = '* ';

/**
 * Extract the file paths listed before the summary section.
 * Paths reported in several sections are returned once, in first-seen order.
 */
export function parseLintReport(output: string): string[] {
  const files: string[] = [];
  const seen = new Set<string>();

  for (const line of output.split(/\r?\n/)) {
    const stripped = line.trim();
    if (stripped.startsWith(SUMMARY_HEADING)) {
      break;
    }
    if (!stripped.startsWith(ITEM_PREFIX)) {
      continue;
    }

    const path = stripped.slice(ITEM_PREFIX.length).trim();
    if (path && !seen.has(path)) {
      seen.add(path);
      files.push(path);
    }
  }

  return files;
}
