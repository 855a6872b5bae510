/**
 * Classification of `reuse annotate` exits
 */

import type { AnnotationOutcome, ProcessResult } from '@reuseify/types';

/**
 * Output the annotator prints when it declines a file whose type it does not
 * recognise. Usage errors (`unrecognized arguments`, the `[--skip-unrecognised]`
 * usage line) are failures and must not match.
 */
export const SKIP_SIGNALS: readonly RegExp[] = [
  /\bdo(?:es)? not have a recogni[sz]ed file extension\b/i,
  /\bskipp(?:ed|ing) unrecogni[sz]ed file\b/i,
];

/**
 * First output line carrying a skip signal, if any
 */
export function findSkipSignal(output: string): string | null {
  for (const line of output.split(/\r?\n/)) {
    const stripped = line.trim();
    if (stripped && SKIP_SIGNALS.some((signal) => signal.test(stripped))) {
      return stripped;
    }
  }
  return null;
}

/**
 * Map an annotator exit to an outcome for the file
 */
export function classifyAnnotateResult(
  path: string,
  contributors: readonly string[],
  result: ProcessResult,
): AnnotationOutcome {
  if (result.exitCode === 0) {
    return { status: 'success', path, contributors: [...contributors] };
  }

  const reason = findSkipSignal(`${result.stderr}\n${result.stdout}`);
  if (reason !== null) {
    return { status: 'skipped', path, reason };
  }

  return {
    status: 'failed',
    path,
    error: result.stderr.trim() || result.stdout.trim(),
  };
}
