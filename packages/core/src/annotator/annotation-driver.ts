/**
 * Annotation Driver
 *
 * Calls the annotator once per artifact entry, in artifact order, and
 * groups the outcomes. A failure on one file never stops the batch.
 */

import {
  createAnnotationReport,
  recordOutcome,
  type AnnotationOutcome,
  type AnnotationReport,
  type AnnotatorService,
  type AuthorMap,
} from '@reuseify/types';

/**
 * Driver options
 */
export interface AnnotationOptions {
  /** Contributors for entries without authors (default: none) */
  defaultContributors?: readonly string[];
  /** Arguments forwarded verbatim to every annotator call */
  extraArgs?: readonly string[];
  /** When given, entries whose file is missing are skipped without a call */
  fileExists?: (path: string) => boolean;
  /** Progress listener */
  onEvent?: (event: AnnotationEvent) => void;
}

/**
 * Progress events, per file
 */
export type AnnotationEvent =
  | { type: 'file-start'; path: string; contributors: string[]; index: number; total: number }
  | { type: 'file-done'; outcome: AnnotationOutcome; index: number; total: number };

/**
 * Skip reason for entries whose file no longer exists
 */
export const FILE_NOT_FOUND_REASON = 'file not found';

/**
 * Contributors for an entry: its own authors, or the defaults when it has none.
 * The two lists are never merged.
 */
export function resolveContributors(
  authors: readonly string[],
  defaultContributors: readonly string[],
): string[] {
  return authors.length > 0 ? [...authors] : [...defaultContributors];
}

/**
 * Annotate every file of the map and report the outcomes
 */
export async function driveAnnotation(
  annotator: AnnotatorService,
  authors: AuthorMap,
  options: AnnotationOptions = {},
): Promise<AnnotationReport> {
  const { defaultContributors = [], extraArgs = [], fileExists, onEvent } = options;
  const report = createAnnotationReport();
  const total = authors.size;

  let index = 0;
  for (const [filePath, names] of authors) {
    const contributors = resolveContributors(names, defaultContributors);
    onEvent?.({ type: 'file-start', path: filePath, contributors, index, total });

    const outcome = await annotateOne(annotator, filePath, contributors, extraArgs, fileExists);
    recordOutcome(report, outcome);

    onEvent?.({ type: 'file-done', outcome, index, total });
    index++;
  }

  return report;
}

/**
 * Whether any file failed; the CLI exit status follows this
 */
export function hasFailures(report: AnnotationReport): boolean {
  return report.failed.length > 0;
}

async function annotateOne(
  annotator: AnnotatorService,
  filePath: string,
  contributors: string[],
  extraArgs: readonly string[],
  fileExists: ((path: string) => boolean) | undefined,
): Promise<AnnotationOutcome> {
  if (fileExists && !fileExists(filePath)) {
    return { status: 'skipped', path: filePath, reason: FILE_NOT_FOUND_REASON };
  }

  try {
    return await annotator.annotate(filePath, contributors, extraArgs);
  } catch (error) {
    return {
      status: 'failed',
      path: filePath,
      error: error instanceof Error ? error.message : String(error),
    };
  }
}
