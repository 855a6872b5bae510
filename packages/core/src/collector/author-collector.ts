/**
 * Author Collector
 *
 * Resolves every file the linter reports as missing a header to the people
 * who committed to it:
 * 1. List files missing headers (linter)
 * 2. Drop excluded and ignored paths
 * 3. Look up distinct authors per file (history)
 * 4. Keep or omit files without history
 *
 * Files are processed one at a time in report order, which is also the order
 * of the resulting map.
 */

import type { AuthorMap, HistoryService, IgnoreChecker, LicenseLinter } from '@reuseify/types';

import { combinePatterns, partitionExcluded } from '../exclusion/patterns.js';

/**
 * Tools the collector drives
 */
export interface CollectorTools {
  linter: LicenseLinter;
  history: HistoryService;
  ignoreChecker: IgnoreChecker;
}

/**
 * Collector options
 */
export interface CollectorOptions {
  /** Keep files without history, with an empty author list */
  includeUntracked?: boolean;
  /** Extra exclusion globs, on top of the built-in ones */
  exclude?: readonly string[];
  /** Progress listener */
  onEvent?: (event: CollectorEvent) => void;
}

/**
 * Counters for a collector run
 */
export interface CollectionStats {
  /** Files reported by the linter */
  reported: number;
  /** Files dropped by patterns or ignore rules */
  excluded: number;
  /** Files with at least one author */
  tracked: number;
  /** Files without history (including failed lookups) */
  untracked: number;
  /** Untracked files left out of the map */
  omitted: number;
  /** History lookups that failed */
  historyErrors: number;
}

/**
 * Collector result
 */
export interface CollectionResult {
  authors: AuthorMap;
  stats: CollectionStats;
}

/**
 * Why a reported file was left out
 */
export type ExclusionReason = 'pattern' | 'ignored';

/**
 * Progress events, in the order they occur
 */
export type CollectorEvent =
  | { type: 'lint-complete'; files: number }
  | { type: 'ignore-error'; path: string; error: Error }
  | { type: 'file-excluded'; path: string; reason: ExclusionReason }
  | { type: 'filtered'; kept: number; excludedByPattern: number; ignored: number }
  | { type: 'file-resolved'; path: string; authors: string[]; index: number; total: number }
  | { type: 'file-untracked'; path: string; included: boolean; index: number; total: number }
  | { type: 'history-error'; path: string; error: Error }
  | { type: 'complete'; stats: CollectionStats };

/**
 * Collect authors for every file missing a license header.
 * Linter failures reject; per-file history failures are reported and the
 * file treated as untracked.
 */
export async function collectAuthors(
  tools: CollectorTools,
  options: CollectorOptions = {},
): Promise<CollectionResult> {
  const { includeUntracked = false, exclude = [], onEvent } = options;
  const emit = (event: CollectorEvent): void => onEvent?.(event);

  const reported = [...new Set(await tools.linter.listMissingHeaders())];
  emit({ type: 'lint-complete', files: reported.length });

  const { kept: unmatched, excluded } = partitionExcluded(reported, combinePatterns(exclude));
  for (const filePath of excluded) {
    emit({ type: 'file-excluded', path: filePath, reason: 'pattern' });
  }

  const files: string[] = [];
  for (const filePath of unmatched) {
    if (await isIgnored(tools.ignoreChecker, filePath, emit)) {
      emit({ type: 'file-excluded', path: filePath, reason: 'ignored' });
    } else {
      files.push(filePath);
    }
  }
  const ignored = unmatched.length - files.length;
  emit({ type: 'filtered', kept: files.length, excludedByPattern: excluded.length, ignored });

  const authors: AuthorMap = new Map();
  const stats: CollectionStats = {
    reported: reported.length,
    excluded: excluded.length + ignored,
    tracked: 0,
    untracked: 0,
    omitted: 0,
    historyErrors: 0,
  };

  for (const [index, filePath] of files.entries()) {
    let names: string[];
    try {
      names = [...new Set(await tools.history.authorsOf(filePath))];
    } catch (error) {
      stats.historyErrors++;
      emit({ type: 'history-error', path: filePath, error: toError(error) });
      names = [];
    }

    if (names.length > 0) {
      stats.tracked++;
      authors.set(filePath, names);
      emit({ type: 'file-resolved', path: filePath, authors: names, index, total: files.length });
      continue;
    }

    stats.untracked++;
    if (includeUntracked) {
      authors.set(filePath, []);
    } else {
      stats.omitted++;
    }
    emit({
      type: 'file-untracked',
      path: filePath,
      included: includeUntracked,
      index,
      total: files.length,
    });
  }

  emit({ type: 'complete', stats });
  return { authors, stats };
}

/**
 * Ignore check that treats a failed lookup as "not ignored"
 */
async function isIgnored(
  checker: IgnoreChecker,
  filePath: string,
  emit: (event: CollectorEvent) => void,
): Promise<boolean> {
  try {
    return await checker.isIgnored(filePath);
  } catch (error) {
    emit({ type: 'ignore-error', path: filePath, error: toError(error) });
    return false;
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}
