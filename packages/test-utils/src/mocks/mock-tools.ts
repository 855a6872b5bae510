/**
 * Mock tool adapters for pipeline testing
 *
 * Each factory implements one contract from @reuseify/types with vi.fn so
 * tests can assert on the calls made.
 */

import type { AnnotationOutcome } from '@reuseify/types';
import { vi } from 'vitest';

/**
 * Configuration for the mock linter
 */
export interface MockLinterConfig {
  /** Files reported as missing headers, in report order */
  files?: string[];
  /** Make the linter fail with this error */
  error?: Error;
}

/**
 * Create a mock license linter
 */
export function createMockLinter(config: MockLinterConfig = {}) {
  const { files = [], error } = config;

  const listMissingHeaders = vi.fn(async (): Promise<string[]> => {
    if (error) {
      throw error;
    }
    return [...files];
  });

  return { listMissingHeaders };
}

export type MockLinter = ReturnType<typeof createMockLinter>;

/**
 * Configuration for the mock history service
 */
export interface MockHistoryConfig {
  /** Authors per path, one entry per commit, oldest first (may repeat) */
  commits?: Record<string, string[]>;
  /** Paths whose history lookup fails */
  failures?: Set<string>;
}

/**
 * Create a mock history service.
 * Returns distinct names in first-appearance order, like the git client.
 */
export function createMockHistory(config: MockHistoryConfig = {}) {
  const commits = new Map(Object.entries(config.commits ?? {}));
  const failures = config.failures ?? new Set<string>();

  const authorsOf = vi.fn(async (path: string): Promise<string[]> => {
    if (failures.has(path)) {
      throw new Error(`fatal: cannot read history of ${path}`);
    }
    return [...new Set(commits.get(path) ?? [])];
  });

  return { authorsOf };
}

export type MockHistory = ReturnType<typeof createMockHistory>;

/**
 * Create a mock ignore checker
 */
export function createMockIgnoreChecker(ignored: Iterable<string> = []) {
  const ignoredPaths = new Set(ignored);

  const isIgnored = vi.fn(async (path: string): Promise<boolean> => ignoredPaths.has(path));

  return { isIgnored };
}

export type MockIgnoreChecker = ReturnType<typeof createMockIgnoreChecker>;

/**
 * Configuration for the mock annotator
 */
export interface MockAnnotatorConfig {
  /** Paths the annotator fails on, with the captured error */
  failures?: Record<string, string>;
  /** Paths the annotator declines, with the reason */
  skips?: Record<string, string>;
  /** Paths for which the tool cannot be started at all */
  crashes?: Set<string>;
}

/**
 * Create a mock annotator; every other path succeeds
 */
export function createMockAnnotator(config: MockAnnotatorConfig = {}) {
  const failures = new Map(Object.entries(config.failures ?? {}));
  const skips = new Map(Object.entries(config.skips ?? {}));
  const crashes = config.crashes ?? new Set<string>();

  const annotate = vi.fn(
    async (
      path: string,
      contributors: readonly string[],
      _extraArgs: readonly string[],
    ): Promise<AnnotationOutcome> => {
      if (crashes.has(path)) {
        throw new Error('Command not found: reuse');
      }
      const error = failures.get(path);
      if (error !== undefined) {
        return { status: 'failed', path, error };
      }
      const reason = skips.get(path);
      if (reason !== undefined) {
        return { status: 'skipped', path, reason };
      }
      return { status: 'success', path, contributors: [...contributors] };
    },
  );

  return { annotate };
}

export type MockAnnotator = ReturnType<typeof createMockAnnotator>;
