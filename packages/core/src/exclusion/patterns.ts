/**
 * Path exclusion rules
 *
 * Patterns are globs matched against each component of a path, so `build`
 * drops `build/output.py` and `pkg/build/x.py` alike.
 */

import { minimatch } from 'minimatch';

/**
 * Patterns always applied: caches, build output, VCS and editor metadata,
 * packaging byproducts, dependency and virtual-environment directories
 */
export const DEFAULT_EXCLUDE_PATTERNS: readonly string[] = [
  '__pycache__',
  '.venv',
  'venv',
  '.env',
  'env',
  '.git',
  '.vscode',
  '.idea',
  '*.egg-info',
  '*.pyc',
  'dist',
  'build',
  'node_modules',
  '.tox',
  '.mypy_cache',
  '.pytest_cache',
  '.ruff_cache',
];

const MATCH_OPTIONS = { dot: true } as const;

/**
 * Split a relative path into its components
 */
export function pathComponents(filePath: string): string[] {
  return filePath.split(/[\\/]+/).filter((part) => part.length > 0 && part !== '.');
}

/**
 * Whether any component of the path matches any pattern
 */
export function isPathExcluded(filePath: string, patterns: readonly string[]): boolean {
  const parts = pathComponents(filePath);
  return parts.some((part) => patterns.some((pattern) => minimatch(part, pattern, MATCH_OPTIONS)));
}

/**
 * Built-in patterns followed by the extra ones, without duplicates
 */
export function combinePatterns(extra: readonly string[] = []): string[] {
  return [...new Set([...DEFAULT_EXCLUDE_PATTERNS, ...extra])];
}

/**
 * Split paths into kept and excluded, preserving order
 */
export function partitionExcluded(
  paths: readonly string[],
  patterns: readonly string[],
): { kept: string[]; excluded: string[] } {
  const kept: string[] = [];
  const excluded: string[] = [];

  for (const filePath of paths) {
    if (isPathExcluded(filePath, patterns)) {
      excluded.push(filePath);
    } else {
      kept.push(filePath);
    }
  }

  return { kept, excluded };
}
