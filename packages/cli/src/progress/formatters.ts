/**
 * Output formatting utilities
 */

import type { CollectionStats, ExclusionReason } from '@reuseify/core';
import type { AnnotationReport } from '@reuseify/types';
import chalk from 'chalk';

import type { ReuseifyConfig } from '../config/schema.js';

import type { ColorFunctions } from './types.js';

/**
 * Color functions, or identity functions when color is off
 */
export function createColorFns(useColor: boolean): ColorFunctions {
  if (useColor) {
    return {
      bold: (text: string) => chalk.bold(text),
      dim: (text: string) => chalk.dim(text),
      green: (text: string) => chalk.green(text),
      red: (text: string) => chalk.red(text),
      yellow: (text: string) => chalk.yellow(text),
      cyan: (text: string) => chalk.cyan(text),
    };
  }
  const identity = (text: string): string => text;
  return {
    bold: identity,
    dim: identity,
    green: identity,
    red: identity,
    yellow: identity,
    cyan: identity,
  };
}

function formatList(values: readonly string[]): string {
  return values.length > 0 ? values.join(', ') : '(none)';
}

/**
 * Format configuration for display
 */
export function formatConfigDisplay(config: ReuseifyConfig, c: ColorFunctions): string {
  const lines: string[] = [];

  lines.push(c.bold('Configuration:'));
  lines.push('');

  lines.push(c.dim('Tools:'));
  lines.push(`  reuse: ${config.tools.reuse}`);
  lines.push(`  git: ${config.tools.git}`);
  lines.push(`  Working directory: ${config.tools.cwd}`);
  lines.push('');

  lines.push(c.dim('get-authors:'));
  lines.push(`  Output: ${config.authors.output}`);
  lines.push(`  Include files not in git: ${config.authors.includeNotInGit ? c.yellow('yes') : 'no'}`);
  lines.push(`  Extra exclude patterns: ${formatList(config.authors.exclude)}`);
  lines.push(`  Use mailmap: ${config.authors.useMailmap ? 'yes' : 'no'}`);
  lines.push('');

  lines.push(c.dim('annotate:'));
  lines.push(`  Input: ${config.annotate.input}`);
  lines.push(`  Default contributors: ${formatList(config.annotate.defaultContributors)}`);
  lines.push(`  Skip missing files: ${config.annotate.checkFilesExist ? 'yes' : 'no'}`);

  return lines.join('\n');
}

/**
 * One collector line: `path: A, B`
 */
export function formatAuthorLine(path: string, authors: readonly string[], c: ColorFunctions): string {
  return `  ${c.cyan(path)}: ${authors.join(', ')}`;
}

/**
 * One collector line for a file without history
 */
export function formatUntrackedLine(path: string, included: boolean, c: ColorFunctions): string {
  return included ? `  ${c.yellow(path)}: NOT_IN_GIT (included)` : `  ${c.dim(path)}: NOT_IN_GIT (omitted)`;
}

/**
 * One collector line for an excluded file (verbose only)
 */
export function formatExcludedLine(path: string, reason: ExclusionReason, c: ColorFunctions): string {
  return `  ${c.dim(path)}: excluded (${reason === 'pattern' ? 'path pattern' : '.gitignore'})`;
}

/**
 * Closing lines of a get-authors run
 */
export function formatCollectionSummary(
  stats: CollectionStats,
  outputPath: string,
  entries: number,
  c: ColorFunctions,
): string[] {
  const lines: string[] = [];

  if (stats.omitted > 0) {
    lines.push('');
    lines.push(
      `${c.yellow('Note:')} ${stats.omitted} file(s) with no git history were omitted. ` +
        `Use ${c.bold('--include-not-in-git')} / ${c.bold('-i')} to include them.`,
    );
  }

  lines.push('');
  lines.push(`${c.green('JSON written to:')} ${outputPath}`);
  lines.push(`Total entries:  ${entries}`);

  return lines;
}

/**
 * Grouped annotation report: Annotated, Skipped, Failed, then totals.
 * Empty groups are left out.
 */
export function formatAnnotationReport(report: AnnotationReport, c: ColorFunctions): string[] {
  const lines: string[] = [];

  if (report.succeeded.length > 0) {
    lines.push(c.bold('Annotated:'));
    for (const outcome of report.succeeded) {
      lines.push(`  ${c.bold(c.green('PASS'))}  ${outcome.path}  ${c.dim(`(${outcome.contributors.join(', ')})`)}`);
    }
    lines.push('');
  }

  if (report.skipped.length > 0) {
    lines.push(c.bold('Skipped:'));
    for (const outcome of report.skipped) {
      lines.push(`  ${c.yellow('SKIP')}  ${outcome.path}  ${c.dim(`(${outcome.reason})`)}`);
    }
    lines.push('');
  }

  if (report.failed.length > 0) {
    lines.push(c.bold('Failed:'));
    for (const outcome of report.failed) {
      lines.push(`  ${c.bold(c.red('FAIL'))}  ${outcome.path}`);
      for (const detail of outcome.error.split('\n').filter((line) => line.trim().length > 0)) {
        lines.push(`         ${c.red(detail)}`);
      }
    }
    lines.push('');
  }

  lines.push(`Total:   ${report.total}`);
  lines.push(c.green(`Success: ${report.succeeded.length}`));
  lines.push(c.yellow(`Skipped: ${report.skipped.length}`));
  const failedLine = `Failed:  ${report.failed.length}`;
  lines.push(report.failed.length > 0 ? c.red(failedLine) : failedLine);

  return lines;
}

/**
 * Format estimated time remaining in human-readable format
 * @param ms Milliseconds remaining, or null if unknown
 * @returns Formatted string like "~2m 30s" or empty string if null
 */
export function formatEta(ms: number | null): string {
  if (ms === null) {
    return '';
  }

  if (ms <= 0) {
    return 'almost done';
  }

  if (ms < 1000) {
    return 'less than a second';
  }

  if (ms < 60000) {
    const seconds = Math.ceil(ms / 1000);
    return `~${seconds}s`;
  }

  const minutes = Math.floor(ms / 60000);
  const seconds = Math.ceil((ms % 60000) / 1000);

  if (seconds === 0) {
    return `~${minutes}m`;
  }

  return `~${minutes}m ${seconds}s`;
}
