/**
 * Progress reporter with ora spinners
 */

import type { AnnotationEvent, CollectionStats, CollectorEvent } from '@reuseify/core';
import type { AnnotationReport, ToolStatus } from '@reuseify/types';
import ora, { type Ora, type Color } from 'ora';

import {
  createColorFns,
  formatAnnotationReport,
  formatAuthorLine,
  formatCollectionSummary,
  formatEta,
  formatExcludedLine,
  formatUntrackedLine,
} from './formatters.js';
import { TimeEstimator } from './time-estimator.js';
import { type ColorFunctions, type ProgressReporterOptions, type RunPhase, PHASE_NAMES } from './types.js';

export type { RunPhase, ProgressReporterOptions } from './types.js';

/**
 * Progress reporter for CLI output
 */
export class ProgressReporter {
  private spinner: Ora | null = null;
  private phaseStartTime: number = 0;
  private readonly silent: boolean;
  private readonly useColor: boolean;
  private readonly verbose: boolean;
  private readonly timeEstimator: TimeEstimator;
  private currentPhaseName: string = '';

  private readonly c: ColorFunctions;

  constructor(options: ProgressReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.useColor = options.color ?? true;
    this.verbose = options.verbose ?? false;
    this.timeEstimator = new TimeEstimator();
    this.c = createColorFns(this.useColor);
  }

  /**
   * Color functions matching this reporter's color setting
   */
  get colors(): ColorFunctions {
    return this.c;
  }

  /**
   * Print the version header
   */
  printHeader(version: string): void {
    if (this.silent) return;
    console.log(this.c.bold(`reuseify v${version}`));
    console.log('');
  }

  /**
   * Report tool health check results
   */
  reportToolStatus(tools: ToolStatus[]): void {
    if (this.silent) return;

    console.log(this.c.dim(`${PHASE_NAMES.checking}...`));
    for (const tool of tools) {
      const status = tool.available ? this.c.green('✓') : this.c.red('✗');
      const version = tool.version ? this.c.dim(` - ${tool.version}`) : '';
      const error = tool.error ? this.c.red(` (${tool.error})`) : '';

      console.log(`  ${status} ${tool.name}${version}${error}`);
    }
    console.log('');
  }

  /**
   * Start a new phase
   */
  startPhase(phase: RunPhase): void {
    if (this.silent) return;

    this.phaseStartTime = Date.now();
    this.currentPhaseName = PHASE_NAMES[phase];
    this.timeEstimator.reset();

    if (this.spinner) {
      this.spinner.stop();
    }

    // Build ora options - only include color if colors are enabled
    const oraOptions: { text: string; prefixText: string; color?: Color } = {
      text: this.currentPhaseName,
      prefixText: ' ',
    };
    if (this.useColor) {
      oraOptions.color = 'cyan';
    }

    this.spinner = ora(oraOptions).start();
  }

  /**
   * Update phase progress with file counter and ETA
   */
  updateProgress(current: number, total: number, detail?: string): void {
    if (this.silent || !this.spinner) return;

    this.timeEstimator.record(current);

    const etaMs = this.timeEstimator.estimateRemaining(current, total);
    const etaStr = etaMs !== null ? this.c.dim(` (${formatEta(etaMs)} remaining)`) : '';
    const detailStr = detail ? ` ${this.c.cyan(detail)}` : '';

    this.spinner.text = `${this.currentPhaseName}... ${current}/${total}${detailStr}${etaStr}`;
  }

  /**
   * Complete a phase successfully
   */
  completePhase(phase: RunPhase, detail?: string): void {
    if (this.silent) return;

    const duration = Date.now() - this.phaseStartTime;
    const phaseName = PHASE_NAMES[phase];
    const durationStr = duration > 1000 ? this.c.dim(` (${(duration / 1000).toFixed(1)}s)`) : '';
    const detailStr = detail ? this.c.dim(`: ${detail}`) : '';

    if (this.spinner) {
      this.spinner.succeed(`${phaseName}${detailStr}${durationStr}`);
      this.spinner = null;
    } else {
      console.log(`  ${this.c.green('✓')} ${phaseName}${detailStr}${durationStr}`);
    }
  }

  /**
   * Fail a phase
   */
  failPhase(phase: RunPhase, error: string): void {
    if (this.silent) return;

    const phaseName = PHASE_NAMES[phase];

    if (this.spinner) {
      this.spinner.fail(`${phaseName}: ${error}`);
      this.spinner = null;
    } else {
      console.log(`  ${this.c.red('✗')} ${phaseName}: ${error}`);
    }
  }

  /**
   * Print a line while a spinner may be running.
   * The spinner is stopped around the write so lines do not interleave.
   */
  printSafe(message: string): void {
    if (this.silent) return;

    if (this.spinner) {
      const currentText = this.spinner.text;
      this.spinner.stop();
      console.log(message);
      this.spinner.start(currentText);
    } else {
      console.log(message);
    }
  }

  /**
   * Print a warning while a spinner may be running
   */
  warnSafe(message: string): void {
    this.printSafe(this.c.yellow(`  ⚠ ${message}`));
  }

  /**
   * Print the get-authors closing summary
   */
  printCollectionSummary(stats: CollectionStats, outputPath: string, entries: number): void {
    if (this.silent) return;
    for (const line of formatCollectionSummary(stats, outputPath, entries, this.c)) {
      console.log(line);
    }
  }

  /**
   * Print the grouped annotation report
   */
  printAnnotationReport(report: AnnotationReport): void {
    if (this.silent) return;
    console.log('');
    for (const line of formatAnnotationReport(report, this.c)) {
      console.log(line);
    }
  }

  /**
   * Print a message (respects silent setting)
   */
  printMessage(message: string): void {
    if (this.silent) return;
    console.log(message);
  }

  /**
   * Print a success message
   */
  printSuccess(message: string): void {
    if (this.silent) return;
    console.log(this.c.green(`✓ ${message}`));
  }

  /**
   * Stop any running spinner
   */
  stop(): void {
    if (this.spinner) {
      this.spinner.stop();
      this.spinner = null;
    }
  }

  /**
   * Check if verbose mode is enabled
   */
  isVerbose(): boolean {
    return this.verbose;
  }
}

/**
 * Translate collector events into phases, spinner updates and per-file lines
 */
export function createCollectorProgressHandler(reporter: ProgressReporter): (event: CollectorEvent) => void {
  const c = reporter.colors;

  return (event: CollectorEvent) => {
    switch (event.type) {
      case 'lint-complete':
        reporter.completePhase('lint', `${event.files} file(s) with licensing issues`);
        reporter.startPhase('filter');
        break;
      case 'ignore-error':
        reporter.warnSafe(`Could not check ignore rules for ${event.path}: ${event.error.message}`);
        break;
      case 'file-excluded':
        if (reporter.isVerbose()) {
          reporter.printSafe(formatExcludedLine(event.path, event.reason, c));
        }
        break;
      case 'filtered': {
        const excluded = event.excludedByPattern + event.ignored;
        reporter.completePhase(
          'filter',
          excluded > 0 ? `excluded ${excluded} file(s) via path patterns / .gitignore` : 'nothing excluded',
        );
        if (event.kept > 0) {
          reporter.startPhase('history');
        }
        break;
      }
      case 'history-error':
        reporter.warnSafe(`git log failed for ${event.path}, treating as not in git: ${event.error.message}`);
        break;
      case 'file-resolved':
        reporter.updateProgress(event.index + 1, event.total, event.path);
        reporter.printSafe(formatAuthorLine(event.path, event.authors, c));
        break;
      case 'file-untracked':
        reporter.updateProgress(event.index + 1, event.total, event.path);
        reporter.printSafe(formatUntrackedLine(event.path, event.included, c));
        break;
      case 'complete':
        if (event.stats.tracked + event.stats.untracked > 0) {
          reporter.completePhase(
            'history',
            `${event.stats.tracked} tracked, ${event.stats.untracked} not in git`,
          );
        }
        break;
    }
  };
}

/**
 * Translate annotation events into spinner updates
 */
export function createAnnotationProgressHandler(
  reporter: ProgressReporter,
): (event: AnnotationEvent) => void {
  const c = reporter.colors;

  return (event: AnnotationEvent) => {
    if (event.type === 'file-start') {
      reporter.updateProgress(event.index, event.total, event.path);
      return;
    }

    reporter.updateProgress(event.index + 1, event.total);
    if (reporter.isVerbose()) {
      const { outcome } = event;
      const label =
        outcome.status === 'success'
          ? c.green('PASS')
          : outcome.status === 'skipped'
            ? c.yellow('SKIP')
            : c.red('FAIL');
      reporter.printSafe(`  ${label}  ${outcome.path}`);
    }
  };
}
