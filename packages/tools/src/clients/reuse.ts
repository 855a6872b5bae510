/**
 * Client for the REUSE tool
 */

import type {
  AnnotationOutcome,
  AnnotatorService,
  LicenseLinter,
  ProcessRunner,
} from '@reuseify/types';

import { LinterError } from '../errors.js';
import { classifyAnnotateResult } from '../parsers/annotate-result.js';
import { parseLintReport } from '../parsers/lint-report.js';

import { BaseToolClient } from './base.js';

/**
 * Configuration for the REUSE client
 */
export interface ReuseClientConfig {
  executable?: string;
  cwd?: string;
  runner?: ProcessRunner;
}

/**
 * Default REUSE client configuration
 */
export const DEFAULT_REUSE_CONFIG = {
  executable: 'reuse',
};

/**
 * Exit codes of `reuse lint` that carry a report:
 * 0 when compliant, 1 when files are missing information
 */
const LINT_REPORT_EXIT_CODES: ReadonlySet<number> = new Set([0, 1]);

/**
 * REUSE client: lints the tree and annotates single files
 */
export class ReuseClient extends BaseToolClient implements LicenseLinter, AnnotatorService {
  constructor(config: ReuseClientConfig = {}) {
    super({ ...config, executable: config.executable ?? DEFAULT_REUSE_CONFIG.executable });
  }

  protected getToolName(): string {
    return 'reuse';
  }

  /**
   * List files lacking copyright or licensing information.
   * Rejects with LinterError when the linter ran but produced no report.
   */
  async listMissingHeaders(): Promise<string[]> {
    const result = await this.run(['lint']);

    if (!LINT_REPORT_EXIT_CODES.has(result.exitCode)) {
      const detail = result.stderr.trim() || result.stdout.trim();
      throw new LinterError(
        `'${this.executable} lint' exited with code ${result.exitCode}${detail ? `: ${detail}` : ''}`,
        this.executable,
        result.exitCode,
      );
    }

    // The report goes to stdout, but older releases print sections to stderr
    return parseLintReport(`${result.stdout}\n${result.stderr}`);
  }

  /**
   * Annotate one file with the given contributors and forwarded arguments
   */
  async annotate(
    path: string,
    contributors: readonly string[],
    extraArgs: readonly string[],
  ): Promise<AnnotationOutcome> {
    const args = buildAnnotateArgs(path, contributors, extraArgs);
    const result = await this.run(args);
    return classifyAnnotateResult(path, contributors, result);
  }
}

/**
 * Argument vector for `reuse annotate` on a single file:
 * one --contributor per name, then the forwarded arguments, then the path
 */
export function buildAnnotateArgs(
  path: string,
  contributors: readonly string[],
  extraArgs: readonly string[],
): string[] {
  const contributorFlags = contributors.flatMap((name) => ['--contributor', name]);
  return ['annotate', ...contributorFlags, ...extraArgs, path];
}
