/**
 * Tool contracts
 *
 * Narrow interfaces over the external tools. The subprocess adapters in
 * @reuseify/tools implement them; tests use in-process fakes.
 */

import type { AnnotationOutcome } from '../annotation/index.js';

/**
 * License linter
 * (Implemented by `reuse lint`)
 */
export interface LicenseLinter {
  /** Relative paths of files lacking copyright or licensing information */
  listMissingHeaders(): Promise<string[]>;
}

/**
 * Version-control history
 * (Implemented by `git log`)
 */
export interface HistoryService {
  /** Author display names of every commit touching the path, oldest first */
  authorsOf(path: string): Promise<string[]>;
}

/**
 * Version-control ignore rules
 * (Implemented by `git check-ignore`)
 */
export interface IgnoreChecker {
  isIgnored(path: string): Promise<boolean>;
}

/**
 * Annotation applier
 * (Implemented by `reuse annotate`)
 */
export interface AnnotatorService {
  /**
   * Annotate a single file.
   * Resolves to an outcome for every tool exit; rejects only when the tool
   * could not be run at all.
   */
  annotate(
    path: string,
    contributors: readonly string[],
    extraArgs: readonly string[],
  ): Promise<AnnotationOutcome>;
}

/**
 * Result of running an external process to completion
 */
export interface ProcessResult {
  exitCode: number;
  stdout: string;
  stderr: string;
}

/**
 * Options for a single process run
 */
export interface RunOptions {
  /** Working directory (default: current directory) */
  cwd?: string;
}

/**
 * Runs a command with an argument vector (no shell) and waits for it to exit.
 * Resolves for any exit code; rejects when the process cannot be started.
 */
export type ProcessRunner = (
  command: string,
  args: readonly string[],
  options?: RunOptions,
) => Promise<ProcessResult>;

/**
 * Availability of an external tool
 */
export interface ToolStatus {
  name: string;
  available: boolean;
  version?: string;
  error?: string;
}
