/**
 * CLI-specific error classes
 */

import * as path from 'path';

/**
 * Resolve a path to absolute for clearer error messages
 */
export function resolveAbsolutePath(filePath: string, cwd: string = process.cwd()): string {
  return path.resolve(cwd, filePath);
}

/**
 * Base CLI error class
 */
export class CliError extends Error {
  constructor(
    message: string,
    public readonly suggestion?: string,
    public readonly exitCode: number = 1,
  ) {
    super(message);
    this.name = 'CliError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    const lines = [`Error: ${this.message}`];
    if (this.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}

/**
 * Configuration error
 */
export class ConfigError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'ConfigError';
  }
}

/**
 * Input file error
 */
export class InputError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'InputError';
  }
}

/**
 * Output file error
 */
export class OutputError extends CliError {
  constructor(message: string, suggestion?: string) {
    super(message, suggestion);
    this.name = 'OutputError';
  }
}

/**
 * Working directory is not inside a git repository
 */
export class RepositoryError extends CliError {
  constructor(public readonly directory: string) {
    super(
      `Not a git repository: ${directory}`,
      'Run reuseify from inside a git working tree, or set tools.cwd / REUSEIFY_CWD',
    );
    this.name = 'RepositoryError';
  }
}

/**
 * An external tool could not be run
 */
export class ToolUnavailableError extends CliError {
  constructor(
    public readonly toolName: string,
    message: string,
    suggestion?: string,
  ) {
    super(message, suggestion);
    this.name = 'ToolUnavailableError';
  }

  override format(): string {
    const lines = [`Error [${this.toolName}]: ${this.message}`];
    if (this.suggestion) {
      lines.push('');
      lines.push(`Suggestion: ${this.suggestion}`);
    }
    return lines.join('\n');
  }
}

/**
 * At least one file could not be annotated.
 * The per-file details are already in the report, so this only sets the exit status.
 */
export class AnnotationFailedError extends CliError {
  constructor(public readonly failedCount: number) {
    super(`${failedCount} file${failedCount === 1 ? '' : 's'} could not be annotated`);
    this.name = 'AnnotationFailedError';
  }
}
