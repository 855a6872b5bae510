/**
 * Error handling utilities
 */

import type { ToolStatus } from '@reuseify/types';
import chalk from 'chalk';

import { ConfigValidationError } from '../config/validation.js';

import { CliError, ToolUnavailableError } from './cli-errors.js';

/**
 * Install hints per tool
 */
const TOOL_SUGGESTIONS: Record<string, string> = {
  reuse: "Install the REUSE tool with 'pip install reuse' or set REUSEIFY_REUSE_BIN",
  git: 'Install git and make sure it is on PATH, or set REUSEIFY_GIT_BIN',
};

/**
 * Format and display an error for CLI output
 */
export function formatError(error: unknown): string {
  if (error instanceof ConfigValidationError) {
    return chalk.red(error.format());
  }

  if (error instanceof CliError) {
    return chalk.red(error.format());
  }

  if (error instanceof Error) {
    return chalk.red(`Error: ${error.message}`);
  }

  return chalk.red(`Error: ${String(error)}`);
}

/**
 * Handle an error and exit with appropriate code
 */
export function handleError(error: unknown): never {
  console.error(formatError(error));

  let exitCode = 1;
  if (error instanceof CliError) {
    exitCode = error.exitCode;
  }

  process.exit(exitCode);
}

/**
 * Create a tool error with an install hint from a failed health check
 */
export function createToolError(status: ToolStatus): ToolUnavailableError {
  const message = `Tool unavailable${status.error ? ` (${status.error})` : ''}`;
  return new ToolUnavailableError(status.name, message, TOOL_SUGGESTIONS[status.name]);
}
