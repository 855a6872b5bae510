/**
 * What a command run depends on besides its options
 */

import type { ProcessRunner } from '@reuseify/types';

import type { ProgressReporter } from '../progress/reporter.js';

export interface CommandContext {
  /** Subprocess runner for the tool clients (default: real processes) */
  runner?: ProcessRunner;
  /** Environment variables for configuration (default: process.env) */
  env?: NodeJS.ProcessEnv;
  /** Directory where the config file search starts (default: process cwd) */
  searchFrom?: string;
  /** Reporter to use instead of one built from the resolved config */
  reporter?: ProgressReporter;
}
