/**
 * Base client for command-line tools
 */

import type { ProcessResult, ProcessRunner, ToolStatus } from '@reuseify/types';

import { execFileRunner } from './runner.js';

/**
 * Configuration for tool clients
 */
export interface ToolConfig {
  /** Executable name or path */
  executable: string;
  /** Working directory for every invocation (default: process cwd) */
  cwd?: string;
  /** Process runner (default: execFile without a shell) */
  runner?: ProcessRunner;
}

/**
 * Base class for tool clients with common invocation handling
 */
export abstract class BaseToolClient {
  protected readonly config: Required<ToolConfig>;

  constructor(config: ToolConfig) {
    this.config = {
      executable: config.executable,
      cwd: config.cwd ?? process.cwd(),
      runner: config.runner ?? execFileRunner,
    };
  }

  /**
   * Human-readable tool name for status output
   */
  protected abstract getToolName(): string;

  /**
   * Run the tool with the given arguments in the configured directory
   */
  protected run(args: readonly string[]): Promise<ProcessResult> {
    return this.config.runner(this.config.executable, args, { cwd: this.config.cwd });
  }

  /**
   * Check that the tool can be started, reporting its version
   */
  async healthCheck(): Promise<ToolStatus> {
    const name = this.getToolName();

    try {
      const result = await this.run(['--version']);
      if (result.exitCode !== 0) {
        return {
          name,
          available: false,
          error: result.stderr.trim() || `exited with code ${result.exitCode}`,
        };
      }
      const version = firstLine(result.stdout);
      return version ? { name, available: true, version } : { name, available: true };
    } catch (error) {
      return {
        name,
        available: false,
        error: error instanceof Error ? error.message : String(error),
      };
    }
  }

  /**
   * The configured executable
   */
  get executable(): string {
    return this.config.executable;
  }

  /**
   * The directory the tool runs in
   */
  get cwd(): string {
    return this.config.cwd;
  }
}

function firstLine(text: string): string {
  return text.trim().split(/\r?\n/)[0]?.trim() ?? '';
}
