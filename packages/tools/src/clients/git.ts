/**
 * Client for git history and ignore rules
 */

import type { HistoryService, IgnoreChecker, ProcessRunner } from '@reuseify/types';

import { HistoryError, ToolExecutionError } from '../errors.js';
import { parseAuthorLog } from '../parsers/author-log.js';

import { BaseToolClient } from './base.js';

/**
 * Configuration for the git client
 */
export interface GitClientConfig {
  executable?: string;
  cwd?: string;
  runner?: ProcessRunner;
  /** Resolve author names through .mailmap (default: true) */
  useMailmap?: boolean;
}

/**
 * Default git client configuration
 */
export const DEFAULT_GIT_CONFIG = {
  executable: 'git',
  useMailmap: true,
};

/**
 * Git client: author history, ignore checks, repository detection
 */
export class GitClient extends BaseToolClient implements HistoryService, IgnoreChecker {
  private readonly useMailmap: boolean;

  constructor(config: GitClientConfig = {}) {
    super({ ...config, executable: config.executable ?? DEFAULT_GIT_CONFIG.executable });
    this.useMailmap = config.useMailmap ?? DEFAULT_GIT_CONFIG.useMailmap;
  }

  protected getToolName(): string {
    return 'git';
  }

  /**
   * Distinct author names of all commits touching the path, oldest first.
   * An untracked path resolves to an empty list.
   */
  async authorsOf(path: string): Promise<string[]> {
    const format = this.useMailmap ? '%aN' : '%an';
    const result = await this.run(['log', '--reverse', `--format=${format}`, '--', path]);

    if (result.exitCode !== 0) {
      throw new HistoryError(path, result.stderr.trim(), this.executable);
    }

    return parseAuthorLog(result.stdout);
  }

  /**
   * Whether the path is excluded by .gitignore and related rules
   */
  async isIgnored(path: string): Promise<boolean> {
    const args = ['check-ignore', '-q', '--', path];
    const result = await this.run(args);

    // check-ignore: 0 = ignored, 1 = not ignored, anything else = fatal
    if (result.exitCode === 0) return true;
    if (result.exitCode === 1) return false;
    throw new ToolExecutionError(this.executable, args, result.exitCode, result.stderr);
  }

  /**
   * Whether the working directory is inside a git repository
   */
  async isRepository(): Promise<boolean> {
    const result = await this.run(['rev-parse', '--git-dir']);
    return result.exitCode === 0;
  }
}
