/**
 * Tool client construction and health checking
 */

import * as path from 'path';

import { GitClient, ReuseClient } from '@reuseify/tools';
import type { ProcessRunner, ToolStatus } from '@reuseify/types';

import type { ReuseifyConfig } from '../config/schema.js';
import { RepositoryError, createToolError } from '../errors/index.js';

/**
 * Tool clients for one run
 */
export interface Tools {
  reuse: ReuseClient;
  git: GitClient;
  /** Absolute working directory shared by both clients */
  cwd: string;
}

/**
 * Create the tool clients from config.
 * Tests pass a fake runner; otherwise the clients spawn real processes.
 */
export function createTools(config: ReuseifyConfig, runner?: ProcessRunner): Tools {
  const cwd = path.resolve(config.tools.cwd);

  const reuse = new ReuseClient({ executable: config.tools.reuse, cwd, runner });
  const git = new GitClient({
    executable: config.tools.git,
    cwd,
    runner,
    useMailmap: config.authors.useMailmap,
  });

  return { reuse, git, cwd };
}

/**
 * Check every tool a command needs, in order
 */
export async function performHealthChecks(clients: Array<ReuseClient | GitClient>): Promise<ToolStatus[]> {
  const results: ToolStatus[] = [];
  for (const client of clients) {
    results.push(await client.healthCheck());
  }
  return results;
}

/**
 * Fail on the first unavailable tool
 * @throws ToolUnavailableError with an install hint
 */
export function requireAvailable(statuses: ToolStatus[]): void {
  const missing = statuses.find((status) => !status.available);
  if (missing) {
    throw createToolError(missing);
  }
}

/**
 * Fail unless the working directory is inside a git repository
 * @throws RepositoryError
 */
export async function requireRepository(tools: Tools): Promise<void> {
  if (!(await tools.git.isRepository())) {
    throw new RepositoryError(tools.cwd);
  }
}
