/**
 * @reuseify/tools - Adapters for the external tools reuseify drives
 *
 * This package provides clients for:
 * - REUSE (license linting, header annotation)
 * - git (author history, ignore rules)
 */

export const VERSION = '0.1.0';

// Re-export clients
export {
  BaseToolClient,
  ReuseClient,
  GitClient,
  execFileRunner,
  buildAnnotateArgs,
  DEFAULT_REUSE_CONFIG,
  DEFAULT_GIT_CONFIG,
  type ToolConfig,
  type ReuseClientConfig,
  type GitClientConfig,
} from './clients/index.js';

// Re-export parsers
export {
  parseLintReport,
  parseAuthorLog,
  uniqueInOrder,
  classifyAnnotateResult,
  findSkipSignal,
  SKIP_SIGNALS,
  SUMMARY_HEADING,
} from './parsers/index.js';

// Re-export errors
export {
  ToolError,
  ToolNotFoundError,
  ToolExecutionError,
  LinterError,
  HistoryError,
} from './errors.js';
