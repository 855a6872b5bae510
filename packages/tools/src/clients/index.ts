/**
 * Tool client exports
 */

export { BaseToolClient, type ToolConfig } from './base.js';
export { execFileRunner } from './runner.js';
export {
  ReuseClient,
  DEFAULT_REUSE_CONFIG,
  buildAnnotateArgs,
  type ReuseClientConfig,
} from './reuse.js';
export { GitClient, DEFAULT_GIT_CONFIG, type GitClientConfig } from './git.js';
