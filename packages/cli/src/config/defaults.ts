/**
 * Default configuration values
 */

import { DEFAULT_ARTIFACT_PATH } from '@reuseify/types';

import type {
  AnnotateConfigSchema,
  AuthorsConfigSchema,
  OutputConfigSchema,
  ReuseifyConfig,
  ToolsConfigSchema,
} from './schema.js';

/**
 * Default tool configuration
 */
export const DEFAULT_TOOLS_CONFIG: ToolsConfigSchema = {
  reuse: 'reuse',
  git: 'git',
  cwd: '.',
};

/**
 * Default get-authors configuration
 */
export const DEFAULT_AUTHORS_CONFIG: AuthorsConfigSchema = {
  output: DEFAULT_ARTIFACT_PATH,
  includeNotInGit: false,
  exclude: [],
  useMailmap: true,
};

/**
 * Default annotate configuration
 */
export const DEFAULT_ANNOTATE_CONFIG: AnnotateConfigSchema = {
  input: DEFAULT_ARTIFACT_PATH,
  defaultContributors: [],
  checkFilesExist: true,
};

/**
 * Default output configuration
 */
export const DEFAULT_OUTPUT_CONFIG: OutputConfigSchema = {
  color: true,
  verbose: false,
};

/**
 * Complete default configuration
 */
export const DEFAULT_CONFIG: ReuseifyConfig = {
  tools: DEFAULT_TOOLS_CONFIG,
  authors: DEFAULT_AUTHORS_CONFIG,
  annotate: DEFAULT_ANNOTATE_CONFIG,
  output: DEFAULT_OUTPUT_CONFIG,
};
