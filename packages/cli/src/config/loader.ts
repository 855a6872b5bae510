/**
 * Configuration loading from files, environment variables, and CLI arguments
 */

import { cosmiconfig, type CosmiconfigResult } from 'cosmiconfig';

import { ConfigError } from '../errors/cli-errors.js';

import { DEFAULT_CONFIG } from './defaults.js';
import type { CliOptions, PartialReuseifyConfig, ReuseifyConfig } from './schema.js';
import { validateConfig, validatePartialConfig } from './validation.js';

/**
 * Module name for config file discovery
 */
const MODULE_NAME = 'reuseify';

/**
 * Places searched for a config file, in order
 */
export const CONFIG_SEARCH_PLACES = [
  'package.json',
  `.${MODULE_NAME}rc`,
  `.${MODULE_NAME}rc.json`,
  `.${MODULE_NAME}rc.yaml`,
  `.${MODULE_NAME}rc.yml`,
  `${MODULE_NAME}.config.js`,
  `${MODULE_NAME}.config.cjs`,
];

/**
 * Where to load configuration from (process state by default)
 */
export interface LoadConfigOptions {
  /** Environment variables */
  env?: NodeJS.ProcessEnv;
  /** Directory where the config file search starts */
  searchFrom?: string;
}

/**
 * Deep merge two configs section by section.
 * Source values override target values.
 */
function deepMerge(target: ReuseifyConfig, source: PartialReuseifyConfig): ReuseifyConfig {
  return {
    tools: { ...target.tools, ...source.tools },
    authors: { ...target.authors, ...source.authors },
    annotate: { ...target.annotate, ...source.annotate },
    output: { ...target.output, ...source.output },
  };
}

/**
 * Read a non-empty environment variable
 */
function readEnv(env: NodeJS.ProcessEnv, name: string): string | undefined {
  const value = env[name];
  return value !== undefined && value !== '' ? value : undefined;
}

function parseBoolean(value: string): boolean {
  return value.toLowerCase() === 'true' || value === '1';
}

/**
 * Split a comma-separated list, dropping blanks
 */
export function parseList(value: string): string[] {
  return value
    .split(',')
    .map((item) => item.trim())
    .filter((item) => item.length > 0);
}

/**
 * Load configuration from environment variables
 */
export function loadEnvConfig(env: NodeJS.ProcessEnv = process.env): PartialReuseifyConfig {
  const config: PartialReuseifyConfig = {};

  const reuse = readEnv(env, 'REUSEIFY_REUSE_BIN');
  if (reuse !== undefined) config.tools = { ...config.tools, reuse };
  const git = readEnv(env, 'REUSEIFY_GIT_BIN');
  if (git !== undefined) config.tools = { ...config.tools, git };
  const cwd = readEnv(env, 'REUSEIFY_CWD');
  if (cwd !== undefined) config.tools = { ...config.tools, cwd };

  const output = readEnv(env, 'REUSEIFY_OUTPUT');
  if (output !== undefined) config.authors = { ...config.authors, output };
  const includeNotInGit = readEnv(env, 'REUSEIFY_INCLUDE_NOT_IN_GIT');
  if (includeNotInGit !== undefined) {
    config.authors = { ...config.authors, includeNotInGit: parseBoolean(includeNotInGit) };
  }
  const exclude = readEnv(env, 'REUSEIFY_EXCLUDE');
  if (exclude !== undefined) config.authors = { ...config.authors, exclude: parseList(exclude) };
  const useMailmap = readEnv(env, 'REUSEIFY_USE_MAILMAP');
  if (useMailmap !== undefined) {
    config.authors = { ...config.authors, useMailmap: parseBoolean(useMailmap) };
  }

  const input = readEnv(env, 'REUSEIFY_INPUT');
  if (input !== undefined) config.annotate = { ...config.annotate, input };
  const defaults = readEnv(env, 'REUSEIFY_DEFAULT_CONTRIBUTORS');
  if (defaults !== undefined) {
    config.annotate = { ...config.annotate, defaultContributors: parseList(defaults) };
  }

  // https://no-color.org: any non-empty value disables color
  if (readEnv(env, 'NO_COLOR') !== undefined) {
    config.output = { ...config.output, color: false };
  }

  return config;
}

/**
 * Load configuration from config file using cosmiconfig.
 * An explicit path must exist; otherwise a missing file just means no file config.
 */
async function loadConfigFile(
  configPath: string | undefined,
  searchFrom: string | undefined,
): Promise<PartialReuseifyConfig | null> {
  const explorer = cosmiconfig(MODULE_NAME, { searchPlaces: CONFIG_SEARCH_PLACES });

  let result: CosmiconfigResult;
  try {
    result = configPath ? await explorer.load(configPath) : await explorer.search(searchFrom);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(
      configPath ? `Failed to load config file ${configPath}: ${reason}` : `Failed to load config file: ${reason}`,
      'Check that the file exists and is valid JSON, YAML or JavaScript',
    );
  }

  if (!result || result.isEmpty) {
    return null;
  }
  return validatePartialConfig(result.config);
}

/**
 * Map CLI options to config object
 */
export function mapCliToConfig(options: CliOptions): PartialReuseifyConfig {
  const config: PartialReuseifyConfig = {};

  if (options.output !== undefined) {
    config.authors = { ...config.authors, output: options.output };
  }
  if (options.includeNotInGit !== undefined) {
    config.authors = { ...config.authors, includeNotInGit: options.includeNotInGit };
  }
  if (options.exclude !== undefined && options.exclude.length > 0) {
    config.authors = { ...config.authors, exclude: options.exclude };
  }

  if (options.input !== undefined) {
    config.annotate = { ...config.annotate, input: options.input };
  }
  if (options.defaultContributors !== undefined && options.defaultContributors.length > 0) {
    config.annotate = { ...config.annotate, defaultContributors: options.defaultContributors };
  }

  if (options.noColor) {
    config.output = { ...config.output, color: false };
  }
  if (options.verbose !== undefined) {
    config.output = { ...config.output, verbose: options.verbose };
  }

  return config;
}

/**
 * Load and merge configuration from all sources
 *
 * Precedence (highest to lowest):
 * 1. CLI arguments
 * 2. Environment variables
 * 3. Config file
 * 4. Default values
 */
export async function loadConfig(
  cliOptions: CliOptions,
  options: LoadConfigOptions = {},
): Promise<ReuseifyConfig> {
  let config = structuredClone(DEFAULT_CONFIG);

  const fileConfig = await loadConfigFile(cliOptions.config, options.searchFrom);
  if (fileConfig) {
    config = deepMerge(config, fileConfig);
  }

  config = deepMerge(config, loadEnvConfig(options.env));
  config = deepMerge(config, mapCliToConfig(cliOptions));

  return validateConfig(config);
}

/**
 * Format configuration for display
 */
export function formatConfig(config: ReuseifyConfig): string {
  return JSON.stringify(config, null, 2);
}
