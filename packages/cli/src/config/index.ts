/**
 * Configuration module exports
 */

// Schema types
export type {
  ToolsConfigSchema,
  AuthorsConfigSchema,
  AnnotateConfigSchema,
  OutputConfigSchema,
  ReuseifyConfig,
  PartialReuseifyConfig,
  CliOptions,
} from './schema.js';

// Defaults
export {
  DEFAULT_TOOLS_CONFIG,
  DEFAULT_AUTHORS_CONFIG,
  DEFAULT_ANNOTATE_CONFIG,
  DEFAULT_OUTPUT_CONFIG,
  DEFAULT_CONFIG,
} from './defaults.js';

// Validation
export {
  configSchema,
  partialConfigSchema,
  ConfigValidationError,
  validateConfig,
  validatePartialConfig,
} from './validation.js';

// Loader
export {
  CONFIG_SEARCH_PLACES,
  loadConfig,
  loadEnvConfig,
  mapCliToConfig,
  parseList,
  formatConfig,
  type LoadConfigOptions,
} from './loader.js';
