/**
 * Error module exports
 */

export {
  CliError,
  ConfigError,
  InputError,
  OutputError,
  RepositoryError,
  ToolUnavailableError,
  AnnotationFailedError,
  resolveAbsolutePath,
} from './cli-errors.js';

export { formatError, handleError, createToolError } from './handler.js';
