/**
 * Zod validation schemas for configuration
 */

import { z } from 'zod';

import type { PartialReuseifyConfig, ReuseifyConfig } from './schema.js';

/**
 * Executable name or path
 */
const executableSchema = z.string().min(1, 'must not be empty');

/**
 * Contributor display name
 */
const contributorSchema = z.string().trim().min(1, 'contributor names must not be empty');

export const toolsConfigSchema = z.object({
  reuse: executableSchema,
  git: executableSchema,
  cwd: z.string().min(1),
});

export const authorsConfigSchema = z.object({
  output: z.string().min(1),
  includeNotInGit: z.boolean(),
  exclude: z.array(z.string().min(1, 'exclude patterns must not be empty')),
  useMailmap: z.boolean(),
});

export const annotateConfigSchema = z.object({
  input: z.string().min(1),
  defaultContributors: z.array(contributorSchema),
  checkFilesExist: z.boolean(),
});

export const outputConfigSchema = z.object({
  color: z.boolean(),
  verbose: z.boolean(),
});

/**
 * Complete configuration schema
 */
export const configSchema = z.object({
  tools: toolsConfigSchema,
  authors: authorsConfigSchema,
  annotate: annotateConfigSchema,
  output: outputConfigSchema,
});

/**
 * Partial configuration schema (for config files)
 */
export const partialConfigSchema = z
  .object({
    tools: toolsConfigSchema.partial().strict().optional(),
    authors: authorsConfigSchema.partial().strict().optional(),
    annotate: annotateConfigSchema.partial().strict().optional(),
    output: outputConfigSchema.partial().strict().optional(),
  })
  .strict();

/**
 * Configuration validation error
 */
export class ConfigValidationError extends Error {
  constructor(public readonly errors: Array<{ path: string; message: string }>) {
    const errorMessages = errors.map((e) => `  ${e.path}: ${e.message}`).join('\n');
    super(`Configuration validation failed:\n${errorMessages}`);
    this.name = 'ConfigValidationError';
  }

  /**
   * Format error for CLI display
   */
  format(): string {
    return [
      'Configuration validation failed:',
      '',
      ...this.errors.map((e) => `  ${e.path}: ${e.message}`),
      '',
      'Use --help to see available options',
      'Use --show-config to see current configuration',
    ].join('\n');
  }
}

function toValidationError(error: z.ZodError): ConfigValidationError {
  return new ConfigValidationError(
    error.issues.map((issue) => ({
      path: issue.path.length > 0 ? issue.path.join('.') : '(root)',
      message: issue.message,
    })),
  );
}

/**
 * Validate a complete configuration
 * @throws ConfigValidationError if validation fails
 */
export function validateConfig(config: unknown): ReuseifyConfig {
  const result = configSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}

/**
 * Validate a partial configuration (from config file)
 * @throws ConfigValidationError if validation fails
 */
export function validatePartialConfig(config: unknown): PartialReuseifyConfig {
  const result = partialConfigSchema.safeParse(config);
  if (!result.success) {
    throw toValidationError(result.error);
  }
  return result.data;
}
