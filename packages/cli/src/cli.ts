/**
 * CLI definition using Commander.js
 */

import { DEFAULT_ARTIFACT_PATH } from '@reuseify/types';
import { Command } from 'commander';

import type { CliOptions } from './config/schema.js';
import { extractAnnotateOptions } from './passthrough.js';

export const VERSION = '0.1.0';

const ANNOTATE_HELP = `
Any option not listed above is forwarded verbatim, in order, to every
'reuse annotate' call, e.g.:

  $ reuseify annotate -d "Jane Doe" --license MIT --copyright "ACME Corp"
  $ reuseify annotate --style python --skip-unrecognised`;

/**
 * Collect repeated option values into an array
 */
function collect(value: string, previous: string[]): string[] {
  return [...previous, value];
}

/**
 * Tokens after the `annotate` subcommand, exactly as typed.
 * `argv` is a node argv: executable and script come first.
 */
export function annotateTokens(argv: readonly string[]): string[] {
  const index = argv.indexOf('annotate', 2);
  return index === -1 ? [] : argv.slice(index + 1);
}

/**
 * Create and configure the CLI program.
 * `argv` must be the list later handed to `parseAsync`; annotate reads its
 * tokens from it, since commander drops a leading `--` from `command.args`.
 */
export function createProgram(argv: readonly string[] = process.argv): Command {
  const program = new Command()
    .name('reuseify')
    .description('Add REUSE license headers with contributors taken from git history')
    .version(VERSION);

  program
    .command('get-authors')
    .description('Find files missing license information and write their git authors to JSON')
    .option('-o, --output <path>', `Output JSON file (default: ${DEFAULT_ARTIFACT_PATH})`)
    .option('-i, --include-not-in-git', 'Include files without git history, with no authors')
    .option('-e, --exclude <pattern>', 'Extra glob to exclude, matched per path component (repeatable)', collect, [])
    .option('--config <file>', 'Path to config file')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .option('--verbose', 'Also list excluded files and each annotated file')
    .action(async (options: Record<string, unknown>) => {
      // Import dynamically to avoid circular dependencies
      const { getAuthorsCommand } = await import('./commands/get-authors.js');
      await getAuthorsCommand(parseCliOptions(options));
    });

  program
    .command('annotate')
    .description('Run reuse annotate on every file of the authors JSON')
    .option('-i, --input <path>', `Input JSON file (default: ${DEFAULT_ARTIFACT_PATH})`)
    .option(
      '-d, --default-contributor <name>',
      'Contributor for files without git authors (repeatable)',
      collect,
      [],
    )
    .option('--config <file>', 'Path to config file')
    .option('--show-config', 'Print resolved configuration and exit')
    .option('--no-color', 'Disable colored output (useful for piping)')
    .allowUnknownOption()
    .allowExcessArguments()
    .addHelpText('after', ANNOTATE_HELP)
    .action(async () => {
      const { annotateCommand } = await import('./commands/annotate.js');
      await annotateCommand(parseAnnotateOptions(annotateTokens(argv)));
    });

  return program;
}

function stringOption(value: unknown): string | undefined {
  return typeof value === 'string' ? value : undefined;
}

function booleanOption(value: unknown): boolean | undefined {
  return typeof value === 'boolean' ? value : undefined;
}

function stringListOption(value: unknown): string[] | undefined {
  if (!Array.isArray(value)) {
    return undefined;
  }
  return value.filter((item): item is string => typeof item === 'string');
}

/**
 * Parse CLI options from command options object
 */
export function parseCliOptions(options: Record<string, unknown>): CliOptions {
  const result: CliOptions = {};

  const input = stringOption(options['input']);
  if (input !== undefined) result.input = input;
  const output = stringOption(options['output']);
  if (output !== undefined) result.output = output;
  const config = stringOption(options['config']);
  if (config !== undefined) result.config = config;
  const includeNotInGit = booleanOption(options['includeNotInGit']);
  if (includeNotInGit !== undefined) result.includeNotInGit = includeNotInGit;
  const exclude = stringListOption(options['exclude']);
  if (exclude !== undefined && exclude.length > 0) result.exclude = exclude;
  const defaultContributors = stringListOption(options['defaultContributor']);
  if (defaultContributors !== undefined && defaultContributors.length > 0) {
    result.defaultContributors = defaultContributors;
  }
  const showConfig = booleanOption(options['showConfig']);
  if (showConfig !== undefined) result.showConfig = showConfig;
  // Note: Commander.js uses 'color' (negated) when --no-color is used
  if (options['color'] === false) result.noColor = true;
  const verbose = booleanOption(options['verbose']);
  if (verbose !== undefined) result.verbose = verbose;

  return result;
}

/**
 * Parse the annotate command line. Options commander declares for annotate
 * only drive `--help`; every token is read here, the rest forwarded to reuse.
 */
export function parseAnnotateOptions(tokens: readonly string[]): CliOptions {
  const extracted = extractAnnotateOptions(tokens);
  const result: CliOptions = { passthrough: extracted.passthrough };

  if (extracted.input !== undefined) result.input = extracted.input;
  if (extracted.config !== undefined) result.config = extracted.config;
  if (extracted.showConfig) result.showConfig = true;
  if (extracted.noColor) result.noColor = true;
  if (extracted.defaultContributors.length > 0) {
    result.defaultContributors = extracted.defaultContributors;
  }

  return result;
}
