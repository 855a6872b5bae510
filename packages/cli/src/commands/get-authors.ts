/**
 * get-authors command implementation
 */

import { ArtifactError, collectAuthors, writeAuthorArtifact, type CollectionResult } from '@reuseify/core';
import { LinterError, ToolNotFoundError } from '@reuseify/tools';

import { VERSION } from '../cli.js';
import { formatConfig, loadConfig } from '../config/loader.js';
import type { CliOptions } from '../config/schema.js';
import { CliError, OutputError, createToolError, handleError, resolveAbsolutePath } from '../errors/index.js';
import { createTools, performHealthChecks, requireAvailable, requireRepository } from '../orchestrator/services.js';
import { formatConfigDisplay } from '../progress/formatters.js';
import { ProgressReporter, createCollectorProgressHandler } from '../progress/reporter.js';

import type { CommandContext } from './context.js';

/**
 * Turn a linter failure into a CLI error with a hint
 */
function toLintError(error: unknown): unknown {
  if (error instanceof ToolNotFoundError) {
    return createToolError({ name: 'reuse', available: false, error: error.message });
  }
  if (error instanceof LinterError) {
    return new CliError(error.message, "Run 'reuse lint' in the repository to see the full report");
  }
  return error;
}

/**
 * Collect authors for every file missing a license header and write the artifact.
 * Throws on fatal errors; see getAuthorsCommand for the CLI entry point.
 */
export async function runGetAuthors(options: CliOptions, context: CommandContext = {}): Promise<void> {
  const config = await loadConfig(options, { env: context.env, searchFrom: context.searchFrom });
  const reporter =
    context.reporter ??
    new ProgressReporter({ color: config.output.color, verbose: config.output.verbose });

  if (options.showConfig) {
    reporter.printMessage(formatConfigDisplay(config, reporter.colors));
    reporter.printMessage('');
    reporter.printMessage('Raw configuration:');
    reporter.printMessage(formatConfig(config));
    return;
  }

  try {
    reporter.printHeader(VERSION);

    const tools = createTools(config, context.runner);
    const statuses = await performHealthChecks([tools.reuse, tools.git]);
    reporter.reportToolStatus(statuses);
    requireAvailable(statuses);
    await requireRepository(tools);

    reporter.startPhase('lint');
    let result: CollectionResult;
    try {
      result = await collectAuthors(
        { linter: tools.reuse, history: tools.git, ignoreChecker: tools.git },
        {
          includeUntracked: config.authors.includeNotInGit,
          exclude: config.authors.exclude,
          onEvent: createCollectorProgressHandler(reporter),
        },
      );
    } catch (error) {
      reporter.failPhase('lint', error instanceof Error ? error.message : String(error));
      throw toLintError(error);
    }

    const { authors, stats } = result;
    if (stats.reported === 0) {
      reporter.printSuccess('No files with licensing issues found by reuse lint.');
    } else if (stats.tracked + stats.untracked === 0) {
      reporter.printSuccess('All remaining files were excluded.');
    }

    const outputPath = resolveAbsolutePath(config.authors.output);
    try {
      await writeAuthorArtifact(outputPath, authors);
    } catch (error) {
      if (error instanceof ArtifactError) {
        throw new OutputError(error.message, 'Check that the output directory is writable');
      }
      throw error;
    }

    reporter.printCollectionSummary(stats, outputPath, authors.size);
  } finally {
    reporter.stop();
  }
}

/**
 * CLI entry point for get-authors
 */
export async function getAuthorsCommand(options: CliOptions, context: CommandContext = {}): Promise<void> {
  try {
    await runGetAuthors(options, context);
  } catch (error) {
    handleError(error);
  }
}
