/**
 * annotate command implementation
 */

import * as fs from 'fs';
import * as path from 'path';

import {
  ArtifactNotFoundError,
  ArtifactParseError,
  driveAnnotation,
  hasFailures,
  readAuthorArtifact,
} from '@reuseify/core';
import type { AnnotationReport, AuthorMap } from '@reuseify/types';

import { VERSION } from '../cli.js';
import { formatConfig, loadConfig } from '../config/loader.js';
import type { CliOptions } from '../config/schema.js';
import { AnnotationFailedError, InputError, handleError, resolveAbsolutePath } from '../errors/index.js';
import { createTools, performHealthChecks, requireAvailable } from '../orchestrator/services.js';
import { formatConfigDisplay } from '../progress/formatters.js';
import { ProgressReporter, createAnnotationProgressHandler } from '../progress/reporter.js';

import type { CommandContext } from './context.js';

/**
 * Read the author artifact, mapping failures to input errors with a hint
 */
async function readInput(inputPath: string): Promise<AuthorMap> {
  try {
    return await readAuthorArtifact(inputPath);
  } catch (error) {
    if (error instanceof ArtifactNotFoundError) {
      throw new InputError(error.message, "Run 'reuseify get-authors' first to generate it");
    }
    if (error instanceof ArtifactParseError) {
      throw new InputError(error.message, "Regenerate it with 'reuseify get-authors'");
    }
    throw error;
  }
}

/**
 * Annotate every file of the artifact and print the grouped report.
 * Resolves with the report; rejects with AnnotationFailedError when any file failed.
 */
export async function runAnnotate(
  options: CliOptions,
  context: CommandContext = {},
): Promise<AnnotationReport | null> {
  const config = await loadConfig(options, { env: context.env, searchFrom: context.searchFrom });
  const reporter =
    context.reporter ??
    new ProgressReporter({ color: config.output.color, verbose: config.output.verbose });

  if (options.showConfig) {
    reporter.printMessage(formatConfigDisplay(config, reporter.colors));
    reporter.printMessage('');
    reporter.printMessage('Raw configuration:');
    reporter.printMessage(formatConfig(config));
    return null;
  }

  try {
    reporter.printHeader(VERSION);

    const tools = createTools(config, context.runner);
    const statuses = await performHealthChecks([tools.reuse]);
    reporter.reportToolStatus(statuses);
    requireAvailable(statuses);

    const inputPath = resolveAbsolutePath(config.annotate.input);
    const authors = await readInput(inputPath);
    reporter.printMessage(`Reading authors from: ${reporter.colors.bold(inputPath)}`);
    reporter.printMessage(`Found ${reporter.colors.bold(String(authors.size))} file(s) to annotate.`);
    reporter.printMessage('');

    const fileExists = config.annotate.checkFilesExist
      ? (filePath: string) => fs.existsSync(path.resolve(tools.cwd, filePath))
      : undefined;

    reporter.startPhase('annotate');
    const report = await driveAnnotation(tools.reuse, authors, {
      defaultContributors: config.annotate.defaultContributors,
      extraArgs: options.passthrough ?? [],
      fileExists,
      onEvent: createAnnotationProgressHandler(reporter),
    });
    reporter.completePhase('annotate', `${report.total} file(s)`);

    reporter.printAnnotationReport(report);

    if (hasFailures(report)) {
      throw new AnnotationFailedError(report.failed.length);
    }
    return report;
  } finally {
    reporter.stop();
  }
}

/**
 * CLI entry point for annotate
 */
export async function annotateCommand(options: CliOptions, context: CommandContext = {}): Promise<void> {
  try {
    await runAnnotate(options, context);
  } catch (error) {
    handleError(error);
  }
}
