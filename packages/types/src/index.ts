/**
 * @reuseify/types - Shared type definitions for reuseify
 *
 * This package provides a stable import location for the data model passed
 * between the collector and the annotator, and for the contracts the tool
 * adapters implement.
 *
 * Usage:
 *   import type { AuthorMap, AnnotationOutcome } from '@reuseify/types';
 *   import type { LicenseLinter, AnnotatorService } from '@reuseify/types';
 */

// Author records produced by the collector
export * from './authors/index.js';

// Annotation outcomes produced by the driver
export * from './annotation/index.js';

// Tool contracts
export type {
  LicenseLinter,
  HistoryService,
  IgnoreChecker,
  AnnotatorService,
  ToolStatus,
  ProcessResult,
  ProcessRunner,
  RunOptions,
} from './services/index.js';
