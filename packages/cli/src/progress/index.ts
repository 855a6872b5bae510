/**
 * Progress module exports
 */

export type { RunPhase, ProgressReporterOptions } from './reporter.js';
export {
  ProgressReporter,
  createCollectorProgressHandler,
  createAnnotationProgressHandler,
} from './reporter.js';
export {
  createColorFns,
  formatConfigDisplay,
  formatAnnotationReport,
  formatCollectionSummary,
  formatAuthorLine,
  formatUntrackedLine,
  formatExcludedLine,
  formatEta,
} from './formatters.js';
export { TimeEstimator } from './time-estimator.js';
