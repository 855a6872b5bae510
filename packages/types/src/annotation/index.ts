/**
 * Annotation outcome types
 *
 * One outcome per file handed to the annotator, grouped into a report once
 * the batch is done.
 */

/**
 * The annotator wrote the header
 */
export interface AnnotationSuccess {
  status: 'success';
  path: string;
  /** Contributors passed to the annotator */
  contributors: string[];
}

/**
 * The file was left alone on purpose (unrecognised type, missing file)
 */
export interface AnnotationSkipped {
  status: 'skipped';
  path: string;
  reason: string;
}

/**
 * The annotator failed for this file
 */
export interface AnnotationFailed {
  status: 'failed';
  path: string;
  /** Captured tool output, possibly empty */
  error: string;
}

export type AnnotationOutcome = AnnotationSuccess | AnnotationSkipped | AnnotationFailed;

/**
 * Outcomes of a whole batch, each group in processing order
 */
export interface AnnotationReport {
  succeeded: AnnotationSuccess[];
  skipped: AnnotationSkipped[];
  failed: AnnotationFailed[];
  total: number;
}

/**
 * Create an empty report
 */
export function createAnnotationReport(): AnnotationReport {
  return { succeeded: [], skipped: [], failed: [], total: 0 };
}

/**
 * Add an outcome to the matching group of a report
 */
export function recordOutcome(report: AnnotationReport, outcome: AnnotationOutcome): void {
  switch (outcome.status) {
    case 'success':
      report.succeeded.push(outcome);
      break;
    case 'skipped':
      report.skipped.push(outcome);
      break;
    case 'failed':
      report.failed.push(outcome);
      break;
  }
  report.total++;
}
