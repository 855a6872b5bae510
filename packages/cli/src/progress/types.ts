/**
 * Shared types for progress reporter components
 */

/**
 * Color function type for conditional colorization
 */
export type ColorFn = (text: string) => string;

/**
 * Color functions bundle
 */
export interface ColorFunctions {
  bold: ColorFn;
  dim: ColorFn;
  green: ColorFn;
  red: ColorFn;
  yellow: ColorFn;
  cyan: ColorFn;
}

/**
 * Run phases
 */
export type RunPhase = 'lint' | 'filter' | 'history' | 'annotate';

/**
 * Phase display names
 */
export const PHASE_NAMES: Record<RunPhase, string> = {
  lint: 'Running reuse lint',
  filter: 'Filtering excluded files',
  history: 'Fetching git authors',
  annotate: 'Annotating files',
};

/**
 * Progress reporter options
 */
export interface ProgressReporterOptions {
  /** Suppress all output */
  silent?: boolean;
  /** Enable colored output (default: true) */
  color?: boolean;
  /** Print every file as it is processed (default: false) */
  verbose?: boolean;
}
