/**
 * Remaining-time estimate for per-file phases
 */

interface Checkpoint {
  at: number;
  filesDone: number;
}

/**
 * Estimates the time left in a phase from the last few file completions.
 * Tool calls vary a lot between files, so only a short window counts.
 */
export class TimeEstimator {
  private checkpoints: Checkpoint[] = [];

  constructor(
    private readonly window: number = 10,
    private readonly now: () => number = () => Date.now(),
  ) {}

  /** Note that `filesDone` files of the phase have finished */
  record(filesDone: number): void {
    this.checkpoints.push({ at: this.now(), filesDone });
    if (this.checkpoints.length > this.window) {
      this.checkpoints.shift();
    }
  }

  /**
   * Milliseconds until `totalFiles` are done, or null before two distinct
   * checkpoints with forward progress exist
   */
  estimateRemaining(filesDone: number, totalFiles: number): number | null {
    const oldest = this.checkpoints[0];
    const newest = this.checkpoints[this.checkpoints.length - 1];
    if (!oldest || !newest || oldest === newest) {
      return null;
    }

    const elapsed = newest.at - oldest.at;
    const finished = newest.filesDone - oldest.filesDone;
    if (elapsed <= 0 || finished <= 0) {
      return null;
    }

    const left = totalFiles - filesDone;
    return left <= 0 ? 0 : Math.round((left * elapsed) / finished);
  }

  /** Forget all checkpoints when a new phase starts */
  reset(): void {
    this.checkpoints = [];
  }
}
