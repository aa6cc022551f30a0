/** An error recorded against one file during a batch. */
export interface ImportError {
  readonly file: string;
  readonly error: Error;
  /** Distinguishes a user skip from an actual failure. */
  readonly skipped: boolean;
}

/**
 * Point-in-time snapshot of a running batch, produced by the worker.
 *
 * Each snapshot supersedes the previous one in the consumer's view.
 */
export interface ImportProgress {
  /** Base name of the file being processed, `''` between files. */
  readonly currentFile: string;
  readonly totalFiles: number;
  readonly processedFiles: number;
  /** Completion percentage (0–100). */
  readonly percentage: number;
  /** Errors accumulated so far, oldest first. */
  readonly errors: readonly ImportError[];
  /** `true` while the worker waits for a password. */
  readonly pendingPassword: boolean;
  /** Base name of the file awaiting a password, `''` otherwise. */
  readonly pendingFile: string;
  /** Epoch timestamp when the batch started. */
  readonly startTime: number;
  readonly elapsedMs: number;
}

/** Fresh snapshot with nothing processed yet. */
export function createInitialProgress(totalFiles: number, startTime: number): ImportProgress {
  return {
    currentFile: '',
    totalFiles,
    processedFiles: 0,
    percentage: 0,
    errors: [],
    pendingPassword: false,
    pendingFile: '',
    startTime,
    elapsedMs: 0,
  };
}

/** Percentage the snapshot should report for the given counters. */
export function expectedPercentage(processedFiles: number, totalFiles: number): number {
  if (processedFiles === totalFiles) return 100;
  return (processedFiles / totalFiles) * 100;
}
