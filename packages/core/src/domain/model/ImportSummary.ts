import type { ImportResult } from './ImportJob.js';
import type { ImportError } from './ImportProgress.js';

/** Aggregate counts for a finished batch. Always derived from the result list. */
export interface ImportSummary {
  readonly totalFiles: number;
  readonly successfulImports: number;
  readonly failedImports: number;
  readonly skippedImports: number;
  /** One entry per non-successful result, skipped ones flagged with `skipped`. */
  readonly errors: readonly ImportError[];
}

/** Build a summary from a result list. */
export function buildImportSummary(results: readonly ImportResult[]): ImportSummary {
  let successfulImports = 0;
  let failedImports = 0;
  let skippedImports = 0;
  const errors: ImportError[] = [];

  for (const result of results) {
    if (result.success) {
      successfulImports++;
      continue;
    }

    if (result.skipped) {
      skippedImports++;
    } else {
      failedImports++;
    }

    errors.push({
      file: result.job.keystorePath,
      error: result.error ?? new Error('Unknown error'),
      skipped: result.skipped,
    });
  }

  return {
    totalFiles: results.length,
    successfulImports,
    failedImports,
    skippedImports,
    errors,
  };
}
