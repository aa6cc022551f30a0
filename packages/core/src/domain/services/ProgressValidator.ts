import type { ImportProgress } from '../model/ImportProgress.js';
import { expectedPercentage } from '../model/ImportProgress.js';

/** Maximum allowed gap, in percentage points, between reported and recomputed percentage. */
export const PERCENTAGE_TOLERANCE = 1.0;

export type ProgressValidation = { readonly valid: true } | { readonly valid: false; readonly reason: string };

const VALID: ProgressValidation = { valid: true };

function invalid(reason: string): ProgressValidation {
  return { valid: false, reason };
}

/**
 * Check a snapshot on its own and against the last accepted one.
 *
 * Counts must be whole numbers and the percentage a finite number.
 *
 * The comparison with `previous` only applies once a batch is under way
 * (`previous.totalFiles > 0`). A drop of `processedFiles` to exactly zero is a
 * reset and is accepted.
 */
export function validateProgressUpdate(next: ImportProgress, previous: ImportProgress): ProgressValidation {
  if (!Number.isInteger(next.totalFiles) || next.totalFiles <= 0) {
    return invalid(`invalid total files count: ${next.totalFiles}`);
  }
  if (!Number.isInteger(next.processedFiles) || next.processedFiles < 0) {
    return invalid(`invalid processed files count: ${next.processedFiles}`);
  }
  if (next.processedFiles > next.totalFiles) {
    return invalid(`processed files (${next.processedFiles}) exceeds total files (${next.totalFiles})`);
  }
  if (!Number.isFinite(next.percentage) || next.percentage < 0 || next.percentage > 100) {
    return invalid(`invalid percentage: ${next.percentage}`);
  }

  const expected = expectedPercentage(next.processedFiles, next.totalFiles);
  if (Math.abs(next.percentage - expected) > PERCENTAGE_TOLERANCE) {
    return invalid(`percentage mismatch: got ${next.percentage.toFixed(2)}, expected ${expected.toFixed(2)}`);
  }

  if (previous.totalFiles > 0) {
    if (next.totalFiles !== previous.totalFiles) {
      return invalid(`total files changed mid-import: ${previous.totalFiles} -> ${next.totalFiles}`);
    }
    if (next.processedFiles < previous.processedFiles && next.processedFiles !== 0) {
      return invalid(`processed files decreased: ${previous.processedFiles} -> ${next.processedFiles}`);
    }
  }

  return VALID;
}
