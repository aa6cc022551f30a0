import type { ImportSummary } from '../model/ImportSummary.js';
import { isRetryableError } from './RetryPolicy.js';

/** Overall result of a finished batch. */
export type CompletionOutcome = 'all_successful' | 'partial_success' | 'all_failed';

/** Actions a UI may offer once a batch is complete. */
export const CompletionAction = {
  RETURN_TO_MENU: 'return_to_menu',
  RETRY_FAILED: 'retry_failed',
  RETRY_WITH_MANUAL_PASSWORDS: 'retry_with_manual_passwords',
  VIEW_ERROR_DETAILS: 'view_error_details',
  SELECT_DIFFERENT_FILES: 'select_different_files',
} as const;

export type CompletionAction = (typeof CompletionAction)[keyof typeof CompletionAction];

const ACTION_LABELS: Record<CompletionAction, string> = {
  [CompletionAction.RETURN_TO_MENU]: 'Return to menu',
  [CompletionAction.RETRY_FAILED]: 'Retry failed imports',
  [CompletionAction.RETRY_WITH_MANUAL_PASSWORDS]: 'Retry with manual passwords',
  [CompletionAction.VIEW_ERROR_DETAILS]: 'View error details',
  [CompletionAction.SELECT_DIFFERENT_FILES]: 'Select different files',
};

export function completionActionLabel(action: CompletionAction): string {
  return ACTION_LABELS[action];
}

/** Everything a completion screen needs, computed once when the batch completes. */
export interface CompletionReport {
  readonly outcome: CompletionOutcome;
  readonly summary: ImportSummary;
  /** Share of successful imports, 0–100. `0` for an empty batch. */
  readonly successRate: number;
  readonly elapsedMs: number;
  readonly failedFiles: readonly string[];
  readonly skippedFiles: readonly string[];
  /** Failed (never skipped) files whose error looks worth retrying. */
  readonly retryableFiles: readonly string[];
  readonly hasRetryableErrors: boolean;
  readonly actions: readonly CompletionAction[];
}

function outcomeOf(summary: ImportSummary): CompletionOutcome {
  if (summary.failedImports === 0 && summary.skippedImports === 0) return 'all_successful';
  if (summary.successfulImports > 0) return 'partial_success';
  return 'all_failed';
}

export function buildCompletionReport(summary: ImportSummary, startedAt: number, now: number): CompletionReport {
  const failedFiles: string[] = [];
  const skippedFiles: string[] = [];
  const retryableFiles: string[] = [];

  for (const entry of summary.errors) {
    if (entry.skipped) {
      skippedFiles.push(entry.file);
      continue;
    }
    failedFiles.push(entry.file);
    if (isRetryableError(entry.error)) {
      retryableFiles.push(entry.file);
    }
  }

  const hasRetryableErrors = retryableFiles.length > 0;
  const actions: CompletionAction[] = [CompletionAction.RETURN_TO_MENU];
  if (hasRetryableErrors) {
    actions.push(CompletionAction.RETRY_FAILED, CompletionAction.RETRY_WITH_MANUAL_PASSWORDS);
  }
  if (summary.errors.length > 0) {
    actions.push(CompletionAction.VIEW_ERROR_DETAILS);
  }
  actions.push(CompletionAction.SELECT_DIFFERENT_FILES);

  return {
    outcome: outcomeOf(summary),
    summary,
    successRate: summary.totalFiles > 0 ? (summary.successfulImports / summary.totalFiles) * 100 : 0,
    elapsedMs: Math.max(0, now - startedAt),
    failedFiles,
    skippedFiles,
    retryableFiles,
    hasRetryableErrors,
    actions,
  };
}

/** One-line statistics, e.g. `Total: 3 | Success: 2 | Failed: 1 | Skipped: 0`. */
export function formatSummaryLine(summary: ImportSummary): string {
  return (
    `Total: ${summary.totalFiles} | Success: ${summary.successfulImports} | ` +
    `Failed: ${summary.failedImports} | Skipped: ${summary.skippedImports}`
  );
}

/** Error text cut to 60 characters for list views. */
export function shortErrorMessage(error: Error | undefined): string {
  if (!error) return 'Unknown error';
  const message = error.message;
  return message.length > 60 ? `${message.slice(0, 57)}...` : message;
}

/** Why a file ended up skipped, for display. */
export function getSkipReason(error: Error | undefined): string {
  if (!error) return 'User chose to skip';

  const message = error.message.toLowerCase();
  if (message.includes('cancelled')) return 'User cancelled password input';
  if (message.includes('skipped')) return 'User chose to skip this file';
  if (message.includes('timeout')) return 'Password input timed out';
  return 'User action required';
}

/** Suggestions for fixing a failed import, most specific first. */
export function getRecoverySuggestions(error: Error | undefined): string[] {
  if (!error) return ['Try the operation again'];

  const message = error.message.toLowerCase();
  const suggestions: string[] = [];

  if (message.includes('password') || message.includes('decrypt')) {
    suggestions.push(
      'Verify the password is correct',
      'Check if a .pwd file exists with the correct password',
      'Try entering the password manually',
    );
  }
  if (message.includes('permission') || message.includes('access')) {
    suggestions.push(
      'Check file permissions',
      'Ensure the file is not locked by another process',
      'Try running with appropriate permissions',
    );
  }
  if (message.includes('not found')) {
    suggestions.push('Verify the file path is correct', 'Ensure the file exists and is accessible');
  }
  if (message.includes('format') || message.includes('invalid')) {
    suggestions.push('Verify the file is a valid KeyStore V3 format', 'Check if the file is corrupted');
  }

  if (suggestions.length === 0) {
    suggestions.push('Review the error message and try again', 'Contact support if the issue persists');
  }
  return suggestions;
}
