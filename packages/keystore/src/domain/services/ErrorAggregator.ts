import { KeystoreErrorType, KeystoreImportError } from '../errors/KeystoreImportError.js';
import { PasswordFileError, isPasswordFileErrorRecoverable } from '../errors/PasswordFileError.js';
import type { PasswordFileErrorType } from '../errors/PasswordFileError.js';
import { PasswordInputError, PasswordInputErrorType } from '../errors/PasswordInputError.js';

export const ErrorCategory = {
  FILE_SYSTEM: 'FILE_SYSTEM',
  VALIDATION: 'VALIDATION',
  PASSWORD: 'PASSWORD',
  USER_ACTION: 'USER_ACTION',
  SYSTEM: 'SYSTEM',
  UNKNOWN: 'UNKNOWN',
} as const;

export type ErrorCategory = (typeof ErrorCategory)[keyof typeof ErrorCategory];

/** What the user did about a file, as far as the batch knows. */
export const UserAction = {
  NONE: 'NONE',
  SKIP: 'SKIP',
  CANCEL: 'CANCEL',
  RETRY: 'RETRY',
  IGNORE: 'IGNORE',
  ABORT: 'ABORT',
} as const;

export type UserAction = (typeof UserAction)[keyof typeof UserAction];

export interface AggregatedError {
  readonly error: Error;
  readonly file: string;
  readonly errorType: KeystoreErrorType;
  readonly category: ErrorCategory;
  readonly recoverable: boolean;
  readonly recoveryHint: string;
  readonly userAction: UserAction;
  /** Epoch milliseconds. */
  readonly timestamp: number;
}

export interface ErrorSummary {
  readonly totalOperations: number;
  readonly successCount: number;
  readonly failureCount: number;
  readonly skipCount: number;
  readonly totalErrors: number;
  readonly recoverableErrors: number;
  readonly categoryBreakdown: ReadonlyMap<ErrorCategory, number>;
  readonly startTime: number;
  readonly elapsedMs: number;
}

export interface RetryRecommendation {
  readonly errorType: KeystoreErrorType;
  readonly affectedFiles: readonly string[];
  /** Higher runs first. */
  readonly priority: number;
  readonly strategy: string;
  /** Localization key. */
  readonly description: string;
}

export interface ErrorReport {
  readonly summary: ErrorSummary;
  readonly errors: readonly AggregatedError[];
  readonly errorsByCategory: ReadonlyMap<ErrorCategory, readonly AggregatedError[]>;
  /** Sorted by priority, highest first. */
  readonly retryRecommendations: readonly RetryRecommendation[];
  readonly generatedAt: number;
}

const FILE_SYSTEM_TYPES: ReadonlySet<KeystoreErrorType> = new Set<KeystoreErrorType>([
  KeystoreErrorType.FILE_NOT_FOUND,
  KeystoreErrorType.CORRUPTED_FILE,
  KeystoreErrorType.PASSWORD_FILE_NOT_FOUND,
  KeystoreErrorType.PASSWORD_FILE_UNREADABLE,
  KeystoreErrorType.PASSWORD_FILE_OVERSIZED,
  KeystoreErrorType.DIRECTORY_SCAN_FAILED,
]);

const VALIDATION_TYPES: ReadonlySet<KeystoreErrorType> = new Set<KeystoreErrorType>([
  KeystoreErrorType.INVALID_JSON,
  KeystoreErrorType.INVALID_KEYSTORE,
  KeystoreErrorType.INVALID_VERSION,
  KeystoreErrorType.ADDRESS_MISMATCH,
  KeystoreErrorType.MISSING_REQUIRED_FIELDS,
  KeystoreErrorType.INVALID_ADDRESS,
  KeystoreErrorType.PASSWORD_FILE_INVALID,
  KeystoreErrorType.IMPORT_JOB_VALIDATION_FAILED,
]);

const PASSWORD_TYPES: ReadonlySet<KeystoreErrorType> = new Set<KeystoreErrorType>([
  KeystoreErrorType.INCORRECT_PASSWORD,
  KeystoreErrorType.PASSWORD_FILE_EMPTY,
  KeystoreErrorType.PASSWORD_FILE_CORRUPTED,
  KeystoreErrorType.PASSWORD_INPUT_TIMEOUT,
  KeystoreErrorType.PASSWORD_INPUT_CANCELLED,
  KeystoreErrorType.PASSWORD_INPUT_SKIPPED,
  KeystoreErrorType.MAX_PASSWORD_ATTEMPTS_EXCEEDED,
]);

const PASSWORD_FILE_TYPES: Record<PasswordFileErrorType, KeystoreErrorType> = {
  PASSWORD_FILE_NOT_FOUND: KeystoreErrorType.PASSWORD_FILE_NOT_FOUND,
  PASSWORD_FILE_UNREADABLE: KeystoreErrorType.PASSWORD_FILE_UNREADABLE,
  PASSWORD_FILE_EMPTY: KeystoreErrorType.PASSWORD_FILE_EMPTY,
  PASSWORD_FILE_INVALID: KeystoreErrorType.PASSWORD_FILE_INVALID,
  PASSWORD_FILE_OVERSIZED: KeystoreErrorType.PASSWORD_FILE_OVERSIZED,
  PASSWORD_FILE_CORRUPTED: KeystoreErrorType.PASSWORD_FILE_CORRUPTED,
};

const PASSWORD_INPUT_TYPES: Record<PasswordInputErrorType, KeystoreErrorType> = {
  CANCELLED: KeystoreErrorType.PASSWORD_INPUT_CANCELLED,
  SKIPPED: KeystoreErrorType.PASSWORD_INPUT_SKIPPED,
  TIMEOUT: KeystoreErrorType.PASSWORD_INPUT_TIMEOUT,
  INVALID: KeystoreErrorType.INCORRECT_PASSWORD,
  MAX_ATTEMPTS_EXCEEDED: KeystoreErrorType.MAX_PASSWORD_ATTEMPTS_EXCEEDED,
};

const RETRY_PRIORITY: Partial<Record<KeystoreErrorType, number>> = {
  PASSWORD_FILE_NOT_FOUND: 10,
  PASSWORD_INPUT_TIMEOUT: 10,
  FILE_NOT_FOUND: 8,
  DIRECTORY_SCAN_FAILED: 8,
  INCORRECT_PASSWORD: 7,
  PASSWORD_INPUT_CANCELLED: 7,
  PASSWORD_FILE_UNREADABLE: 6,
  PASSWORD_FILE_EMPTY: 6,
  IMPORT_JOB_VALIDATION_FAILED: 5,
};

const RETRY_STRATEGY: Partial<Record<KeystoreErrorType, string>> = {
  PASSWORD_FILE_NOT_FOUND: 'manual_password_input',
  PASSWORD_INPUT_TIMEOUT: 'manual_password_input',
  FILE_NOT_FOUND: 'reselect_files',
  DIRECTORY_SCAN_FAILED: 'reselect_directory',
  INCORRECT_PASSWORD: 'correct_password',
  PASSWORD_FILE_UNREADABLE: 'fix_file_permissions',
  PASSWORD_FILE_EMPTY: 'provide_password_file_content',
};

const RETRY_DESCRIBED: ReadonlySet<KeystoreErrorType> = new Set<KeystoreErrorType>([
  KeystoreErrorType.PASSWORD_FILE_NOT_FOUND,
  KeystoreErrorType.PASSWORD_INPUT_TIMEOUT,
  KeystoreErrorType.FILE_NOT_FOUND,
  KeystoreErrorType.DIRECTORY_SCAN_FAILED,
  KeystoreErrorType.INCORRECT_PASSWORD,
  KeystoreErrorType.PASSWORD_FILE_UNREADABLE,
  KeystoreErrorType.PASSWORD_FILE_EMPTY,
]);

export function categorizeErrorType(type: KeystoreErrorType): ErrorCategory {
  if (FILE_SYSTEM_TYPES.has(type)) return ErrorCategory.FILE_SYSTEM;
  if (VALIDATION_TYPES.has(type)) return ErrorCategory.VALIDATION;
  if (PASSWORD_TYPES.has(type)) return ErrorCategory.PASSWORD;
  return ErrorCategory.SYSTEM;
}

export function retryPriority(type: KeystoreErrorType): number {
  return RETRY_PRIORITY[type] ?? 1;
}

export function retryStrategyFor(type: KeystoreErrorType): string {
  return RETRY_STRATEGY[type] ?? 'manual_review';
}

export function retryDescription(type: KeystoreErrorType): string {
  return RETRY_DESCRIBED.has(type) ? `retry_description_${type.toLowerCase()}` : 'retry_description_generic';
}

type Classification = Pick<AggregatedError, 'errorType' | 'category' | 'recoverable' | 'recoveryHint'>;

function classify(error: Error): Classification {
  if (error instanceof KeystoreImportError) {
    return {
      errorType: error.type,
      category: categorizeErrorType(error.type),
      recoverable: error.recoverable,
      recoveryHint: error.recoveryHint,
    };
  }
  if (error instanceof PasswordFileError) {
    return {
      errorType: PASSWORD_FILE_TYPES[error.type],
      category: ErrorCategory.PASSWORD,
      recoverable: isPasswordFileErrorRecoverable(error.type),
      recoveryHint: `${error.type.toLowerCase()}_recovery`,
    };
  }
  if (error instanceof PasswordInputError) {
    return {
      errorType: PASSWORD_INPUT_TYPES[error.type],
      category: ErrorCategory.USER_ACTION,
      recoverable: error.type !== PasswordInputErrorType.MAX_ATTEMPTS_EXCEEDED,
      recoveryHint: `password_input_recovery_${error.type.toLowerCase()}`,
    };
  }
  return {
    errorType: KeystoreErrorType.BATCH_IMPORT_FAILED,
    category: ErrorCategory.SYSTEM,
    recoverable: false,
    recoveryHint: 'generic_error_recovery',
  };
}

export function successRate(summary: ErrorSummary): number {
  return summary.totalOperations === 0 ? 0 : (summary.successCount / summary.totalOperations) * 100;
}

export function failureRate(summary: ErrorSummary): number {
  return summary.totalOperations === 0 ? 0 : (summary.failureCount / summary.totalOperations) * 100;
}

export function skipRate(summary: ErrorSummary): number {
  return summary.totalOperations === 0 ? 0 : (summary.skipCount / summary.totalOperations) * 100;
}

/** `UNKNOWN` when there were no errors. Ties go to the category seen first. */
export function mostCommonCategory(summary: ErrorSummary): ErrorCategory {
  let best: ErrorCategory = ErrorCategory.UNKNOWN;
  let bestCount = 0;
  for (const [category, count] of summary.categoryBreakdown) {
    if (count > bestCount) {
      best = category;
      bestCount = count;
    }
  }
  return best;
}

/** Multi-line summary for a log or a completion screen. */
export function formatErrorReportSummary(report: ErrorReport): string {
  const s = report.summary;
  const lines = [
    `Total Operations: ${s.totalOperations}`,
    `Successful: ${s.successCount} (${successRate(s).toFixed(1)}%)`,
    `Failed: ${s.failureCount} (${failureRate(s).toFixed(1)}%)`,
    `Skipped: ${s.skipCount} (${skipRate(s).toFixed(1)}%)`,
    `Elapsed Time: ${Math.round(s.elapsedMs / 1000)}s`,
  ];
  if (s.recoverableErrors > 0) {
    lines.push(`Recoverable Errors: ${s.recoverableErrors}`);
  }
  return lines.join('\n');
}

/**
 * Collects the outcome of every file in one batch and turns the failures into
 * categories, counts and retry recommendations.
 */
export class ErrorAggregator {
  private readonly errors: AggregatedError[] = [];
  private successCount = 0;
  private failureCount = 0;
  private skipCount = 0;

  constructor(
    private readonly totalOperations: number,
    private readonly startTime: number = Date.now(),
  ) {}

  addError(error: Error, file: string, userAction: UserAction = UserAction.NONE, now: number = Date.now()): void {
    this.errors.push({ error, file, userAction, timestamp: now, ...classify(error) });

    if (userAction === UserAction.SKIP) {
      this.skipCount++;
    } else {
      this.failureCount++;
    }
  }

  addSuccess(): void {
    this.successCount++;
  }

  getErrors(): readonly AggregatedError[] {
    return [...this.errors];
  }

  getErrorsByCategory(): Map<ErrorCategory, AggregatedError[]> {
    const grouped = new Map<ErrorCategory, AggregatedError[]>();
    for (const entry of this.errors) {
      const list = grouped.get(entry.category) ?? [];
      list.push(entry);
      grouped.set(entry.category, list);
    }
    return grouped;
  }

  getRecoverableErrors(): AggregatedError[] {
    return this.errors.filter((entry) => entry.recoverable);
  }

  getErrorSummary(now: number = Date.now()): ErrorSummary {
    const categoryBreakdown = new Map<ErrorCategory, number>();
    for (const entry of this.errors) {
      categoryBreakdown.set(entry.category, (categoryBreakdown.get(entry.category) ?? 0) + 1);
    }

    return {
      totalOperations: this.totalOperations,
      successCount: this.successCount,
      failureCount: this.failureCount,
      skipCount: this.skipCount,
      totalErrors: this.errors.length,
      recoverableErrors: this.errors.filter((entry) => entry.recoverable).length,
      categoryBreakdown,
      startTime: this.startTime,
      elapsedMs: now - this.startTime,
    };
  }

  /** One recommendation per recoverable error type. */
  getRetryRecommendations(): RetryRecommendation[] {
    const byType = new Map<KeystoreErrorType, string[]>();
    for (const entry of this.getRecoverableErrors()) {
      const files = byType.get(entry.errorType) ?? [];
      files.push(entry.file);
      byType.set(entry.errorType, files);
    }

    return [...byType]
      .map(([errorType, affectedFiles]) => ({
        errorType,
        affectedFiles,
        priority: retryPriority(errorType),
        strategy: retryStrategyFor(errorType),
        description: retryDescription(errorType),
      }))
      .sort((a, b) => b.priority - a.priority);
  }

  generateErrorReport(now: number = Date.now()): ErrorReport {
    return {
      summary: this.getErrorSummary(now),
      errors: this.getErrors(),
      errorsByCategory: this.getErrorsByCategory(),
      retryRecommendations: this.getRetryRecommendations(),
      generatedAt: now,
    };
  }
}
