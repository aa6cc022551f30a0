import type { ImportJob, ImportResult } from '../model/ImportJob.js';

/** Which files a retry should cover. */
export const RetryStrategy = {
  /** Only files that failed (not skipped). */
  RETRY_FAILED: 'retry_failed',
  /** Only files the user skipped. */
  RETRY_SKIPPED: 'retry_skipped',
  /** Every non-successful file. */
  RETRY_ALL: 'retry_all',
  /** Same files as `retry_failed`, but always prompt for the password. */
  MANUAL_PASSWORDS: 'manual_passwords',
  /** One file, named by path. */
  RETRY_SPECIFIC: 'retry_specific',
} as const;

export type RetryStrategy = (typeof RetryStrategy)[keyof typeof RetryStrategy];

/** Broad reason a failure is worth retrying. */
export type RetryCategory = 'password' | 'access' | 'timeout';

/** What the UI should run again after a finished batch. */
export interface RetryPlan {
  readonly strategy: RetryStrategy;
  /** Keystore paths, in result order. */
  readonly files: readonly string[];
  /** When `true`, `.pwd` lookup is bypassed and every file prompts interactively. */
  readonly forceManualPassword: boolean;
  /** Ready-made jobs, present when the worker can build them. */
  readonly jobs?: readonly ImportJob[];
}

/** Results split by outcome. */
export interface ClassifiedResults {
  readonly successful: readonly ImportResult[];
  readonly failed: readonly ImportResult[];
  readonly skipped: readonly ImportResult[];
}

const CATEGORY_PATTERNS: readonly (readonly [RetryCategory, readonly string[]])[] = [
  ['password', ['password', 'incorrect', 'invalid', 'decrypt']],
  ['access', ['permission', 'access']],
  ['timeout', ['timeout']],
];

/** Classify an error message by case-insensitive substring match. `null` means not retryable. */
export function classifyRetryCategory(error: Error | string | undefined): RetryCategory | null {
  if (error === undefined) return null;
  const message = (typeof error === 'string' ? error : error.message).toLowerCase();

  for (const [category, patterns] of CATEGORY_PATTERNS) {
    if (patterns.some((pattern) => message.includes(pattern))) {
      return category;
    }
  }
  return null;
}

export function isRetryableError(error: Error | string | undefined): boolean {
  return classifyRetryCategory(error) !== null;
}

/** A skipped result is never retryable, whatever its message. */
export function isRetryableResult(result: ImportResult): boolean {
  if (result.success || result.skipped) return false;
  return isRetryableError(result.error);
}

export function classifyResults(results: readonly ImportResult[]): ClassifiedResults {
  const successful: ImportResult[] = [];
  const failed: ImportResult[] = [];
  const skipped: ImportResult[] = [];

  for (const result of results) {
    if (result.success) {
      successful.push(result);
    } else if (result.skipped) {
      skipped.push(result);
    } else {
      failed.push(result);
    }
  }

  return { successful, failed, skipped };
}

/**
 * Keystore paths a strategy selects from a result list.
 *
 * `retry_specific` needs a path and goes through `buildRetryPlan()`; here it
 * selects nothing.
 */
export function getRetryFiles(results: readonly ImportResult[], strategy: RetryStrategy): string[] {
  const select = (predicate: (result: ImportResult) => boolean): string[] =>
    results.filter(predicate).map((result) => result.job.keystorePath);

  switch (strategy) {
    case RetryStrategy.RETRY_FAILED:
    case RetryStrategy.MANUAL_PASSWORDS:
      return select((r) => !r.success && !r.skipped);
    case RetryStrategy.RETRY_SKIPPED:
      return select((r) => r.skipped);
    case RetryStrategy.RETRY_ALL:
      return select((r) => !r.success);
    case RetryStrategy.RETRY_SPECIFIC:
      return [];
  }
}

export function buildRetryPlan(
  results: readonly ImportResult[],
  strategy: RetryStrategy,
  specificFile?: string,
): RetryPlan {
  const files =
    strategy === RetryStrategy.RETRY_SPECIFIC
      ? specificFile === undefined
        ? []
        : [specificFile]
      : getRetryFiles(results, strategy);

  return {
    strategy,
    files,
    forceManualPassword: strategy === RetryStrategy.MANUAL_PASSWORDS,
  };
}
