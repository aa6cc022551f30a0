/** One unit of import work: a single keystore file. */
export interface ImportJob {
  /** Path to the keystore file. */
  readonly keystorePath: string;
  /** Name the imported wallet will be stored under. */
  readonly walletName: string;
  /** Path to the matching `.pwd` password file, when one was found. */
  readonly passwordPath?: string;
  /** Password supplied up front. Takes precedence over the password file. */
  readonly manualPassword?: string;
  /** `true` when the password must be collected interactively. */
  readonly requiresInput: boolean;
}

/** What a successful import produced. */
export interface ImportedWallet {
  readonly name: string;
  readonly address: string;
}

/** Outcome of one job. Created once by the worker and never mutated afterwards. */
export interface ImportResult {
  readonly job: ImportJob;
  readonly success: boolean;
  /** `true` when the user skipped or cancelled the password prompt for this file. */
  readonly skipped: boolean;
  readonly error?: Error;
  readonly wallet?: ImportedWallet;
}

/** Create a successful result. */
export function successResult(job: ImportJob, wallet: ImportedWallet): ImportResult {
  return { job, success: true, skipped: false, wallet };
}

/** Create a failed result. */
export function failedResult(job: ImportJob, error: Error): ImportResult {
  return { job, success: false, skipped: false, error };
}

/** Create a result for a file the user skipped. */
export function skippedResult(job: ImportJob, error: Error): ImportResult {
  return { job, success: false, skipped: true, error };
}
