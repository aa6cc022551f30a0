export const ScanErrorType = {
  ACCESS_ERROR: 'ACCESS_ERROR',
  INVALID_KEYSTORE: 'INVALID_KEYSTORE',
  READ_FAILURE: 'READ_FAILURE',
} as const;

export type ScanErrorType = (typeof ScanErrorType)[keyof typeof ScanErrorType];

/** A path the directory scan could not use. Scanning continues past it. */
export interface DirectoryScanError {
  readonly path: string;
  readonly type: ScanErrorType;
  readonly error: Error;
}

export interface DirectoryScanResult {
  /** Valid keystore files, sorted by path. */
  readonly keystores: readonly string[];
  readonly errors: readonly DirectoryScanError[];
}

/** What a directory holds, for display before an import is started. */
export interface KeystoreDiscoveryReport {
  readonly directoryPath: string;
  readonly validKeystores: readonly string[];
  readonly scanErrors: readonly DirectoryScanError[];
  readonly totalFilesFound: number;
  readonly validFilesCount: number;
  readonly errorFilesCount: number;
  readonly passwordFilesFound: number;
}
