/** Why a keystore could not be listed, validated or imported. */
export const KeystoreErrorType = {
  FILE_NOT_FOUND: 'FILE_NOT_FOUND',
  INVALID_JSON: 'INVALID_JSON',
  INVALID_KEYSTORE: 'INVALID_KEYSTORE',
  INVALID_VERSION: 'INVALID_VERSION',
  INCORRECT_PASSWORD: 'INCORRECT_PASSWORD',
  CORRUPTED_FILE: 'CORRUPTED_FILE',
  ADDRESS_MISMATCH: 'ADDRESS_MISMATCH',
  MISSING_REQUIRED_FIELDS: 'MISSING_REQUIRED_FIELDS',
  INVALID_ADDRESS: 'INVALID_ADDRESS',
  DUPLICATE_WALLET: 'DUPLICATE_WALLET',

  PASSWORD_FILE_NOT_FOUND: 'PASSWORD_FILE_NOT_FOUND',
  PASSWORD_FILE_UNREADABLE: 'PASSWORD_FILE_UNREADABLE',
  PASSWORD_FILE_EMPTY: 'PASSWORD_FILE_EMPTY',
  PASSWORD_FILE_INVALID: 'PASSWORD_FILE_INVALID',
  PASSWORD_FILE_OVERSIZED: 'PASSWORD_FILE_OVERSIZED',
  PASSWORD_FILE_CORRUPTED: 'PASSWORD_FILE_CORRUPTED',

  BATCH_IMPORT_FAILED: 'BATCH_IMPORT_FAILED',
  IMPORT_JOB_VALIDATION_FAILED: 'IMPORT_JOB_VALIDATION_FAILED',
  DIRECTORY_SCAN_FAILED: 'DIRECTORY_SCAN_FAILED',
  PASSWORD_INPUT_TIMEOUT: 'PASSWORD_INPUT_TIMEOUT',
  PASSWORD_INPUT_CANCELLED: 'PASSWORD_INPUT_CANCELLED',
  PASSWORD_INPUT_SKIPPED: 'PASSWORD_INPUT_SKIPPED',
  MAX_PASSWORD_ATTEMPTS_EXCEEDED: 'MAX_PASSWORD_ATTEMPTS_EXCEEDED',
} as const;

export type KeystoreErrorType = (typeof KeystoreErrorType)[keyof typeof KeystoreErrorType];

const RECOVERABLE: ReadonlySet<KeystoreErrorType> = new Set<KeystoreErrorType>([
  KeystoreErrorType.INCORRECT_PASSWORD,
  KeystoreErrorType.PASSWORD_FILE_NOT_FOUND,
  KeystoreErrorType.PASSWORD_FILE_UNREADABLE,
  KeystoreErrorType.PASSWORD_FILE_EMPTY,
  KeystoreErrorType.PASSWORD_INPUT_TIMEOUT,
  KeystoreErrorType.PASSWORD_INPUT_CANCELLED,
  KeystoreErrorType.PASSWORD_INPUT_SKIPPED,
  KeystoreErrorType.FILE_NOT_FOUND,
  KeystoreErrorType.DIRECTORY_SCAN_FAILED,
  KeystoreErrorType.IMPORT_JOB_VALIDATION_FAILED,
  KeystoreErrorType.BATCH_IMPORT_FAILED,
]);

const DEFAULT_RECOVERY_HINTS: Partial<Record<KeystoreErrorType, string>> = {
  [KeystoreErrorType.FILE_NOT_FOUND]: 'keystore_recovery_file_not_found',
  [KeystoreErrorType.INVALID_JSON]: 'keystore_recovery_invalid_json',
  [KeystoreErrorType.INVALID_KEYSTORE]: 'keystore_recovery_invalid_structure',
  [KeystoreErrorType.INCORRECT_PASSWORD]: 'keystore_recovery_incorrect_password',
  [KeystoreErrorType.PASSWORD_FILE_NOT_FOUND]: 'password_file_recovery_not_found',
  [KeystoreErrorType.PASSWORD_FILE_UNREADABLE]: 'password_file_recovery_unreadable',
  [KeystoreErrorType.PASSWORD_FILE_EMPTY]: 'password_file_recovery_empty',
  [KeystoreErrorType.PASSWORD_FILE_INVALID]: 'password_file_recovery_invalid',
  [KeystoreErrorType.BATCH_IMPORT_FAILED]: 'batch_import_recovery_failed',
  [KeystoreErrorType.DIRECTORY_SCAN_FAILED]: 'directory_scan_recovery_failed',
  [KeystoreErrorType.PASSWORD_INPUT_TIMEOUT]: 'password_input_recovery_timeout',
  [KeystoreErrorType.MAX_PASSWORD_ATTEMPTS_EXCEEDED]: 'password_attempts_recovery_exceeded',
};

/** Whether an error of this type can usually be fixed by retrying or picking other input. */
export function isRecoverableErrorType(type: KeystoreErrorType): boolean {
  return RECOVERABLE.has(type);
}

export function defaultRecoveryHint(type: KeystoreErrorType): string {
  return DEFAULT_RECOVERY_HINTS[type] ?? 'keystore_recovery_general';
}

export interface KeystoreImportErrorOptions {
  readonly file?: string;
  /** Dotted path of the keystore field at fault, e.g. `crypto.kdfparams.salt`. */
  readonly field?: string;
  /** Overrides the per-type default. */
  readonly recoverable?: boolean;
  readonly recoveryHint?: string;
  readonly cause?: unknown;
}

export class KeystoreImportError extends Error {
  readonly type: KeystoreErrorType;
  readonly file: string;
  readonly field: string;
  readonly recoverable: boolean;
  readonly recoveryHint: string;
  readonly context = new Map<string, unknown>();

  constructor(type: KeystoreErrorType, message: string, options: KeystoreImportErrorOptions = {}) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'KeystoreImportError';
    this.type = type;
    this.file = options.file ?? '';
    this.field = options.field ?? '';
    this.recoverable = options.recoverable ?? isRecoverableErrorType(type);
    this.recoveryHint = options.recoveryHint ?? defaultRecoveryHint(type);
  }
}
