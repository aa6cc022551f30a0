export const PasswordFileErrorType = {
  NOT_FOUND: 'PASSWORD_FILE_NOT_FOUND',
  UNREADABLE: 'PASSWORD_FILE_UNREADABLE',
  EMPTY: 'PASSWORD_FILE_EMPTY',
  INVALID: 'PASSWORD_FILE_INVALID',
  OVERSIZED: 'PASSWORD_FILE_OVERSIZED',
  CORRUPTED: 'PASSWORD_FILE_CORRUPTED',
} as const;

export type PasswordFileErrorType = (typeof PasswordFileErrorType)[keyof typeof PasswordFileErrorType];

/** Missing, unreadable and empty files can be fixed, or bypassed with manual input. */
export function isPasswordFileErrorRecoverable(type: PasswordFileErrorType): boolean {
  return (
    type === PasswordFileErrorType.NOT_FOUND ||
    type === PasswordFileErrorType.UNREADABLE ||
    type === PasswordFileErrorType.EMPTY
  );
}

/** Problem with a `.pwd` password file. */
export class PasswordFileError extends Error {
  readonly type: PasswordFileErrorType;
  readonly file: string;
  readonly recoverable: boolean;
  readonly recoveryHint: string;

  constructor(
    type: PasswordFileErrorType,
    file: string,
    message: string,
    options: { recoverable?: boolean; recoveryHint?: string; cause?: unknown } = {},
  ) {
    super(message, options.cause === undefined ? undefined : { cause: options.cause });
    this.name = 'PasswordFileError';
    this.type = type;
    this.file = file;
    this.recoverable = options.recoverable ?? isPasswordFileErrorRecoverable(type);
    this.recoveryHint = options.recoveryHint ?? `${type.toLowerCase()}_recovery`;
  }
}
