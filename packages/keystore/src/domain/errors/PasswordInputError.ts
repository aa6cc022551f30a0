export const PasswordInputErrorType = {
  CANCELLED: 'CANCELLED',
  SKIPPED: 'SKIPPED',
  TIMEOUT: 'TIMEOUT',
  INVALID: 'INVALID',
  MAX_ATTEMPTS_EXCEEDED: 'MAX_ATTEMPTS_EXCEEDED',
} as const;

export type PasswordInputErrorType = (typeof PasswordInputErrorType)[keyof typeof PasswordInputErrorType];

/** The interactive password exchange for one keystore ended without a usable password. */
export class PasswordInputError extends Error {
  readonly type: PasswordInputErrorType;
  readonly file: string;

  constructor(type: PasswordInputErrorType, message: string, file: string) {
    super(message);
    this.name = 'PasswordInputError';
    this.type = type;
    this.file = file;
  }

  isSkipped(): boolean {
    return this.type === PasswordInputErrorType.SKIPPED;
  }

  isCancelled(): boolean {
    return this.type === PasswordInputErrorType.CANCELLED;
  }

  /** Cancelled and skipped prompts count as skipped files, not failures. */
  isUserAction(): boolean {
    return this.isSkipped() || this.isCancelled();
  }
}
