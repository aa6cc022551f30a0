/** Sent by the worker when a keystore needs an interactive password. Consumed exactly once. */
export interface PasswordRequest {
  readonly keystoreFile: string;
  /** 1-based attempt number. */
  readonly attemptCount: number;
  readonly isRetry: boolean;
  /** Message explaining why the previous attempt failed. */
  readonly errorMessage?: string;
}

/** The user's answer to a `PasswordRequest`. Created exactly once per request. */
export interface PasswordResponse {
  readonly password: string;
  readonly cancelled: boolean;
  readonly skip: boolean;
}

export function submitResponse(password: string): PasswordResponse {
  return { password, cancelled: false, skip: false };
}

export function cancelResponse(): PasswordResponse {
  return { password: '', cancelled: true, skip: false };
}

export function skipResponse(): PasswordResponse {
  return { password: '', cancelled: false, skip: true };
}
