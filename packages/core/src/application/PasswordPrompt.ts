import type { PasswordRequest } from '../domain/model/PasswordHandshake.js';

/** Data behind a password popup for one keystore. */
export class PasswordPrompt {
  readonly keystoreFile: string;
  readonly maxRetries: number;
  private errorMessage = '';
  private retryCount = 0;

  constructor(keystoreFile: string, maxRetries: number) {
    this.keystoreFile = keystoreFile;
    this.maxRetries = maxRetries;
  }

  /** Build a prompt for a request, carrying over the previous attempt's error on a retry. */
  static fromRequest(request: PasswordRequest, maxRetries: number): PasswordPrompt {
    const prompt = new PasswordPrompt(request.keystoreFile, maxRetries);
    if (request.isRetry && request.errorMessage) {
      prompt.setError(request.errorMessage);
    }
    return prompt;
  }

  /** Record a failed attempt. */
  setError(message: string): void {
    this.errorMessage = message;
    this.retryCount++;
  }

  getErrorMessage(): string {
    return this.errorMessage;
  }

  getRetryCount(): number {
    return this.retryCount;
  }

  getAttemptsRemaining(): number {
    return Math.max(0, this.maxRetries - this.retryCount);
  }

  hasExceededMaxRetries(): boolean {
    return this.retryCount >= this.maxRetries;
  }
}
