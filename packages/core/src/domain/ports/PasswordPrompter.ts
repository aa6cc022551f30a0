import type { PasswordRequest } from '../model/PasswordHandshake.js';

/** The user's decision on a password prompt. */
export type PasswordAnswer =
  | { readonly action: 'submit'; readonly password: string }
  | { readonly action: 'cancel' }
  | { readonly action: 'skip' };

/**
 * Asks the user for a keystore password.
 *
 * Used by `ImportSessionDriver`. A rejection is treated as `cancel`, so the
 * worker is never left waiting.
 */
export type PasswordPrompter = (request: PasswordRequest) => Promise<PasswordAnswer>;
