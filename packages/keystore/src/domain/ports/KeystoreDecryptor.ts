import type { KeystoreV3 } from '../model/KeystoreV3.js';

/** What a successful decryption proves: the password opens the keystore for this address. */
export interface DecryptedKey {
  /** Checksummed or lower-case, `0x`-prefixed. */
  readonly address: string;
}

/**
 * Port for keystore decryption (scrypt/pbkdf2 key derivation, MAC check and
 * AES-CTR). Cryptography lives outside this package.
 *
 * Implementations reject when the password is wrong.
 */
export interface KeystoreDecryptor {
  decrypt(keystore: KeystoreV3, password: string): Promise<DecryptedKey>;
}
