import { mkdtemp, rm, writeFile } from 'node:fs/promises';
import { tmpdir } from 'node:os';
import { join } from 'node:path';
import type { DecryptedKey, KeystoreDecryptor } from '../src/domain/ports/KeystoreDecryptor.js';
import type { KeystoreV3 } from '../src/domain/model/KeystoreV3.js';

export const ALICE = 'a'.repeat(40);
export const BOB = 'b'.repeat(40);
export const CAROL = 'c'.repeat(40);

export interface KeystoreFixture {
  version: unknown;
  id: string;
  address: unknown;
  crypto: Record<string, unknown>;
}

/** Structurally valid scrypt keystore; the cipher material is filler. */
export function keystoreFixture(address: string): KeystoreFixture {
  return {
    version: 3,
    id: '0f9e8d7c-6b5a-4321-8765-43210fedcba9',
    address,
    crypto: {
      cipher: 'aes-128-ctr',
      ciphertext: 'c0ffee',
      cipherparams: { iv: '0a0b0c0d' },
      kdf: 'scrypt',
      kdfparams: { dklen: 32, n: 262144, r: 8, p: 1, salt: 'ab12' },
      mac: 'deadbeef',
    },
  };
}

export function keystoreJson(address: string): string {
  return JSON.stringify(keystoreFixture(address));
}

export async function makeTempDir(): Promise<string> {
  return mkdtemp(join(tmpdir(), 'keybatch-'));
}

export async function removeDir(dir: string): Promise<void> {
  await rm(dir, { recursive: true, force: true });
}

/** Write `<name>.json`, plus `<name>.pwd` when a password is given. Returns the keystore path. */
export async function writeKeystore(dir: string, name: string, address: string, password?: string): Promise<string> {
  const path = join(dir, `${name}.json`);
  await writeFile(path, keystoreJson(address));
  if (password !== undefined) {
    await writeFile(join(dir, `${name}.pwd`), `${password}\n`);
  }
  return path;
}

/** Accepts exactly the password registered for a keystore address. */
export class FakeDecryptor implements KeystoreDecryptor {
  readonly attempts: string[] = [];
  private readonly passwords = new Map<string, string>();
  private readonly addresses = new Map<string, string>();

  accept(address: string, password: string): this {
    this.passwords.set(address.toLowerCase(), password);
    return this;
  }

  /** Make a keystore decrypt to some other address. */
  decryptTo(address: string, decrypted: string): this {
    this.addresses.set(address.toLowerCase(), decrypted);
    return this;
  }

  async decrypt(keystore: KeystoreV3, password: string): Promise<DecryptedKey> {
    this.attempts.push(password);
    const key = keystore.address.toLowerCase();
    if (this.passwords.get(key) !== password) {
      throw new Error('could not decrypt key with given password');
    }
    return { address: this.addresses.get(key) ?? `0x${key}` };
  }
}
