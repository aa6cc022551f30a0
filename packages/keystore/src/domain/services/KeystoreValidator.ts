import type { KdfParams, KeystoreV3, KeystoreV3Crypto } from '../model/KeystoreV3.js';
import { KeystoreErrorType, KeystoreImportError } from '../errors/KeystoreImportError.js';

type JsonObject = Record<string, unknown>;

const ADDRESS_PATTERN = /^[0-9a-fA-F]{40}$/;
const SCRYPT_FIELDS = ['dklen', 'n', 'r', 'p', 'salt'] as const;
const PBKDF2_FIELDS = ['dklen', 'c', 'prf', 'salt'] as const;

function isObject(value: unknown): value is JsonObject {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function stringAt(source: JsonObject, key: string): string {
  const value = source[key];
  return typeof value === 'string' ? value : '';
}

function numberAt(source: JsonObject, key: string): number {
  const value = source[key];
  return typeof value === 'number' ? value : 0;
}

function missing(field: string): KeystoreImportError {
  return new KeystoreImportError(KeystoreErrorType.MISSING_REQUIRED_FIELDS, `Missing required field: ${field}`, {
    field,
  });
}

/**
 * Structural checks for version 3 keystores.
 *
 * Nothing is decrypted here: a keystore that passes may still have the wrong
 * password or a bad MAC. Every failure is a `KeystoreImportError` carrying the
 * offending field.
 */
export class KeystoreValidator {
  /** Parse `text` as JSON and validate it. */
  validateKeystoreV3(text: string): KeystoreV3 {
    let parsed: unknown;
    try {
      parsed = JSON.parse(text);
    } catch (error) {
      throw new KeystoreImportError(KeystoreErrorType.INVALID_JSON, 'File does not contain valid JSON', {
        cause: error,
      });
    }

    if (!isObject(parsed)) {
      throw new KeystoreImportError(KeystoreErrorType.INVALID_KEYSTORE, 'Keystore must be a JSON object');
    }
    return this.validateStructure(parsed);
  }

  validateStructure(source: JsonObject): KeystoreV3 {
    this.validateVersion(source['version']);
    const address = stringAt(source, 'address');
    this.validateAddress(address);
    const crypto = this.validateCrypto(source['crypto']);

    return { version: 3, id: stringAt(source, 'id'), address, crypto };
  }

  validateVersion(version: unknown): void {
    if (version !== 3) {
      throw new KeystoreImportError(
        KeystoreErrorType.INVALID_VERSION,
        `Invalid keystore version: ${String(version)}, expected version 3`,
        { field: 'version' },
      );
    }
  }

  /** 40 hex characters, with or without a `0x` prefix. */
  validateAddress(address: string): void {
    if (address === '') {
      throw missing('address');
    }

    const bare = address.toLowerCase().startsWith('0x') ? address.slice(2) : address;
    if (!ADDRESS_PATTERN.test(bare)) {
      throw new KeystoreImportError(KeystoreErrorType.INVALID_ADDRESS, `Invalid Ethereum address format: ${address}`, {
        field: 'address',
      });
    }
  }

  validateCrypto(value: unknown): KeystoreV3Crypto {
    const crypto = isObject(value) ? value : {};
    const cipherparams = isObject(crypto['cipherparams']) ? crypto['cipherparams'] : {};

    const cipher = stringAt(crypto, 'cipher');
    if (cipher === '') throw missing('crypto.cipher');
    const ciphertext = stringAt(crypto, 'ciphertext');
    if (ciphertext === '') throw missing('crypto.ciphertext');
    const iv = stringAt(cipherparams, 'iv');
    if (iv === '') throw missing('crypto.cipherparams.iv');
    const kdf = stringAt(crypto, 'kdf');
    if (kdf === '') throw missing('crypto.kdf');
    const rawParams = crypto['kdfparams'];
    if (rawParams === undefined || rawParams === null) throw missing('crypto.kdfparams');
    const mac = stringAt(crypto, 'mac');
    if (mac === '') throw missing('crypto.mac');

    return { cipher, ciphertext, cipherparams: { iv }, kdf, kdfparams: this.validateKdfParams(kdf, rawParams), mac };
  }

  private validateKdfParams(kdf: string, raw: unknown): KdfParams {
    switch (kdf.toLowerCase()) {
      case 'scrypt': {
        const params = this.requireFields(raw, SCRYPT_FIELDS, 'scrypt');
        return {
          kdf: 'scrypt',
          dklen: numberAt(params, 'dklen'),
          n: numberAt(params, 'n'),
          r: numberAt(params, 'r'),
          p: numberAt(params, 'p'),
          salt: stringAt(params, 'salt'),
        };
      }
      case 'pbkdf2': {
        const params = this.requireFields(raw, PBKDF2_FIELDS, 'PBKDF2');
        return {
          kdf: 'pbkdf2',
          dklen: numberAt(params, 'dklen'),
          c: numberAt(params, 'c'),
          prf: stringAt(params, 'prf'),
          salt: stringAt(params, 'salt'),
        };
      }
      default:
        throw new KeystoreImportError(KeystoreErrorType.INVALID_KEYSTORE, `Unsupported KDF algorithm: ${kdf}`, {
          field: 'crypto.kdf',
        });
    }
  }

  private requireFields(raw: unknown, fields: readonly string[], label: string): JsonObject {
    if (!isObject(raw)) {
      throw new KeystoreImportError(KeystoreErrorType.INVALID_KEYSTORE, `Invalid ${label} parameters format`, {
        field: 'crypto.kdfparams',
      });
    }
    for (const field of fields) {
      if (!(field in raw)) throw missing(`crypto.kdfparams.${field}`);
    }
    return raw;
  }
}
