export interface ScryptParams {
  readonly kdf: 'scrypt';
  readonly dklen: number;
  readonly n: number;
  readonly r: number;
  readonly p: number;
  readonly salt: string;
}

export interface Pbkdf2Params {
  readonly kdf: 'pbkdf2';
  readonly dklen: number;
  readonly c: number;
  readonly prf: string;
  readonly salt: string;
}

export type KdfParams = ScryptParams | Pbkdf2Params;

export interface KeystoreV3Crypto {
  readonly cipher: string;
  readonly ciphertext: string;
  readonly cipherparams: { readonly iv: string };
  readonly kdf: string;
  readonly kdfparams: KdfParams;
  readonly mac: string;
}

/** Structurally valid Web3 Secret Storage (version 3) keystore. */
export interface KeystoreV3 {
  readonly version: 3;
  readonly id: string;
  /** As written in the file, with or without `0x`. */
  readonly address: string;
  readonly crypto: KeystoreV3Crypto;
}
