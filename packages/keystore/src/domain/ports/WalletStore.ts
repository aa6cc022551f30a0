/** An imported wallet as persisted. */
export interface StoredWallet {
  /** Lower-case, `0x`-prefixed. Unique across the store. */
  readonly address: string;
  readonly name: string;
  readonly keystorePath: string;
  /** Epoch milliseconds. */
  readonly importedAt: number;
}

/**
 * Port for persisting imported wallets.
 *
 * Implement this interface to keep wallets in a database. The default
 * in-memory adapter is used when no store is configured.
 */
export interface WalletStore {
  /** Rejects when a wallet with the same address already exists. */
  saveWallet(wallet: StoredWallet): Promise<void>;
  findByAddress(address: string): Promise<StoredWallet | null>;
  listWallets(): Promise<StoredWallet[]>;
}
