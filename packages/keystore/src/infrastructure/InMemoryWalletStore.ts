import type { StoredWallet, WalletStore } from '../domain/ports/WalletStore.js';

/** Non-persistent wallet store. Used as the default when no custom WalletStore is provided. */
export class InMemoryWalletStore implements WalletStore {
  private wallets = new Map<string, StoredWallet>();

  saveWallet(wallet: StoredWallet): Promise<void> {
    const key = wallet.address.toLowerCase();
    if (this.wallets.has(key)) {
      return Promise.reject(new Error(`Wallet already exists: ${wallet.address}`));
    }
    this.wallets.set(key, wallet);
    return Promise.resolve();
  }

  findByAddress(address: string): Promise<StoredWallet | null> {
    return Promise.resolve(this.wallets.get(address.toLowerCase()) ?? null);
  }

  listWallets(): Promise<StoredWallet[]> {
    return Promise.resolve([...this.wallets.values()]);
  }
}
