import type { StoredWallet } from '@keybatch/keystore';
import type { WalletRow } from '../models/WalletModel.js';

/** Addresses are stored lower-cased so the primary key is case-insensitive. */
export function toRow(wallet: StoredWallet): WalletRow {
  return {
    address: wallet.address.toLowerCase(),
    name: wallet.name,
    keystorePath: wallet.keystorePath,
    importedAt: wallet.importedAt,
  };
}

export function toDomain(row: WalletRow): StoredWallet {
  return {
    address: row.address,
    name: row.name,
    keystorePath: row.keystorePath,
    importedAt: Number(row.importedAt),
  };
}
