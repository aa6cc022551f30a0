import type { Sequelize } from 'sequelize';
import type { StoredWallet, WalletStore } from '@keybatch/keystore';
import { defineWalletModel, DEFAULT_WALLET_TABLE } from './models/WalletModel.js';
import type { WalletModel } from './models/WalletModel.js';
import * as WalletMapper from './mappers/WalletMapper.js';

export interface SequelizeWalletStoreOptions {
  /** Default: `keybatch_wallets`. */
  readonly tableName?: string;
}

/**
 * Sequelize-based WalletStore adapter for `@keybatch/keystore`.
 *
 * Persists imported wallets to a relational database using Sequelize v6.
 * Supports any dialect supported by Sequelize (PostgreSQL, MySQL, MariaDB,
 * SQLite, MS SQL Server).
 *
 * Call `initialize()` after construction to create the table.
 */
export class SequelizeWalletStore implements WalletStore {
  private readonly Wallet: WalletModel;

  constructor(sequelize: Sequelize, options: SequelizeWalletStoreOptions = {}) {
    this.Wallet = defineWalletModel(sequelize, options.tableName ?? DEFAULT_WALLET_TABLE);
  }

  async initialize(): Promise<void> {
    await this.Wallet.sync();
  }

  async saveWallet(wallet: StoredWallet): Promise<void> {
    const row = WalletMapper.toRow(wallet);
    const existing = await this.Wallet.findByPk(row.address);
    if (existing) {
      throw new Error(`Wallet already exists: ${wallet.address}`);
    }
    await this.Wallet.create(row);
  }

  async findByAddress(address: string): Promise<StoredWallet | null> {
    const row = await this.Wallet.findByPk(address.toLowerCase());
    if (!row) return null;
    return WalletMapper.toDomain(row.get({ plain: true }));
  }

  /** Oldest import first. */
  async listWallets(): Promise<StoredWallet[]> {
    const rows = await this.Wallet.findAll({
      order: [
        ['importedAt', 'ASC'],
        ['address', 'ASC'],
      ],
    });
    return rows.map((row) => WalletMapper.toDomain(row.get({ plain: true })));
  }
}
