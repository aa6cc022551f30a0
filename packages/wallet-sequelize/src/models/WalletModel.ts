import { DataTypes } from 'sequelize';
import type { Model, ModelStatic, Sequelize } from 'sequelize';

export interface WalletRow {
  address: string;
  name: string;
  keystorePath: string;
  /** BIGINT: some dialects hand it back as a string. */
  importedAt: number | string;
}

export type WalletInstance = Model<WalletRow>;
export type WalletModel = ModelStatic<WalletInstance>;

export const DEFAULT_WALLET_TABLE = 'keybatch_wallets';

export function defineWalletModel(sequelize: Sequelize, tableName: string = DEFAULT_WALLET_TABLE): WalletModel {
  return sequelize.define<WalletInstance>(
    'KeybatchWallet',
    {
      address: {
        type: DataTypes.STRING(42),
        primaryKey: true,
        allowNull: false,
      },
      name: {
        type: DataTypes.STRING(255),
        allowNull: false,
      },
      keystorePath: {
        type: DataTypes.TEXT,
        allowNull: false,
      },
      importedAt: {
        type: DataTypes.BIGINT,
        allowNull: false,
      },
    },
    {
      tableName,
      timestamps: false,
    },
  );
}
