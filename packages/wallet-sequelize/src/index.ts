export { SequelizeWalletStore } from './SequelizeWalletStore.js';
export type { SequelizeWalletStoreOptions } from './SequelizeWalletStore.js';
export { DEFAULT_WALLET_TABLE } from './models/WalletModel.js';
