import { defineWorkspace } from 'vitest/config';

export default defineWorkspace([
  'packages/core/vitest.config.ts',
  'packages/keystore/vitest.config.ts',
  'packages/wallet-sequelize/vitest.config.ts',
]);
