import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  resolve: {
    alias: {
      '@pipjoin/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
      '@pipjoin/index-sequelize': fileURLToPath(new URL('../index-sequelize/src/index.ts', import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
