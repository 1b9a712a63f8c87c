import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  resolve: {
    alias: {
      '@shared': path.resolve(__dirname, 'src/shared'),
      '@core': path.resolve(__dirname, 'src/ledger-core'),
      '@sheets': path.resolve(__dirname, 'src/spreadsheets'),
      '@cli': path.resolve(__dirname, 'src/ledger-cli'),
      '@api': path.resolve(__dirname, 'src/ledger-api'),
    },
  },
  test: {
    globals: false,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
