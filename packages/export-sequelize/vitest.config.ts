import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
  resolve: {
    alias: {
      '@fixedrec/core': fileURLToPath(new URL('../core/src/index.ts', import.meta.url)),
      '@fixedrec/export': fileURLToPath(new URL('../export/src/index.ts', import.meta.url)),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
  },
});
