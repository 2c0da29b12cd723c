import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const rootDir = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      '@ledgerlock/types': path.resolve(rootDir, 'packages/types/src/index.ts'),
      '@ledgerlock/pdf-extract': path.resolve(rootDir, 'packages/pdf-extract/src/index.ts'),
      '@ledgerlock/categorizer': path.resolve(rootDir, 'packages/categorizer/src/index.ts'),
      '@ledgerlock/output': path.resolve(rootDir, 'packages/output/src/index.ts'),
    },
  },
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: ['node_modules', 'dist', 'tests'],
    },
  },
});
