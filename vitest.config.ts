import path from 'path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['packages/*/src/**/*.test.ts', 'apps/*/test/**/*.test.ts'],
    alias: {
      '@juridico/shared': path.resolve(__dirname, 'packages/shared/src'),
      '@juridico/rules': path.resolve(__dirname, 'packages/rules/src'),
      '@juridico/documents': path.resolve(__dirname, 'packages/documents/src'),
      '@juridico/assessment': path.resolve(__dirname, 'packages/assessment/src')
    }
  }
});
