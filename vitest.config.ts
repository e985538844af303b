import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

const packageEntry = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  resolve: {
    alias: {
      // Keep tests independent from prebuilt package artifacts in clean checkouts.
      '@trellis/db': packageEntry('db'),
      '@trellis/shared': packageEntry('shared'),
      '@trellis/core': packageEntry('core'),
    },
  },
  test: {
    include: ['packages/**/src/**/*.test.ts'],
    exclude: ['**/dist/**', '**/node_modules/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'lcov'],
      reportsDirectory: './coverage',
      include: ['packages/*/src/**/*.ts'],
      exclude: ['**/*.test.ts', '**/test-support.ts', '**/dist/**', '**/node_modules/**', '**/*.d.ts'],
    },
  },
});
