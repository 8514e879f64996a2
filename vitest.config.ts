import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const packageSource = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    isolate: true,
    include: ['packages/*/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['packages/*/src/**/*.ts'],
      exclude: ['packages/*/src/index.ts', 'packages/test-utils/**'],
    },
  },
  resolve: {
    alias: {
      // Use source files directly for tests (no build required)
      '@pgrotate/core': packageSource('core'),
      '@pgrotate/rotation': packageSource('rotation'),
      '@pgrotate/test-utils': packageSource('test-utils'),
    },
  },
});
