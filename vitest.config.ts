import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

const packageSource = (name: string): string =>
  fileURLToPath(new URL(`./packages/${name}/src/index.ts`, import.meta.url));

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['packages/*/tests/**/*.{test,spec}.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    testTimeout: 10000,
    hookTimeout: 10000,
  },
  resolve: {
    alias: {
      '@loadramp/shared': packageSource('shared'),
      '@loadramp/core': packageSource('core'),
      '@loadramp/runtime': packageSource('runtime'),
      '@loadramp/cli': fileURLToPath(new URL('./packages/cli/src/program.ts', import.meta.url)),
    },
  },
});
