import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const testsSrc = fileURLToPath(new URL('./packages/tests/src', import.meta.url));

export default defineConfig({
  resolve: {
    alias: [{ find: /^~\//, replacement: `${testsSrc}/` }],
  },
  test: {
    include: ['packages/tests/src/tests/**/*.test.ts'],
    testTimeout: 30_000,
    hookTimeout: 60_000,
    watch: false,
  },
});
