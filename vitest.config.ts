import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    environment: 'node',
    include: ['{engine,ciphers,harness}/**/*.test.ts'],
    exclude: ['**/node_modules/**', 'dist'],
    testTimeout: 10000,
    hookTimeout: 10000,
  },
});
