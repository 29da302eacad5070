import { defineConfig } from 'vitest/config';
import { dirname } from 'path';
import { fileURLToPath } from 'url';

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
  test: {
    name: 'server',
    root: __dirname,
    include: ['src/__tests__/**/*.test.ts'],
    testTimeout: 10000,
  },
});
