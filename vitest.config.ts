import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: [
      {
        find: /^@scholar\/([^/]+)\/(.*)$/,
        replacement: fileURLToPath(new URL('./packages/$1/$2', import.meta.url)),
      },
    ],
  },
  test: {
    globals: true,
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['node_modules'],
  },
});
