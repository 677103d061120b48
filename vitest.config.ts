import * as path from 'node:path';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    // Workspace packages run from source; their `main` points at build output.
    alias: [
      { find: /^@inikit\/([a-z]+)$/, replacement: path.resolve(__dirname, 'packages/$1/src/index.ts') },
    ],
  },
  test: {
    include: ['packages/*/src/__tests__/**/*.test.ts'],
    environment: 'node',
    // CLI tests chdir into temp directories, which worker threads reject.
    pool: 'forks',
  },
});
