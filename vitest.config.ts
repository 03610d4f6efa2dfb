import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

const pkg = (name: string, entry = 'index.ts'): string =>
  fileURLToPath(new URL(`./packages/${name}/src/${entry}`, import.meta.url));

export default defineConfig({
  test: {
    environment: 'node',
    include: ['packages/*/src/**/*.test.ts'],
    testTimeout: 10_000,
  },
  resolve: {
    alias: [
      { find: '@snaptrail/snapshot-contracts', replacement: pkg('snapshot-contracts') },
      { find: '@snaptrail/snapshot-history', replacement: pkg('snapshot-history') },
      { find: /^@snaptrail\/snapshot-engine\/testing$/, replacement: pkg('snapshot-engine', 'testing.ts') },
      { find: /^@snaptrail\/snapshot-engine$/, replacement: pkg('snapshot-engine') },
      { find: '@snaptrail/snapshot-core', replacement: pkg('snapshot-core') },
    ],
  },
});
