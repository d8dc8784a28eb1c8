import { fileURLToPath } from 'node:url';
import path from 'node:path';

import { defineConfig } from 'vitest/config';

const repoRoot = fileURLToPath(new URL('.', import.meta.url));

/**
 * Vitest runs against TypeScript source. Workspace imports are aliased to
 * their source entrypoints so nothing needs building first.
 */
export default defineConfig({
  resolve: {
    alias: {
      '@keystroke/core': path.join(repoRoot, 'packages/core/src/index.ts'),
    },
  },
  test: {
    globals: true,
    include: ['packages/**/src/**/*.test.ts'],
  },
});
