import { fileURLToPath } from 'url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@scribeloop/shared-types': fileURLToPath(
        new URL('./libs/shared-types/src/index.ts', import.meta.url),
      ),
      '@scribeloop/backend': fileURLToPath(new URL('./libs/backend/src/index.ts', import.meta.url)),
    },
  },
  test: {
    include: ['libs/**/*.spec.ts', 'apps/**/*.spec.ts'],
    setupFiles: ['./vitest.setup.ts'],
    environment: 'node',
  },
});
