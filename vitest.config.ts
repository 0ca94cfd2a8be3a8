import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
  resolve: {
    alias: {
      '@courier/http-pipeline-core': fileURLToPath(
        new URL('./libs/http-pipeline-core/src/index.ts', import.meta.url),
      ),
      '@courier/http-pipeline-auth': fileURLToPath(
        new URL('./libs/http-pipeline-auth/src/index.ts', import.meta.url),
      ),
    },
  },
  test: {
    include: ['libs/*/src/**/__tests__/**/*.test.ts'],
    environment: 'node',
    restoreMocks: true,
  },
});
