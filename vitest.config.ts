import { defineConfig } from 'vitest/config';
import path, { dirname } from 'path';
import { fileURLToPath } from 'url';

const __filename = fileURLToPath(import.meta.url);
const __dirname = dirname(__filename);

export default defineConfig({
  test: {
    globals: true,
    include: ['**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    // Shared setup for server tests (mocks the logger's file transports)
    setupFiles: ['./server/src/__tests__/setup.ts'],
  },
  resolve: {
    alias: {
      '#shared': path.resolve(__dirname, 'shared/index.ts'),
    },
  },
});
