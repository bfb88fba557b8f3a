import { defineConfig } from 'vitest/config';
import path from 'path';

export default defineConfig({
  test: {
    environment: 'node',
    include: [
      'shared/src/**/*.{test,spec}.ts',
      'worker/src/**/*.{test,spec}.ts',
    ],
    restoreMocks: true,
  },
  resolve: {
    alias: {
      '@': path.resolve(__dirname, 'worker/src'),
    },
  },
});
