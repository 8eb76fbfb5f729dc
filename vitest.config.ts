import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    include: ['test/**/*.test.ts'],
    exclude: ['node_modules', 'dist', 'coverage', '.git'],
    globals: true,
    environment: 'node',
    clearMocks: true,
    restoreMocks: true,
  },
});
