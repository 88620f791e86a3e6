import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    exclude: ['node_modules', 'dist'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        '**/__tests__/**',
        'src/index.ts',
        'dist/**',
        'node_modules/**',
      ],
    },
    testTimeout: 10000,
    hookTimeout: 10000,
    watch: false,
    clearMocks: true,
  },
});
