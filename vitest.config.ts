import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    // Test file patterns
    include: ['tests/**/*.test.ts'],

    // Global test APIs
    globals: true,

    // Test isolation
    isolate: true,

    // Coverage settings
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html', 'lcov'],
      include: ['src/**/*.ts'],
      exclude: [
        'src/index.ts', // Entry point
        'dist/**',
        'tests/**',
      ],
    },

    // Environment variables
    env: {
      NODE_ENV: 'test',
    },
  },
});
