import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['src/**/__tests__/**/*.test.ts'],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
    ],
    env: {
      SPOTIFY_CLIENT_ID: 'test-client-id',
      SPOTIFY_CLIENT_SECRET: 'test-secret',
      LOG_LEVEL: 'silent',
      CONSOLE_LOG_LEVEL: 'silent',
    },
    coverage: {
      provider: 'v8',
      reporter: ['text', 'html'],

      thresholds: {
        lines: 70,
        functions: 70,
        branches: 65,
      },

      include: ['src/**/*.ts'],
      exclude: [
        'node_modules/',
        'dist/',
        '**/__tests__/**',
        '*.config.ts',
        'src/cli.ts',           // CLI entry point
        'src/**/types.ts',      // Type definition files
      ],
    },
  },
});
