import { defineConfig } from 'vitest/config';

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    include: ['tests/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html', 'lcov'],
      exclude: ['node_modules/', 'dist/', 'tests/', '**/*.d.ts', '**/*.config.ts', '**/types.ts'],
      thresholds: {
        lines: 75,
        functions: 75,
        branches: 70,
        statements: 75,
      },
      include: [
        'src/core/**/*.ts',
        'src/resources/**/*.ts',
        'src/observability/**/*.ts',
        'src/config/**/*.ts',
        'src/export/**/*.ts',
        'src/utils/**/*.ts',
      ],
    },
  },
});
