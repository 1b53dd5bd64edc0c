import { defineConfig } from 'vitest/config'

const verbose = process.env.VITEST_VERBOSE === 'true'
const coverage = process.env.COVERAGE === 'true'

export default defineConfig({
  test: {
    globals: false,
    include: [
      'packages/*/src/**/*.test.ts',
      'packages/*/test/**/*.test.ts',
      'apps/*/src/**/*.test.ts',
      'apps/*/test/**/*.test.ts',
    ],
    reporters: verbose ? ['verbose'] : ['default'],
    silent: !verbose,
    coverage: {
      enabled: coverage,
      provider: 'v8',
      reporter: ['text', 'lcov'],
      include: ['packages/*/src/**/*.ts', 'apps/*/src/**/*.ts'],
      exclude: ['**/*.d.ts', '**/*.test.ts', 'apps/*/src/main.ts'],
    },
  },
})
