import { defineConfig, coverageConfigDefaults } from 'vitest/config'
import { resolve, dirname } from 'path'
import { fileURLToPath } from 'url'

const __dirname = dirname(fileURLToPath(import.meta.url))
const isCI = process.env.CI === 'true'

export default defineConfig({
  resolve: {
    alias: {
      '@healthlog/core': resolve(__dirname, 'packages/core/src/index.ts'),
    },
  },
  test: {
    include: ['packages/*/src/**/*.test.ts'],
    exclude: ['node_modules/**', 'dist/**'],

    coverage: {
      provider: 'v8',
      reporter: isCI ? ['text', 'json', 'lcov'] : ['text', 'html'],
      reportsDirectory: './coverage',

      include: ['packages/core/src/**/*.ts', 'packages/cli/src/**/*.ts'],

      exclude: [
        ...coverageConfigDefaults.exclude,
        '**/*.test.ts',
        '**/*.d.ts',
        '**/index.ts',
        // Entry point only wires commander to the tested handlers
        'packages/cli/src/cli.ts',
      ],

      thresholds: {
        lines: 80,
        branches: 75,
        functions: 80,
        statements: 80,
      },
    },
  },
})
