import path from 'node:path'
import { defineConfig } from 'vitest/config'

export default defineConfig({
  test: {
    include: ['src/**/*.{test,spec}.ts'],
    exclude: [
      '**/node_modules/**',
      '**/dist/**',
      '**/.{git,cache,output,temp}/**',
    ],
    env: {
      NODE_ENV: 'test',
      DATABASE_PATH: ':memory:',
      LOG_LEVEL: 'silent',
      SQLITE_MIGRATIONS_DIR: path.resolve(__dirname, '../../infra/sqlite/migrations'),
    },
    environment: 'node',
    setupFiles: ['tests/setup-env.ts'],
    allowOnly: false,
    fileParallelism: false,
    isolate: true,
    sequence: {
      concurrent: false,
    },
    testTimeout: 30000,
    hookTimeout: 30000,
    passWithNoTests: false,
  },
})
