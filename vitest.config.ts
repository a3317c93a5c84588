import { fileURLToPath } from 'node:url'
import { defineConfig } from 'vitest/config'

const rootDir = fileURLToPath(new URL('.', import.meta.url))
const fromRoot = (relative: string) => `${rootDir}${relative}`

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',
    pool: 'forks',
    poolOptions: {
      forks: {
        execArgv: ['--import', 'tsx'],
      },
    },
    include: ['test/**/*.test.ts'],
    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      exclude: [
        '**/node_modules/**',
        '**/dist/**',
        '**/test/**',
        '**/*.test.ts',
        '**/migrations/**',
      ],
      include: ['src/**/*.ts'],
    },
    globalSetup: './test/setup/global-setup.ts',
    setupFiles: ['./test/setup/database-cleanup.ts'],
    testTimeout: 10000,
    hookTimeout: 10000,
  },
  resolve: {
    alias: [
      // Map .js imports to .ts files for path aliases
      {
        find: /^@root\/(.*)\.js$/,
        replacement: fromRoot('src/$1.ts'),
      },
      {
        find: /^@services\/(.*)\.js$/,
        replacement: fromRoot('src/services/$1.ts'),
      },
      {
        find: /^@plugins\/(.*)\.js$/,
        replacement: fromRoot('src/plugins/$1.ts'),
      },
      {
        find: /^@utils\/(.*)\.js$/,
        replacement: fromRoot('src/utils/$1.ts'),
      },
      {
        find: /^@schemas\/(.*)\.js$/,
        replacement: fromRoot('src/schemas/$1.ts'),
      },
      // Regular aliases without .js extension
      { find: '@root', replacement: fromRoot('src') },
      { find: '@services', replacement: fromRoot('src/services') },
      { find: '@plugins', replacement: fromRoot('src/plugins') },
      { find: '@utils', replacement: fromRoot('src/utils') },
      { find: '@schemas', replacement: fromRoot('src/schemas') },
    ],
    extensions: ['.ts', '.js', '.json'],
  },
})
