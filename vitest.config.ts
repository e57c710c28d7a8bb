import { fileURLToPath } from 'node:url'

import { defineConfig } from 'vitest/config'

function fromRoot(relativePath: string): string {
  return fileURLToPath(new URL(relativePath, import.meta.url))
}

export default defineConfig({
  test: {
    globals: true,
    environment: 'node',

    isolate: true,
    pool: 'threads',

    // Mock cleanup settings
    mockReset: true,
    clearMocks: true,
    restoreMocks: true,

    coverage: {
      provider: 'v8',
      reporter: ['text', 'json', 'html'],
      include: ['src/**/*.ts'],
      exclude: [
        'node_modules/**',
        '**/*.test.ts',
        '**/index.ts',
        '**/types.ts',
        'coverage/**',
        'dist/**',
      ],
      thresholds: {
        branches: 85,
        functions: 90,
        lines: 90,
        statements: 90,
      },
    },

    include: ['src/**/*.test.ts', 'tools/**/*.test.ts'],
  },
  resolve: {
    // Mirrors compilerOptions.paths in tsconfig.json
    alias: {
      '@ble': fromRoot('./src/ble'),
      '@boot': fromRoot('./src/boot'),
      '@cloud': fromRoot('./src/cloud'),
      '@litter': fromRoot('./src/litter'),
      '@logging': fromRoot('./src/logging'),
      '@system': fromRoot('./src/system'),
      '@utils': fromRoot('./src/utils'),
      '@validation': fromRoot('./src/validation'),
      '$types': fromRoot('./src/types'),
    },
  },
})
