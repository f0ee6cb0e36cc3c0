import { defineConfig } from 'vitest/config'
import { resolve } from 'path'

export default defineConfig({
  test: {
    environment: 'node',
    include: ['**/__tests__/**/*.test.ts'],
    exclude: ['**/node_modules/**', '**/dist/**'],
    coverage: {
      provider: 'v8',
      reporter: ['json-summary', 'text', 'lcov'],
      reportsDirectory: './coverage',
      include: [
        'render-chart/src/**',
        'package-chart/src/**',
        'apply-chart/src/**',
        'packages/shared/src/**',
        'packages/chart/src/**',
        'packages/k8s-client/src/**'
      ],
      exclude: ['**/node_modules/**', '**/dist/**', '**/__tests__/**']
    }
  },
  resolve: {
    alias: [
      {
        find: '@chart-actions/shared',
        replacement: resolve(__dirname, 'packages/shared/src')
      },
      {
        find: /^@chart-actions\/chart$/,
        replacement: resolve(__dirname, 'packages/chart/src/index.ts')
      },
      {
        find: /^@chart-actions\/k8s-client$/,
        replacement: resolve(__dirname, 'packages/k8s-client/src/index.ts')
      },
      {
        find: /^@kubernetes\/client-node$/,
        replacement: resolve(__dirname, '__mocks__/@kubernetes/client-node.ts')
      }
    ]
  }
})
