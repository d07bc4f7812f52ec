import { defineConfig } from 'vitest/config'

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        setupFiles: ['tests/core/setup.ts'],
        include: ['tests/**/*.test.ts'],
        exclude: ['**/node_modules/**', '**/dist/**'],
        testTimeout: 10000,
        hookTimeout: 10000,
        // Ensure proper test isolation
        pool: 'forks',
        isolate: true
    },
    resolve: {
        // Dedupe GraphQL to prevent "another module or realm" conflicts
        dedupe: ['graphql']
    }
})
