import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        // Enable globals (describe, it, expect) without imports
        globals: true,

        // Use Node environment for TypeScript testing
        environment: 'node',

        // Include test files
        include: ['src/**/*.test.ts', 'src/**/*.spec.ts'],

        // Move generation and search timings
        benchmark: {
            include: ['src/**/*.bench.ts'],
        },

        // Keep engine logs out of the test output
        env: {
            LOG_LEVEL: 'silent'
        },

        // Coverage configuration
        coverage: {
            provider: 'v8',
            reporter: ['text', 'html', 'lcov'],
            include: ['src/**/*.ts'],
            exclude: ['src/**/*.test.ts', 'src/**/*.spec.ts', 'src/**/*.bench.ts', 'src/testing/**', 'src/bin/**'],
            reportsDirectory: './coverage',
        },

        // Search tests walk full game trees
        testTimeout: 30000,
    },
});
