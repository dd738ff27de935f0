import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';

export default defineConfig({
    test: {
        // Test environment
        environment: 'node',

        // Include patterns
        include: ['tests/unit/**/*.test.ts'],

        // Exclude patterns
        exclude: ['node_modules', 'dist'],

        // Setup files run before each test file
        setupFiles: ['tests/unit/setup.ts'],

        // Coverage configuration
        coverage: {
            provider: 'v8',
            reporter: ['text', 'json', 'html'],
            reportsDirectory: './coverage',
            include: ['src/lib/**/*.ts'],
            exclude: ['**/*.d.ts'],
        },

        // Global timeout
        testTimeout: 10000,

        // Fail fast on first error in CI
        bail: process.env.CI ? 1 : 0,
    },

    // Path aliases (match tsconfig)
    resolve: {
        alias: {
            '@': fileURLToPath(new URL('./src', import.meta.url)),
        },
    },
});
