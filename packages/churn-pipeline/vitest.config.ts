import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        name: 'churn-pipeline',
        include: ['src/**/*.test.ts'],
        exclude: ['node_modules', 'dist'],
        environment: 'node',
        testTimeout: 30000,
        pool: 'forks',
        globals: true,
        setupFiles: ['./src/__tests__/setup.ts'],
    },
});
