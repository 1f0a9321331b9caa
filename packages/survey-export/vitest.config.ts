import { fileURLToPath } from 'node:url';
import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        name: 'survey-export',
        // Anchored here so the workspace root's `npm test` finds the same files
        root: fileURLToPath(new URL('.', import.meta.url)),
        include: ['src/**/*.test.ts'],
        exclude: ['node_modules', 'dist'],
        testTimeout: 30000,
        pool: 'forks',
        globals: true,
        setupFiles: ['src/__tests__/setup.ts'],
    },
});
