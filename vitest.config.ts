import { defineConfig } from 'vitest/config';
import path from 'path';
import { fileURLToPath } from 'url';

const root = path.dirname(fileURLToPath(import.meta.url));

export default defineConfig({
    resolve: {
        alias: {
            // Workspace aliases so tests run against sources without a build
            '@tasklane/core/test-utils': path.resolve(root, 'packages/core/src/logger/test-utils.ts'),
            '@tasklane/core': path.resolve(root, 'packages/core/src/index.ts'),
            '@tasklane/storage': path.resolve(root, 'packages/storage/src/index.ts'),
        },
    },
    test: {
        globals: true,
        environment: 'node',
        include: ['packages/*/src/**/*.test.ts'],
        exclude: ['**/node_modules/**', '**/dist/**'],
        watch: false,
    },
});
