import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'url';
import { dirname, resolve } from 'path';

const __dirname = dirname(fileURLToPath(import.meta.url));

export default defineConfig({
    test: {
        environment: 'node',
        testTimeout: 20000,
        setupFiles: ['./src/test-setup.ts'],
        include: ['spec/**/*.test.ts'],
        exclude: ['**/node_modules/**', '**/dist/**'],
        reporters: ['default'],
    },
    resolve: {
        alias: {
            '@src': resolve(__dirname, 'src'),
            '@spec': resolve(__dirname, 'spec'),
        },
    },
});
