import { defineConfig } from 'vitest/config';
import { fileURLToPath } from 'node:url';

export default defineConfig({
    test: {
        globals: true,
        environment: 'node',
        include: ['tests/**/*.spec.ts'],
        testTimeout: 30000,
        alias: {
            '@src': fileURLToPath(new URL('./src', import.meta.url)),
        },
    },
});
