import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['packages/*/test/**/*.test.ts'],
        environment: 'node',
        env: {
            LOG_SILENT: 'true',
        },
    },
});
