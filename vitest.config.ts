import {defineConfig} from 'vitest/config';

export default defineConfig({
    test: {
        include: ['test/**/*.test.ts'],
        environment: 'node',
        // One process per test file so descriptor counts are not shared between files.
        pool: 'forks',
    },
});
