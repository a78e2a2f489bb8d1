// vitest.config.ts

import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        include: ['tests/**/*.test.ts'],
        environment: 'node',
        // reference evaluation patches process.stdout
        pool: 'forks',
        testTimeout: 20_000,
    },
});
