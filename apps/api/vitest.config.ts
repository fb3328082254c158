import { defineConfig } from 'vitest/config';

// Calendar-date logic runs in local time; pin it so ISO output is stable.
process.env.TZ = 'UTC';

export default defineConfig({
    test: {
        name: 'api',
        environment: 'node',
        include: ['test/**/*.test.ts'],
        setupFiles: ['./src/test/setup.ts'],
        env: {
            TZ: 'UTC',
            LOG_LEVEL: 'silent',
        },
    },
});
