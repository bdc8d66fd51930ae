import { defineConfig } from 'vitest/config';

export default defineConfig({
    test: {
        environment: 'node',
        include: ['tests/**/*.test.ts'],
        testTimeout: 15000,
        env: {
            LOG_LEVEL: 'silent',
            SOLANA_NETWORK: 'solana-devnet',
        },
    },
});
