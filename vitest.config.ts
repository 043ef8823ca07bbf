import { defineConfig } from 'vitest/config';

/**
 * Root-level Vitest configuration for the monorepo.
 *
 * `npm test` at the root runs the colocated tests of every workspace with
 * these defaults. The back end keeps its own config with the same env for
 * runs from inside apps/backend.
 */
export default defineConfig({
    test: {
        environment: 'node',
        include: [
            'apps/**/src/**/__tests__/**/*.test.ts',
            'packages/**/src/**/__tests__/**/*.test.ts'
        ],
        exclude: ['node_modules', 'dist', '**/*.d.ts'],
        testTimeout: 30_000,
        hookTimeout: 30_000,
        reporters: 'default',
        env: {
            NODE_ENV: 'test',
            MONGODB_URI: 'mongodb://localhost:27017/test',
            REDIS_URL: 'redis://localhost:6379',
            ADMIN_API_TOKEN: 'test-secret'
        }
    }
});
