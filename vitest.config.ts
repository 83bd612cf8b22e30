import { defineConfig } from 'vitest/config';

/**
 * Root-level Vitest configuration for the monorepo.
 *
 * `npm test` at the root runs every workspace's colocated `__tests__` suites
 * with this file. The backend keeps its own vitest.config.ts for running its
 * tests from inside apps/backend.
 *
 * The env block satisfies the zod schema in apps/backend/src/config/env.ts so
 * that importing configuration never fails under test. Nothing connects to
 * these URLs: tests use in-process fakes only.
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
            MONGODB_URI: 'mongodb://localhost:27017/everly-test',
            JWT_SECRET: 'test-secret'
        }
    }
});
