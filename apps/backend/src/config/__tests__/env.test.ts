/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import { env, envSchema } from '../env.js';

describe('envSchema', () => {
    const required = { MONGODB_URI: 'mongodb://localhost:27017/everly-test', JWT_SECRET: 'test-secret' };

    it('should ignore the tooling-provided BASE_URL', () => {
        const parsed = envSchema.parse({ ...required, BASE_URL: '/' });

        expect(parsed.PUBLIC_BASE_URL).toBe('http://localhost:8000');
    });

    it('should reject a public base URL that is not absolute', () => {
        expect(envSchema.safeParse({ ...required, PUBLIC_BASE_URL: '/' }).success).toBe(false);
    });

    it('should parse boolean flags from strings', () => {
        expect(envSchema.parse({ ...required, ENABLE_MEDIA: 'off' }).ENABLE_MEDIA).toBe(false);
        expect(envSchema.parse({ ...required, ENABLE_MEDIA: 'YES' }).ENABLE_MEDIA).toBe(true);
    });

    it('should load under the test runner', () => {
        expect(env.NODE_ENV).toBe('test');
        expect(env.JWT_SECRET).toBe('test-secret');
    });
});
