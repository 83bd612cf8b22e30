/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import { env } from '../../config/env.js';
import { createModules, publicUrlFor } from '../modules.js';
import { TokenService } from '../../services/token.service.js';

describe('publicUrlFor', () => {
    const config = { PUBLIC_BASE_URL: 'http://localhost:8000/', STATIC_ROOT: 'static' };

    it('should map a directory under the static root to its public URL', () => {
        expect(publicUrlFor('static/uploads/media', config)).toBe('http://localhost:8000/static/uploads/media');
        expect(publicUrlFor('./static/uploads/profiles/', config)).toBe(
            'http://localhost:8000/static/uploads/profiles'
        );
    });

    it('should map the static root itself', () => {
        expect(publicUrlFor('static', config)).toBe('http://localhost:8000/static');
    });

    it('should refuse directories outside the static root', () => {
        expect(() => publicUrlFor('uploads/media', config)).toThrow(
            'Upload directory "uploads/media" is not inside STATIC_ROOT "static"'
        );
        expect(() => publicUrlFor('static-files/media', config)).toThrow();
    });
});

describe('createModules', () => {
    const tokens = new TokenService({ secret: 'test-secret', expiresInMinutes: 30 });

    it('should build every feature module in registration order', () => {
        const names = createModules(tokens, { ...env, ENABLE_MEDIA: true }).modules.map(module => module.identity().name);

        expect(names).toEqual(['users', 'auth', 'diaries', 'media']);
    });

    it('should leave media out when it is disabled', () => {
        const names = createModules(tokens, { ...env, ENABLE_MEDIA: false }).modules.map(module => module.identity().name);

        expect(names).toEqual(['users', 'auth', 'diaries']);
    });

    it('should hand out the registered users module for the account lookup', () => {
        const { modules, users } = createModules(tokens, env);

        expect(modules[0]).toBe(users);
    });
});
