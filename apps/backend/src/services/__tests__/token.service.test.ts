/// <reference types="vitest" />

import { describe, it, expect } from 'vitest';
import jwt from 'jsonwebtoken';
import { TokenService } from '../token.service.js';

describe('TokenService', () => {
    const tokens = new TokenService({ secret: 'test-secret', expiresInMinutes: 30 });

    it('should sign the user id as subject with email and role claims', () => {
        const token = tokens.sign({ userId: 'user-1', email: 'ada@example.com', role: 'admin' });

        const payload = jwt.decode(token, { json: true });

        expect(payload).toMatchObject({ sub: 'user-1', email: 'ada@example.com', role: 'admin' });
        expect(payload?.exp).toBe((payload?.iat ?? 0) + 1800);
        expect(tokens.verify(token)).toEqual({ userId: 'user-1', email: 'ada@example.com', role: 'admin' });
    });

    it('should reject expired tokens', () => {
        const token = jwt.sign({ email: 'ada@example.com', role: 'user', exp: Math.floor(Date.now() / 1000) - 60 }, 'test-secret', {
            subject: 'user-1'
        });

        expect(() => tokens.verify(token)).toThrow('Token expired');
    });

    it('should reject tokens without the role claim', () => {
        const token = jwt.sign({ email: 'ada@example.com' }, 'test-secret', { subject: 'user-1' });

        expect(() => tokens.verify(token)).toThrow('Invalid token claims');
    });

    it('should reject garbage', () => {
        expect(() => tokens.verify('not-a-token')).toThrow('Invalid token');
    });
});
