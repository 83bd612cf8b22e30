/// <reference types="vitest" />

import { describe, it, expect, beforeEach } from 'vitest';
import { AuthService } from '../services/auth.service.js';
import { UserService } from '../../users/services/user.service.js';
import { TokenService } from '../../../services/token.service.js';
import { ForbiddenError, UnauthorizedError, ValidationError } from '../../../lib/errors.js';
import { InMemoryUserRepository } from '../../../tests/vitest/mocks/user-repository.js';
import { InMemoryFileStorage } from '../../../tests/vitest/mocks/file-storage.js';
import { FakeGoogleUserInfoClient } from '../../../tests/vitest/mocks/google-userinfo-client.js';
import { MockLogger } from '../../../tests/vitest/mocks/logger.js';

describe('AuthService', () => {
    let repository: InMemoryUserRepository;
    let users: UserService;
    let google: FakeGoogleUserInfoClient;
    let tokens: TokenService;
    let service: AuthService;

    beforeEach(() => {
        const logger = new MockLogger();
        repository = new InMemoryUserRepository();
        users = new UserService(
            repository,
            new InMemoryFileStorage(),
            { maxSizeBytes: 1024, allowedTypes: ['image/png'] },
            logger
        );
        google = new FakeGoogleUserInfoClient();
        tokens = new TokenService({ secret: 'test-secret', expiresInMinutes: 30 });
        service = new AuthService(users, google, tokens, logger);
    });

    it('should create an account on first login and issue a token for it', async () => {
        google.profiles.set('google-token', {
            sub: 'google-1',
            email: 'Ada@Example.com',
            name: 'Ada',
            picture: 'https://lh3.example.com/ada.png'
        });

        const result = await service.loginWithGoogle('google-token');

        expect(result.tokenType).toBe('bearer');
        expect(result.expiresIn).toBe(1800);
        expect(result.user).toMatchObject({
            email: 'ada@example.com',
            fullName: 'Ada',
            profilePicture: 'https://lh3.example.com/ada.png'
        });
        expect(result.user.lastLogin).toBeInstanceOf(Date);
        expect(tokens.verify(result.accessToken)).toEqual({
            userId: result.user.id,
            email: 'ada@example.com',
            role: 'user'
        });
        expect(repository.users.get(result.user.id)?.googleId).toBe('google-1');
    });

    it('should fall back to the email local part when Google sends no name', async () => {
        google.profiles.set('google-token', { sub: 'google-1', email: 'grace@example.com' });

        const result = await service.loginWithGoogle('google-token');

        expect(result.user.fullName).toBe('grace');
    });

    it('should reuse an account registered with the same email and attach the Google id', async () => {
        const existing = await users.createUser({ email: 'ada@example.com', fullName: 'Ada L.' });
        google.profiles.set('google-token', { sub: 'google-1', email: 'ada@example.com', name: 'Ada' });

        const result = await service.loginWithGoogle('google-token');

        expect(result.user.id).toBe(existing.id);
        expect(result.user.fullName).toBe('Ada L.');
        expect(repository.users.size).toBe(1);
        expect(repository.users.get(existing.id)?.googleId).toBe('google-1');
    });

    it('should find the account by Google id when the email changed', async () => {
        const existing = await users.createUser({ email: 'old@example.com', googleId: 'google-1' });
        google.profiles.set('google-token', { sub: 'google-1', email: 'new@example.com' });

        const result = await service.loginWithGoogle('google-token');

        expect(result.user.id).toBe(existing.id);
        expect(repository.users.size).toBe(1);
    });

    it('should refuse a Google account without an email', async () => {
        google.profiles.set('google-token', { sub: 'google-1' });

        await expect(service.loginWithGoogle('google-token')).rejects.toBeInstanceOf(ValidationError);
        expect(repository.users.size).toBe(0);
    });

    it('should refuse inactive accounts', async () => {
        const existing = await users.createUser({ email: 'ada@example.com' });
        await repository.update(existing.id, { isActive: false });
        google.profiles.set('google-token', { sub: 'google-1', email: 'ada@example.com' });

        await expect(service.loginWithGoogle('google-token')).rejects.toBeInstanceOf(ForbiddenError);
        expect(repository.users.get(existing.id)?.lastLogin).toBeNull();
    });

    it('should pass on Google rejecting the token', async () => {
        await expect(service.loginWithGoogle('unknown-token')).rejects.toBeInstanceOf(UnauthorizedError);
        expect(google.requestedTokens).toEqual(['unknown-token']);
    });
});
