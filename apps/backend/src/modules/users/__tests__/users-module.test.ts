/// <reference types="vitest" />

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import express, { type Express, type RequestHandler } from 'express';
import request from 'supertest';
import { ModuleManager } from '../../../services/module-manager/index.js';
import { errorHandler } from '../../../api/middleware/error-handler.js';
import { UnauthorizedError } from '../../../lib/errors.js';
import { UsersModule } from '../UsersModule.js';
import { InMemoryUserRepository } from '../../../tests/vitest/mocks/user-repository.js';
import { InMemoryFileStorage } from '../../../tests/vitest/mocks/file-storage.js';
import { StubDatabaseService } from '../../../tests/vitest/mocks/database-service.js';
import { MockLogger } from '../../../tests/vitest/mocks/logger.js';

const authenticate: RequestHandler = (req, _res, next) => {
    const userId = req.headers['x-user-id'];
    if (typeof userId !== 'string') {
        next(new UnauthorizedError());
        return;
    }
    req.auth = { userId, email: 'ada@example.com', role: 'user' };
    next();
};

describe('UsersModule', () => {
    let database: StubDatabaseService;
    let storage: InMemoryFileStorage;
    let usersModule: UsersModule;
    let manager: ModuleManager;
    let app: Express;
    let userId: string;

    beforeEach(async () => {
        database = new StubDatabaseService();
        storage = new InMemoryFileStorage('http://localhost:8000/static/uploads/profiles');
        usersModule = new UsersModule(
            {
                profileUploadPath: '/unused',
                profileUrlPrefix: 'http://localhost:8000/static/uploads/profiles',
                maxProfileImageSize: 1024,
                allowedImageTypes: ['image/png', 'image/jpeg']
            },
            { repository: new InMemoryUserRepository(), storage }
        );

        manager = new ModuleManager({ database, logger: new MockLogger() });
        manager.register(usersModule);
        await manager.start();

        const user = await usersModule.getUserService().createUser({ email: 'ada@example.com', fullName: 'Ada' });
        userId = user.id;

        app = express();
        app.use(express.json());
        app.use('/api/v1', manager.createRouter({ authenticate }));
        app.use(errorHandler);
    });

    afterEach(async () => {
        await manager.stop();
    });

    it('should create the email and Google id indexes and prepare storage', () => {
        expect(database.indexes).toEqual([
            { collection: 'users', keys: { email: 1 }, options: { unique: true } },
            { collection: 'users', keys: { googleId: 1 }, options: { unique: true, sparse: true } }
        ]);
        expect(storage.prepared).toBe(true);
    });

    it('should reject requests without authentication', async () => {
        const response = await request(app).get('/api/v1/users/me');

        expect(response.status).toBe(401);
        expect(response.body).toMatchObject({ success: false, code: 'UNAUTHORIZED' });
    });

    it('should return the current profile', async () => {
        const response = await request(app).get('/api/v1/users/me').set('x-user-id', userId);

        expect(response.status).toBe(200);
        expect(response.body).toMatchObject({ id: userId, email: 'ada@example.com', fullName: 'Ada' });
    });

    it('should update the display name', async () => {
        const response = await request(app)
            .put('/api/v1/users/me')
            .set('x-user-id', userId)
            .send({ fullName: 'Ada Lovelace' });

        expect(response.status).toBe(200);
        expect(response.body.fullName).toBe('Ada Lovelace');
    });

    it('should reject an empty profile update', async () => {
        const response = await request(app).put('/api/v1/users/me').set('x-user-id', userId).send({});

        expect(response.status).toBe(400);
        expect(response.body.code).toBe('VALIDATION_ERROR');
    });

    it('should merge and list preferences', async () => {
        await request(app).put('/api/v1/users/me/preferences').set('x-user-id', userId).send({ theme: 'dark' });

        const response = await request(app).get('/api/v1/users/me/preferences').set('x-user-id', userId);

        expect(response.status).toBe(200);
        expect(response.body).toEqual([{ key: 'theme', value: 'dark' }]);
    });

    it('should upload a profile picture', async () => {
        const response = await request(app)
            .put('/api/v1/users/me/profile-picture')
            .set('x-user-id', userId)
            .attach('file', Buffer.from('png-bytes'), { filename: 'me.png', contentType: 'image/png' });

        expect(response.status).toBe(200);
        const [filename] = [...storage.files.keys()];
        expect(response.body.profilePicture).toBe(`http://localhost:8000/static/uploads/profiles/${filename}`);
    });

    it('should answer 400 when the upload has no file', async () => {
        const response = await request(app).put('/api/v1/users/me/profile-picture').set('x-user-id', userId);

        expect(response.status).toBe(400);
        expect(response.body.error).toBe('No file uploaded');
    });

    it('should answer 413 when the upload exceeds the multipart limit', async () => {
        const response = await request(app)
            .put('/api/v1/users/me/profile-picture')
            .set('x-user-id', userId)
            .attach('file', Buffer.alloc(2048), { filename: 'big.png', contentType: 'image/png' });

        expect(response.status).toBe(413);
        expect(response.body.code).toBe('PAYLOAD_TOO_LARGE');
    });

    it('should report health from the database and upload directory', async () => {
        storage.writable = false;

        const health = await usersModule.health();

        expect(health.healthy).toBe(false);
        expect(health.detail).toEqual({ database: 'ok', uploadDirWritable: false });
    });

    it('should refuse to hand out the service after stop', async () => {
        await manager.stop();

        expect(() => usersModule.getUserService()).toThrow('Users module is not initialized');
    });
});
