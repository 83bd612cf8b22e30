/// <reference types="vitest" />

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { Express } from 'express';
import request from 'supertest';
import { createExpressApp } from '../express.js';
import { createRequireAuth } from '../../api/middleware/require-auth.js';
import { ModuleManager } from '../../services/module-manager/index.js';
import { TokenService } from '../../services/token.service.js';
import { StubDatabaseService } from '../../tests/vitest/mocks/database-service.js';
import { MockLogger } from '../../tests/vitest/mocks/logger.js';
import { TestModule } from '../../tests/vitest/helpers/test-module.js';

describe('createExpressApp', () => {
    const tokens = new TokenService({ secret: 'test-secret', expiresInMinutes: 30 });
    let manager: ModuleManager;
    let app: Express;

    beforeEach(async () => {
        manager = new ModuleManager({ database: new StubDatabaseService(), logger: new MockLogger() });
        manager.register(
            new TestModule('notes', [], {
                routes: [
                    {
                        method: 'GET',
                        path: '/',
                        requiresAuth: true,
                        handler: (req, res) => {
                            res.json({ owner: req.auth?.userId });
                        }
                    }
                ]
            })
        );
        await manager.start();
        app = createExpressApp({
            manager,
            authenticate: createRequireAuth(tokens, async userId => (userId === 'user-1' ? { isActive: true } : null))
        });
    });

    afterEach(async () => {
        await manager.stop();
    });

    it('should answer the welcome and liveness endpoints', async () => {
        const root = await request(app).get('/');
        const health = await request(app).get('/health');

        expect(root.body).toEqual({ status: 'success', message: 'Welcome to the Everly API', apiPrefix: '/api/v1' });
        expect(health.body).toMatchObject({ status: 'ok', environment: 'test' });
    });

    it('should echo or assign a request id', async () => {
        const echoed = await request(app).get('/health').set('x-request-id', 'req-42');
        const assigned = await request(app).get('/health');

        expect(echoed.headers['x-request-id']).toBe('req-42');
        expect(assigned.headers['x-request-id']).toMatch(/^[0-9a-f-]{36}$/);
    });

    it('should mount module routes under the API prefix behind the token guard', async () => {
        const token = tokens.sign({ userId: 'user-1', email: 'ada@example.com', role: 'user' });

        const denied = await request(app).get('/api/v1/notes');
        const allowed = await request(app).get('/api/v1/notes').set('Authorization', `Bearer ${token}`);

        expect(denied.status).toBe(401);
        expect(allowed.body).toEqual({ owner: 'user-1' });
    });

    it('should mount the system endpoints', async () => {
        const response = await request(app).get('/api/v1/system/routes');

        expect(response.body.routes).toEqual([
            { module: 'notes', method: 'GET', path: '/notes', requiresAuth: true }
        ]);
    });

    it('should answer unknown routes with 404', async () => {
        const response = await request(app).get('/api/v1/missing');

        expect(response.status).toBe(404);
    });
});
