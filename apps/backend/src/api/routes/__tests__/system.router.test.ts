/// <reference types="vitest" />

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import express, { type Express } from 'express';
import request from 'supertest';
import { systemRouter } from '../system.router.js';
import { ModuleManager } from '../../../services/module-manager/index.js';
import { errorHandler } from '../../middleware/error-handler.js';
import { StubDatabaseService } from '../../../tests/vitest/mocks/database-service.js';
import { MockLogger } from '../../../tests/vitest/mocks/logger.js';
import { TestModule } from '../../../tests/vitest/helpers/test-module.js';

describe('systemRouter', () => {
    let healthy: boolean;
    let manager: ModuleManager;
    let app: Express;

    beforeEach(async () => {
        healthy = true;
        manager = new ModuleManager({ database: new StubDatabaseService(), logger: new MockLogger() });
        manager.register(new TestModule('alpha'));
        manager.register(
            new TestModule('beta', [], {
                dependencies: ['alpha'],
                routes: [
                    {
                        method: 'GET',
                        path: '/items',
                        requiresAuth: true,
                        description: 'List items',
                        handler: (_req, res) => {
                            res.json([]);
                        }
                    }
                ],
                health: async () => ({ moduleName: 'beta', healthy, detail: {}, checkedAt: new Date() })
            })
        );

        app = express();
        app.use('/api/v1/system', systemRouter(manager));
        app.use(errorHandler);
    });

    afterEach(async () => {
        await manager.stop();
    });

    it('should answer 503 before the manager is running', async () => {
        const response = await request(app).get('/api/v1/system/health');

        expect(response.status).toBe(503);
        expect(response.body).toMatchObject({ status: 'unavailable', managerState: 'idle', modules: [] });
    });

    it('should answer 200 when every module is healthy', async () => {
        await manager.start();

        const response = await request(app).get('/api/v1/system/health');

        expect(response.status).toBe(200);
        expect(response.body).toMatchObject({ status: 'healthy', managerState: 'running', failing: [] });
        expect(response.body.modules.map((module: { moduleName: string }) => module.moduleName)).toEqual([
            'alpha',
            'beta'
        ]);
    });

    it('should answer 503 naming the failing module', async () => {
        await manager.start();
        healthy = false;

        const response = await request(app).get('/api/v1/system/health');

        expect(response.status).toBe(503);
        expect(response.body).toMatchObject({ status: 'degraded', failing: ['beta'] });
    });

    it('should list modules with their state', async () => {
        await manager.start();

        const response = await request(app).get('/api/v1/system/modules');

        expect(response.body.state).toBe('running');
        expect(response.body.modules).toEqual([
            expect.objectContaining({ name: 'alpha', state: 'ready', dependencies: [] }),
            expect.objectContaining({ name: 'beta', state: 'ready', dependencies: ['alpha'] })
        ]);
    });

    it('should expose the route table', async () => {
        await manager.start();

        const response = await request(app).get('/api/v1/system/routes');

        expect(response.body.routes).toEqual([
            { module: 'beta', method: 'GET', path: '/beta/items', requiresAuth: true, description: 'List items' }
        ]);
    });
});
