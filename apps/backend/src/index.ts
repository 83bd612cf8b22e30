/**
 * @fileoverview Application entry point.
 *
 * Startup runs in a fixed order: infrastructure (MongoDB, optional Redis),
 * module registration, module initialization in dependency order, then the
 * HTTP server. Shutdown reverses it: the server stops accepting requests,
 * modules clean up in reverse order, then connections close.
 *
 * @module index
 */

import http from 'node:http';
import type { Redis } from 'ioredis';
import type { ISharedInfrastructure } from '@everly/types';
import { env } from './config/env.js';
import { logger } from './lib/logger.js';
import { connectDatabase, disconnectDatabase } from './loaders/database.js';
import { createRedisClient, disconnectRedis } from './loaders/redis.js';
import { createExpressApp } from './loaders/express.js';
import { createModules } from './loaders/modules.js';
import { createRequireAuth } from './api/middleware/require-auth.js';
import { DatabaseService } from './services/database/index.js';
import { CacheService } from './services/cache.service.js';
import { TokenService } from './services/token.service.js';
import { ModuleManager } from './services/module-manager/index.js';

/**
 * Start the service.
 *
 * @throws Logs the error and exits with code 1 if any startup step fails
 */
async function bootstrap(): Promise<void> {
    try {
        await connectDatabase();

        let redis: Redis | undefined;
        let cache: CacheService | undefined;
        if (env.REDIS_URL) {
            redis = createRedisClient(env.REDIS_URL, env.REDIS_NAMESPACE);
            await redis.connect();
            cache = new CacheService(redis, logger);
        } else {
            logger.warn('REDIS_URL is not set, running without a cache');
        }

        const infrastructure: ISharedInfrastructure = {
            database: new DatabaseService(logger),
            cache,
            logger
        };

        const tokens = new TokenService({ secret: env.JWT_SECRET, expiresInMinutes: env.JWT_EXPIRES_IN_MINUTES });
        const manager = new ModuleManager(infrastructure, { healthCheckTimeoutMs: env.MODULE_HEALTH_TIMEOUT_MS });
        const { modules, users } = createModules(tokens);
        for (const module of modules) {
            manager.register(module);
        }
        await manager.start();

        const authenticate = createRequireAuth(tokens, userId => users.getUserService().findById(userId));
        const app = createExpressApp({ manager, authenticate });
        const server = http.createServer(app);
        server.listen(env.PORT, () => {
            logger.info({ port: env.PORT, modules: manager.getInitializationOrder() }, 'Server listening');
        });

        let shuttingDown = false;
        const shutdown = async (signal: NodeJS.Signals): Promise<void> => {
            if (shuttingDown) {
                return;
            }
            shuttingDown = true;
            logger.info({ signal }, 'Shutting down');

            try {
                await new Promise<void>(resolve => server.close(() => resolve()));
                const report = await manager.stop();
                for (const error of report.errors) {
                    logger.error({ error }, 'Module cleanup failed');
                }
                if (redis) {
                    await disconnectRedis(redis);
                }
                await disconnectDatabase();
                process.exit(report.errors.length > 0 ? 1 : 0);
            } catch (error) {
                logger.error({ error }, 'Shutdown failed');
                process.exit(1);
            }
        };

        process.once('SIGINT', signal => void shutdown(signal));
        process.once('SIGTERM', signal => void shutdown(signal));
    } catch (error) {
        logger.error({ error }, 'Failed to bootstrap application');
        process.exit(1);
    }
}

void bootstrap();
