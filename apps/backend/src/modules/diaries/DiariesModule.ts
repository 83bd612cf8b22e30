/**
 * Diaries module implementation.
 *
 * Owns diaries and diary entries. Entries can reference media uploaded
 * through the media module by URL; the two modules share nothing else.
 */

import type {
    IApiRouteConfig,
    ICacheService,
    IDatabaseService,
    IHealthSnapshot,
    IModule,
    IModuleDescriptor,
    ISharedInfrastructure
} from '@everly/types';
import {
    DIARIES_COLLECTION,
    ENTRIES_COLLECTION,
    MongoDiaryRepository,
    type IDiaryRepository
} from './database/index.js';
import { DiaryService, type IDiaryServiceConfig } from './services/index.js';
import { DiaryController } from './api/diary.controller.js';
import { createDiaryRoutes } from './api/diary.routes.js';

export type IDiariesModuleConfig = IDiaryServiceConfig;

export interface IDiariesModuleOverrides {
    repository?: IDiaryRepository;
}

/**
 * Diaries module.
 *
 * ## Lifecycle
 *
 * ### initialize():
 * - Creates the owner and date indexes on diaries and entries
 * - Creates DiaryService (cached through the shared cache when one is configured)
 *
 * ### cleanup():
 * - Drops service references
 */
export class DiariesModule implements IModule {
    private database?: IDatabaseService;
    private cache?: ICacheService;
    private controller?: DiaryController;

    constructor(
        private readonly config: IDiariesModuleConfig,
        private readonly overrides: IDiariesModuleOverrides = {}
    ) {}

    identity(): IModuleDescriptor {
        return {
            name: 'diaries',
            version: '1.0.0',
            description: 'Diaries, entries and entry search',
            dependencies: ['auth', 'users']
        };
    }

    async initialize(infrastructure: ISharedInfrastructure): Promise<void> {
        const logger = infrastructure.logger.child({ module: 'diaries' });

        this.database = infrastructure.database;
        this.cache = infrastructure.cache;

        await this.database.createIndex(DIARIES_COLLECTION, { userId: 1, createdAt: -1 });
        await this.database.createIndex(ENTRIES_COLLECTION, { diaryId: 1, createdAt: -1 });
        await this.database.createIndex(ENTRIES_COLLECTION, { userId: 1, createdAt: -1 });
        await this.database.createIndex(ENTRIES_COLLECTION, { tags: 1 });

        const service = new DiaryService(
            this.overrides.repository ?? new MongoDiaryRepository(this.database),
            this.cache,
            this.config,
            logger
        );
        this.controller = new DiaryController(service);

        logger.info({ cached: this.cache !== undefined }, 'Diaries module initialized');
    }

    routes(): readonly IApiRouteConfig[] {
        return this.controller ? createDiaryRoutes(this.controller) : [];
    }

    async cleanup(): Promise<void> {
        this.controller = undefined;
        this.cache = undefined;
        this.database = undefined;
    }

    /**
     * Healthy when the database answers. An unreachable cache is reported but
     * only slows list reads down.
     */
    async health(): Promise<IHealthSnapshot> {
        const database = this.database ? await this.database.ping() : false;
        let cache = 'disabled';
        if (this.cache) {
            cache = (await this.cache.ping()) ? 'ok' : 'unreachable';
        }

        return {
            moduleName: 'diaries',
            healthy: database,
            detail: { database: database ? 'ok' : 'unreachable', cache },
            checkedAt: new Date()
        };
    }
}
