/**
 * Users module implementation.
 *
 * Owns user profiles: display name, profile picture and free-form
 * preferences. Accounts are created by the auth module at first login, which
 * receives this module's {@link UserService} from the entry point.
 *
 * ## Design Decisions
 *
 * **Explicit wiring**: Other modules never look this module up. The entry
 * point passes the instance to the auth module's constructor, and the auth
 * module calls {@link UsersModule.getUserService} after the module manager has
 * initialized users first.
 *
 * **Replaceable persistence**: The repository and file storage can be
 * supplied by the caller. The entry point leaves both out and gets MongoDB and
 * local disk; tests pass in-memory versions.
 */

import type {
    IApiRouteConfig,
    IDatabaseService,
    IHealthSnapshot,
    ILogger,
    IModule,
    IModuleDescriptor,
    ISharedInfrastructure
} from '@everly/types';
import type { IFileStorage } from '../../services/storage/file-storage.js';
import { LocalFileStorage } from '../../services/storage/local-file-storage.js';
import { MongoUserRepository, USERS_COLLECTION, type IUserRepository } from './database/index.js';
import { UserService } from './services/index.js';
import { UserController } from './api/user.controller.js';
import { createUserRoutes } from './api/user.routes.js';

/**
 * Configuration of the users module, mapped from the environment by the entry point.
 */
export interface IUsersModuleConfig {
    /** Directory profile pictures are written to. */
    profileUploadPath: string;
    /** Public URL of that directory. */
    profileUrlPrefix: string;
    /** Largest accepted profile picture in bytes. */
    maxProfileImageSize: number;
    /** Accepted profile picture MIME types. */
    allowedImageTypes: readonly string[];
}

/**
 * Collaborators a caller may supply instead of the defaults.
 */
export interface IUsersModuleOverrides {
    repository?: IUserRepository;
    storage?: IFileStorage;
}

/**
 * Users module for profiles and preferences.
 *
 * ## Lifecycle
 *
 * ### initialize():
 * - Creates the unique indexes on email and Google id
 * - Prepares the profile picture directory
 * - Creates UserService and UserController
 *
 * ### cleanup():
 * - Drops service references; the shared database handle stays open
 */
export class UsersModule implements IModule {
    private database?: IDatabaseService;
    private storage?: IFileStorage;
    private userService?: UserService;
    private controller?: UserController;
    private logger?: ILogger;

    constructor(
        private readonly config: IUsersModuleConfig,
        private readonly overrides: IUsersModuleOverrides = {}
    ) {}

    identity(): IModuleDescriptor {
        return {
            name: 'users',
            version: '1.0.0',
            description: 'User profiles, profile pictures and preferences',
            dependencies: []
        };
    }

    async initialize(infrastructure: ISharedInfrastructure): Promise<void> {
        this.logger = infrastructure.logger.child({ module: 'users' });
        this.logger.info('Initializing users module...');

        this.database = infrastructure.database;
        await this.database.createIndex(USERS_COLLECTION, { email: 1 }, { unique: true });
        await this.database.createIndex(USERS_COLLECTION, { googleId: 1 }, { unique: true, sparse: true });

        this.storage =
            this.overrides.storage ?? new LocalFileStorage(this.config.profileUploadPath, this.config.profileUrlPrefix);
        await this.storage.prepare();

        this.userService = new UserService(
            this.overrides.repository ?? new MongoUserRepository(this.database),
            this.storage,
            { maxSizeBytes: this.config.maxProfileImageSize, allowedTypes: this.config.allowedImageTypes },
            this.logger
        );
        this.controller = new UserController(this.userService);

        this.logger.info('Users module initialized');
    }

    routes(): readonly IApiRouteConfig[] {
        if (!this.controller) {
            return [];
        }
        return createUserRoutes(this.controller, this.config.maxProfileImageSize);
    }

    async cleanup(): Promise<void> {
        this.controller = undefined;
        this.userService = undefined;
        this.storage = undefined;
        this.database = undefined;
        this.logger?.info('Users module cleaned up');
    }

    async health(): Promise<IHealthSnapshot> {
        const database = this.database ? await this.database.ping() : false;
        const uploadDirWritable = this.storage ? await this.storage.isWritable() : false;

        return {
            moduleName: 'users',
            healthy: database && uploadDirWritable,
            detail: { database: database ? 'ok' : 'unreachable', uploadDirWritable },
            checkedAt: new Date()
        };
    }

    /**
     * Service for other modules, available once the module is initialized.
     *
     * @throws Error If called before `initialize()` or after `cleanup()`
     */
    getUserService(): UserService {
        if (!this.userService) {
            throw new Error('Users module is not initialized');
        }
        return this.userService;
    }
}
