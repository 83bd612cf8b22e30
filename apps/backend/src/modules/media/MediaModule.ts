import type { IApiRouteConfig, IHealthSnapshot, IModule, IModuleDescriptor, ISharedInfrastructure } from '@everly/types';
import type { IFileStorage } from '../../services/storage/file-storage.js';
import { LocalFileStorage } from '../../services/storage/local-file-storage.js';
import { MediaService } from './services/media.service.js';
import { MediaController } from './api/media.controller.js';
import { createMediaRoutes } from './api/media.routes.js';

export interface IMediaModuleConfig {
    /** Directory uploads are written to. */
    uploadPath: string;
    /** Public URL of that directory. */
    urlPrefix: string;
    maxFileSize: number;
    allowedTypes: readonly string[];
}

export interface IMediaModuleOverrides {
    storage?: IFileStorage;
}

/**
 * Media module: file uploads for diary entries.
 *
 * Creates the upload directory at initialization. Holds no connections, so
 * cleanup only drops references.
 */
export class MediaModule implements IModule {
    private storage?: IFileStorage;
    private controller?: MediaController;

    constructor(
        private readonly config: IMediaModuleConfig,
        private readonly overrides: IMediaModuleOverrides = {}
    ) {}

    identity(): IModuleDescriptor {
        return {
            name: 'media',
            version: '1.0.0',
            description: 'Image, video and audio uploads',
            dependencies: ['auth']
        };
    }

    async initialize(infrastructure: ISharedInfrastructure): Promise<void> {
        const logger = infrastructure.logger.child({ module: 'media' });

        this.storage = this.overrides.storage ?? new LocalFileStorage(this.config.uploadPath, this.config.urlPrefix);
        await this.storage.prepare();

        const service = new MediaService(
            this.storage,
            { maxSizeBytes: this.config.maxFileSize, allowedTypes: this.config.allowedTypes },
            logger
        );
        this.controller = new MediaController(service);

        logger.info({ uploadPath: this.config.uploadPath }, 'Media module initialized');
    }

    routes(): readonly IApiRouteConfig[] {
        return this.controller ? createMediaRoutes(this.controller, this.config.maxFileSize) : [];
    }

    async cleanup(): Promise<void> {
        this.controller = undefined;
        this.storage = undefined;
    }

    async health(): Promise<IHealthSnapshot> {
        const uploadDirWritable = this.storage ? await this.storage.isWritable() : false;
        return {
            moduleName: 'media',
            healthy: uploadDirWritable,
            detail: { uploadDirWritable, uploadPath: this.config.uploadPath },
            checkedAt: new Date()
        };
    }
}
