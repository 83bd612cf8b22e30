/**
 * Shared type contracts for the Everly backend.
 *
 * The module contract every feature module implements, the route shape the
 * route aggregator mounts, and the infrastructure handles lent to modules.
 */

export type {
    IModule,
    IModuleDescriptor,
    IHealthSnapshot,
    JsonValue,
    ModuleState,
    ModuleManagerState
} from './module/index.js';
export type { IApiRouteConfig, HttpMethod, ApiRouteHandler } from './http/index.js';
export type { ISharedInfrastructure } from './infrastructure/ISharedInfrastructure.js';
export type { IDatabaseService, IIndexOptions } from './database/IDatabaseService.js';
export type { ICacheService } from './services/ICacheService.js';
export type { ILogger } from './logging/ILogger.js';
export type { IAuthContext, UserRole } from './auth/IAuthContext.js';
