import type { RequestHandler } from 'express';
import type {
    IHealthSnapshot,
    IModule,
    IModuleDescriptor,
    HttpMethod,
    ModuleManagerState,
    ModuleState
} from '@everly/types';
import type { CleanupError } from './errors.js';

/**
 * Registry record the manager keeps for each module.
 */
export interface IModuleRegistryEntry {
    /** Frozen copy of `identity()` taken at registration. */
    readonly descriptor: Readonly<IModuleDescriptor>;
    readonly module: IModule;
    state: ModuleState;
    /** Most recent health snapshot, kept for introspection only. */
    lastHealth?: IHealthSnapshot;
    /** Last initialization or cleanup failure. */
    lastError?: unknown;
}

/**
 * Read-only view of a registry entry, listed by `/system/modules`.
 */
export interface IModuleSummary {
    name: string;
    version: string;
    description: string;
    dependencies: readonly string[];
    state: ModuleState;
    lastHealth?: IHealthSnapshot;
    lastError?: string;
}

/**
 * Options accepted by the module manager.
 */
export interface IModuleManagerOptions {
    /**
     * Upper bound for each module's health check.
     *
     * Default: 5000
     */
    healthCheckTimeoutMs?: number;

    /**
     * Names no module may take, because the application mounts its own
     * routes at those namespaces.
     *
     * Default: `['system']`
     */
    reservedNames?: readonly string[];
}

/**
 * Result of `aggregateHealth()`.
 *
 * `unavailable` means the manager is not running, in which case `modules` is
 * empty.
 */
export interface IAggregateHealth {
    status: 'healthy' | 'degraded' | 'unavailable';
    managerState: ModuleManagerState;
    modules: IHealthSnapshot[];
    /** Names of modules whose snapshot is unhealthy. */
    failing: string[];
    checkedAt: Date;
}

/**
 * Result of `stop()`. Never thrown, always returned.
 */
export interface IStopReport {
    /** Modules cleaned up, in cleanup order. Includes modules whose cleanup failed. */
    stopped: string[];
    errors: CleanupError[];
}

/**
 * Options for `createRouter()`.
 */
export interface ICreateRouterOptions {
    /** Guard run before the middleware of every `requiresAuth` route. */
    authenticate: RequestHandler;
}

/**
 * One row of the route table exposed by `/system/routes`.
 */
export interface IRouteTableEntry {
    module: string;
    method: HttpMethod;
    /** Path relative to the API prefix, e.g. `/diaries/:diaryId`. */
    path: string;
    requiresAuth: boolean;
    description?: string;
}
