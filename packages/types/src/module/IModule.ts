import type { IApiRouteConfig } from '../http/IApiRouteConfig.js';
import type { ISharedInfrastructure } from '../infrastructure/ISharedInfrastructure.js';
import type { IHealthSnapshot } from './IHealthSnapshot.js';
import type { IModuleDescriptor } from './IModuleDescriptor.js';

/**
 * Capability interface implemented by every feature module.
 *
 * A module is an independently developed feature unit (authentication, user
 * profiles, diaries, media upload) with a declared identity, declared
 * dependencies and a lifecycle driven entirely by the module manager. Modules
 * never mount themselves and never start themselves: the manager decides when
 * each step happens.
 *
 * ## Lifecycle
 *
 * ```
 * registered ─► initializing ─► ready ─► cleaning_up ─► stopped
 *                     │
 *                     └──────► failed
 * ```
 *
 * 1. `identity()` is read once at registration.
 * 2. `initialize()` runs once per startup attempt, after every declared
 *    dependency has reached `ready`.
 * 3. `routes()` is read after the module is ready and mounted under
 *    `/<name>`.
 * 4. `health()` is polled while the application is running.
 * 5. `cleanup()` runs at shutdown, or during rollback when a module later in
 *    the initialization order fails.
 *
 * ## Shared infrastructure
 *
 * The database, cache and logger handed to `initialize()` belong to the
 * process. Modules borrow them and must not close or destroy them in
 * `cleanup()`.
 *
 * ## Example
 *
 * ```typescript
 * class NotesModule implements IModule {
 *     private notes?: NotesService;
 *
 *     identity(): IModuleDescriptor {
 *         return { name: 'notes', version: '1.0.0', description: 'Notes', dependencies: ['users'] };
 *     }
 *
 *     async initialize(infra: ISharedInfrastructure): Promise<void> {
 *         this.notes = new NotesService(infra.database, infra.logger.child({ module: 'notes' }));
 *         await this.notes.createIndexes();
 *     }
 *
 *     routes(): readonly IApiRouteConfig[] {
 *         return [{ method: 'GET', path: '/', requiresAuth: true, handler: (req, res) => { ... } }];
 *     }
 *
 *     async cleanup(): Promise<void> {
 *         this.notes = undefined;
 *     }
 *
 *     async health(): Promise<IHealthSnapshot> {
 *         return { moduleName: 'notes', healthy: this.notes !== undefined, detail: {}, checkedAt: new Date() };
 *     }
 * }
 * ```
 */
export interface IModule {
    /**
     * Describe the module.
     *
     * Must be pure and return the same values on every call.
     */
    identity(): IModuleDescriptor;

    /**
     * Routes exposed by the module, relative to its `/<name>` namespace.
     *
     * Called only after `initialize()` succeeded, possibly more than once, so
     * it must not have side effects.
     */
    routes(): readonly IApiRouteConfig[];

    /**
     * Prepare the module against the shared infrastructure.
     *
     * May perform I/O such as creating indexes or checking a connection.
     * Rejecting marks the module `failed` and rolls back every module that
     * was already initialized.
     *
     * @param infrastructure - Process-owned handles lent to the module
     */
    initialize(infrastructure: ISharedInfrastructure): Promise<void>;

    /**
     * Release whatever the module acquired in `initialize()`.
     *
     * Must tolerate an `initialize()` that failed halfway, and must resolve
     * when there is nothing to release. Rejections are collected by the
     * manager and never stop other modules from being cleaned up.
     */
    cleanup(): Promise<void>;

    /**
     * Report the module's current health.
     *
     * The manager bounds every call with a timeout and aborts `signal` when
     * the bound elapses; modules that reach out to infrastructure should pass
     * the signal on or apply their own shorter timeout.
     *
     * @param signal - Aborted when the manager stops waiting for this check
     */
    health(signal: AbortSignal): Promise<IHealthSnapshot>;
}
