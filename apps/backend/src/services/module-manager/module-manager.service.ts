import type { Router } from 'express';
import { z } from 'zod';
import type {
    IModule,
    IModuleDescriptor,
    ISharedInfrastructure,
    ILogger,
    ModuleManagerState,
    ModuleState
} from '@everly/types';
import { resolveInitializationOrder } from './dependency-resolver.js';
import {
    CleanupError,
    describeError,
    InitializationError,
    LifecycleStateError,
    RegistrationError,
    ResolutionError
} from './errors.js';
import { checkModuleHealth } from './health-check.js';
import { buildModuleRouter, buildRouteTable, type IMountableModule } from './route-aggregator.js';
import type {
    IAggregateHealth,
    ICreateRouterOptions,
    IModuleManagerOptions,
    IModuleRegistryEntry,
    IModuleSummary,
    IRouteTableEntry,
    IStopReport
} from './types.js';

const DEFAULT_HEALTH_CHECK_TIMEOUT_MS = 5000;
const DEFAULT_RESERVED_NAMES: readonly string[] = ['system'];

const descriptorSchema = z.object({
    name: z
        .string()
        .min(1, 'Module name must not be empty')
        .regex(/^[A-Za-z0-9][A-Za-z0-9_-]*$/, 'Module name must be usable as a URL path segment'),
    version: z.string(),
    description: z.string(),
    dependencies: z.array(z.string().min(1))
});

/**
 * Owner of every feature module's lifecycle.
 *
 * The entry point builds one manager, registers the modules and calls
 * `start()`. From then on the manager is the only code that initializes,
 * mounts, polls and cleans up modules.
 *
 * ## Startup
 *
 * Modules are initialized one at a time, in the order computed by
 * {@link resolveInitializationOrder}. The first failure stops startup: the
 * modules that were already ready are cleaned up in reverse order and
 * `start()` rejects with an {@link InitializationError} carrying the original
 * error. No module is retried.
 *
 * ## Shutdown
 *
 * `stop()` cleans up ready modules in reverse initialization order and never
 * throws. Cleanup failures are collected into the returned report.
 *
 * ## Dependencies
 *
 * Declared dependencies only decide ordering. A module that needs to call
 * another receives it explicitly from the entry point.
 *
 * @example
 * ```typescript
 * const manager = new ModuleManager(infrastructure, { healthCheckTimeoutMs: 5000 });
 * manager.register(usersModule);
 * manager.register(new AuthModule(usersModule, tokens, authConfig));
 *
 * await manager.start();
 * app.use('/api/v1', manager.createRouter({ authenticate: requireAuth }));
 *
 * process.once('SIGTERM', () => void manager.stop());
 * ```
 */
export class ModuleManager {
    private readonly registry = new Map<string, IModuleRegistryEntry>();
    private readonly logger: ILogger;
    private readonly healthCheckTimeoutMs: number;
    private readonly reservedNames: ReadonlySet<string>;
    private state: ModuleManagerState = 'idle';
    private initializationOrder: readonly string[] = [];
    private startPromise?: Promise<void>;
    private stopPromise?: Promise<IStopReport>;

    /**
     * @param infrastructure - Process-owned handles lent to every module
     * @param options - Health check timeout
     */
    constructor(
        private readonly infrastructure: ISharedInfrastructure,
        options: IModuleManagerOptions = {}
    ) {
        this.logger = infrastructure.logger.child({ component: 'module-manager' });
        this.healthCheckTimeoutMs = options.healthCheckTimeoutMs ?? DEFAULT_HEALTH_CHECK_TIMEOUT_MS;
        this.reservedNames = new Set(options.reservedNames ?? DEFAULT_RESERVED_NAMES);
    }

    /**
     * Add a module to the registry.
     *
     * Reads `identity()` once and stores a frozen copy. Only allowed before
     * `start()`.
     *
     * @throws {RegistrationError} On an invalid descriptor, an empty, reserved or duplicate name, a self-dependency, or a manager that is not idle
     */
    register(module: IModule): void {
        const descriptor = this.readDescriptor(module);
        const name = descriptor.name;

        if (this.state !== 'idle') {
            throw new RegistrationError(
                `Cannot register module "${name}" while the module manager is ${this.state}`,
                name,
                { state: this.state }
            );
        }
        if (this.reservedNames.has(name)) {
            throw new RegistrationError(`Module name "${name}" is reserved`, name);
        }
        if (this.registry.has(name)) {
            throw new RegistrationError(`Module "${name}" is already registered`, name);
        }
        if (descriptor.dependencies.includes(name)) {
            throw new RegistrationError(`Module "${name}" cannot depend on itself`, name);
        }

        this.registry.set(name, { descriptor, module, state: 'registered' });
        this.logger.debug({ module: name, dependencies: descriptor.dependencies }, 'Registered module');
    }

    /**
     * Resolve dependencies and initialize every module.
     *
     * @throws {LifecycleStateError} When called twice, or after `stop()`
     * @throws {ResolutionError} When the dependency graph has no order; no module is touched
     * @throws {InitializationError} When a module fails; already-ready modules are rolled back first
     */
    async start(): Promise<void> {
        if (this.state !== 'idle') {
            throw new LifecycleStateError('start', this.state);
        }

        this.state = 'starting';
        this.startPromise = this.runStart();
        try {
            await this.startPromise;
        } finally {
            this.startPromise = undefined;
        }
    }

    /**
     * Clean up every ready module in reverse initialization order.
     *
     * Never rejects. A second call returns an empty report; a call during an
     * in-flight stop returns that stop's report; a call during an in-flight
     * start waits for the start to settle.
     */
    stop(): Promise<IStopReport> {
        if (this.stopPromise) {
            return this.stopPromise;
        }
        this.stopPromise = this.runStop().finally(() => {
            this.stopPromise = undefined;
        });
        return this.stopPromise;
    }

    /**
     * Check every ready module concurrently.
     *
     * Each check is bounded by the configured timeout. The overall status is
     * `healthy` only when every module reports healthy.
     */
    async aggregateHealth(): Promise<IAggregateHealth> {
        if (this.state !== 'running') {
            return {
                status: 'unavailable',
                managerState: this.state,
                modules: [],
                failing: [],
                checkedAt: new Date()
            };
        }

        const entries = this.getReadyEntries();
        const modules = await Promise.all(
            entries.map(async entry => {
                const snapshot = await checkModuleHealth(
                    entry.module,
                    entry.descriptor.name,
                    this.healthCheckTimeoutMs,
                    this.logger
                );
                entry.lastHealth = snapshot;
                return snapshot;
            })
        );

        const failing = modules.filter(snapshot => !snapshot.healthy).map(snapshot => snapshot.moduleName);

        return {
            status: failing.length === 0 ? 'healthy' : 'degraded',
            managerState: this.state,
            modules,
            failing,
            checkedAt: new Date()
        };
    }

    /**
     * Build the Express router that serves every ready module's routes.
     *
     * Mount the result under the API prefix. Modules are mounted in
     * initialization order, each under `/<name>`.
     *
     * @throws {LifecycleStateError} Unless the manager is running
     */
    createRouter(options: ICreateRouterOptions): Router {
        if (this.state !== 'running') {
            throw new LifecycleStateError('create the module router', this.state);
        }
        return buildModuleRouter(this.getMountableModules(), options, this.logger);
    }

    /**
     * Routes served by {@link createRouter}, for the system endpoints.
     */
    getRouteTable(): IRouteTableEntry[] {
        if (this.state !== 'running') {
            return [];
        }
        return buildRouteTable(this.getMountableModules());
    }

    getState(): ModuleManagerState {
        return this.state;
    }

    /**
     * @returns The module's state, or undefined when no such module is registered
     */
    getModuleState(name: string): ModuleState | undefined {
        return this.registry.get(name)?.state;
    }

    /**
     * Order computed by the last `start()`; empty before it.
     */
    getInitializationOrder(): readonly string[] {
        return this.initializationOrder;
    }

    /**
     * Registered modules in registration order.
     */
    listModules(): IModuleSummary[] {
        return [...this.registry.values()].map(entry => ({
            name: entry.descriptor.name,
            version: entry.descriptor.version,
            description: entry.descriptor.description,
            dependencies: entry.descriptor.dependencies,
            state: entry.state,
            lastHealth: entry.lastHealth,
            lastError: entry.lastError === undefined ? undefined : describeError(entry.lastError)
        }));
    }

    private readDescriptor(module: IModule): Readonly<IModuleDescriptor> {
        let identity: unknown;
        try {
            identity = module.identity();
        } catch (error) {
            throw new RegistrationError(`Module identity could not be read: ${describeError(error)}`, '', {
                cause: describeError(error)
            });
        }

        const parsed = descriptorSchema.safeParse(identity);
        if (!parsed.success) {
            const first = parsed.error.issues[0];
            throw new RegistrationError(
                `Invalid module descriptor: ${first ? first.message : 'unknown error'}`,
                readName(identity),
                parsed.error.flatten()
            );
        }

        return Object.freeze({
            name: parsed.data.name,
            version: parsed.data.version,
            description: parsed.data.description,
            dependencies: Object.freeze([...parsed.data.dependencies])
        });
    }

    private async runStart(): Promise<void> {
        try {
            this.initializationOrder = resolveInitializationOrder(
                [...this.registry.values()].map(entry => entry.descriptor)
            );
        } catch (error) {
            this.state = 'start_failed';
            if (error instanceof ResolutionError) {
                this.logger.error({ code: error.code, details: error.details }, error.message);
            }
            throw error;
        }

        this.logger.info({ order: this.initializationOrder }, 'Initializing modules');

        for (const name of this.initializationOrder) {
            const entry = this.getEntry(name);
            entry.state = 'initializing';

            try {
                await entry.module.initialize(this.infrastructure);
            } catch (error) {
                entry.state = 'failed';
                entry.lastError = error;
                this.logger.error({ module: name, error }, 'Module initialization failed, rolling back');

                const rollback = await this.cleanupReadyModules();
                this.state = 'start_failed';

                throw new InitializationError(name, {
                    cause: error,
                    rolledBack: rollback.stopped,
                    rollbackErrors: rollback.errors
                });
            }

            entry.state = 'ready';
            this.logger.info({ module: name, version: entry.descriptor.version }, 'Module ready');
        }

        this.state = 'running';
        this.logger.info({ modules: this.initializationOrder.length }, 'All modules initialized');
    }

    private async runStop(): Promise<IStopReport> {
        if (this.startPromise) {
            await this.startPromise.catch(error => {
                this.logger.debug({ error: describeError(error) }, 'Stop waited for a failed start');
            });
        }

        if (this.state !== 'running') {
            this.state = 'stopped';
            return { stopped: [], errors: [] };
        }

        this.state = 'stopping';
        this.logger.info('Stopping modules');
        const report = await this.cleanupReadyModules();
        this.state = 'stopped';
        this.logger.info({ stopped: report.stopped, failures: report.errors.length }, 'Modules stopped');
        return report;
    }

    /**
     * Clean up every ready module in reverse initialization order.
     *
     * A failed cleanup still leaves the module `stopped`, with the error in
     * `lastError` and in the report.
     */
    private async cleanupReadyModules(): Promise<IStopReport> {
        const report: IStopReport = { stopped: [], errors: [] };

        for (const name of [...this.initializationOrder].reverse()) {
            const entry = this.getEntry(name);
            if (entry.state !== 'ready') {
                continue;
            }

            entry.state = 'cleaning_up';
            try {
                await entry.module.cleanup();
            } catch (error) {
                const cleanupError = new CleanupError(name, { cause: error });
                entry.lastError = error;
                report.errors.push(cleanupError);
                this.logger.error({ module: name, error }, cleanupError.message);
            }
            entry.state = 'stopped';
            report.stopped.push(name);
        }

        return report;
    }

    private getReadyEntries(): IModuleRegistryEntry[] {
        return this.initializationOrder
            .map(name => this.getEntry(name))
            .filter(entry => entry.state === 'ready');
    }

    private getMountableModules(): IMountableModule[] {
        return this.getReadyEntries().map(entry => ({
            name: entry.descriptor.name,
            routes: entry.module.routes()
        }));
    }

    private getEntry(name: string): IModuleRegistryEntry {
        const entry = this.registry.get(name);
        if (!entry) {
            throw new Error(`Module "${name}" is not registered`);
        }
        return entry;
    }
}

function readName(identity: unknown): string {
    if (typeof identity === 'object' && identity !== null && 'name' in identity && typeof identity.name === 'string') {
        return identity.name;
    }
    return '';
}
