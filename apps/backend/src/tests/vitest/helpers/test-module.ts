import type { IApiRouteConfig, IHealthSnapshot, IModule, IModuleDescriptor, ISharedInfrastructure } from '@everly/types';

/**
 * Behavior overrides for a {@link TestModule}.
 */
export interface ITestModuleOptions {
    dependencies?: string[];
    routes?: IApiRouteConfig[];
    initialize?: (infrastructure: ISharedInfrastructure) => Promise<void>;
    cleanup?: () => Promise<void>;
    health?: (signal: AbortSignal) => Promise<IHealthSnapshot>;
}

/**
 * Configurable IModule for module manager tests.
 *
 * Appends `init:<name>` and `cleanup:<name>` to the shared `journal` so a
 * test can assert the exact sequence of lifecycle calls across modules.
 * Without overrides every hook succeeds and health reports healthy.
 */
export class TestModule implements IModule {
    public initializeCalls = 0;
    public cleanupCalls = 0;

    constructor(
        private readonly name: string,
        private readonly journal: string[] = [],
        private readonly options: ITestModuleOptions = {}
    ) {}

    identity(): IModuleDescriptor {
        return {
            name: this.name,
            version: '1.0.0',
            description: `${this.name} test module`,
            dependencies: this.options.dependencies ?? []
        };
    }

    routes(): readonly IApiRouteConfig[] {
        return this.options.routes ?? [];
    }

    async initialize(infrastructure: ISharedInfrastructure): Promise<void> {
        this.initializeCalls += 1;
        this.journal.push(`init:${this.name}`);
        if (this.options.initialize) {
            await this.options.initialize(infrastructure);
        }
    }

    async cleanup(): Promise<void> {
        this.cleanupCalls += 1;
        this.journal.push(`cleanup:${this.name}`);
        if (this.options.cleanup) {
            await this.options.cleanup();
        }
    }

    async health(signal: AbortSignal): Promise<IHealthSnapshot> {
        if (this.options.health) {
            return this.options.health(signal);
        }
        return { moduleName: this.name, healthy: true, detail: { status: 'ok' }, checkedAt: new Date() };
    }
}
