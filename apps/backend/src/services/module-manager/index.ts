export { ModuleManager } from './module-manager.service.js';
export { resolveInitializationOrder } from './dependency-resolver.js';
export { checkModuleHealth } from './health-check.js';
export { buildModuleRouter, buildRouteTable, joinRoutePath } from './route-aggregator.js';
export {
    RegistrationError,
    ResolutionError,
    MissingDependencyError,
    DependencyCycleError,
    InitializationError,
    CleanupError,
    HealthCheckTimeoutError,
    LifecycleStateError
} from './errors.js';
export type {
    IAggregateHealth,
    ICreateRouterOptions,
    IModuleManagerOptions,
    IModuleRegistryEntry,
    IModuleSummary,
    IRouteTableEntry,
    IStopReport
} from './types.js';
