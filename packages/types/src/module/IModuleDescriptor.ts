/**
 * Identity and metadata of a feature module.
 *
 * The descriptor is what the module manager knows about a module before it
 * is initialized. The manager reads it once, at registration, and keeps a
 * frozen copy for the lifetime of the process, so `identity()` must return
 * the same values on every call.
 */
export interface IModuleDescriptor {
    /**
     * Unique, non-empty module name.
     *
     * Doubles as the route namespace: every route the module exposes is
     * mounted under `/<name>`. Two modules with the same name cannot be
     * registered on one manager.
     *
     * @example 'auth', 'users', 'diaries'
     */
    readonly name: string;

    /**
     * Semantic version of the module, reported by the system endpoints.
     *
     * @example '1.0.0'
     */
    readonly version: string;

    /**
     * Human-readable summary of what the module provides.
     */
    readonly description: string;

    /**
     * Names of the modules that must be ready before this one initializes.
     *
     * Treated as a set: duplicates count once and order carries no meaning.
     * A module may not list its own name. Declaring a dependency only orders
     * initialization; it does not hand the module a reference to the other
     * module's instance.
     */
    readonly dependencies: readonly string[];
}
