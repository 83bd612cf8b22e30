/**
 * Any value that survives a JSON round trip unchanged.
 */
export type JsonValue =
    | string
    | number
    | boolean
    | null
    | JsonValue[]
    | { [key: string]: JsonValue };

/**
 * Point-in-time health report of a single module.
 *
 * Produced fresh for every health query. The module manager stores the most
 * recent snapshot next to the module's registry entry for introspection, but
 * never answers a health query from it.
 */
export interface IHealthSnapshot {
    /** Name of the module the snapshot describes. */
    moduleName: string;

    /** Whether the module considers itself able to serve requests. */
    healthy: boolean;

    /**
     * Module-specific diagnostics, e.g. `{ database: 'ok', uploadDir: '/srv/media' }`.
     *
     * When the manager reports a failed or timed-out check it puts the reason
     * under `error`.
     */
    detail: Record<string, JsonValue>;

    /** When the check completed. */
    checkedAt: Date;
}
