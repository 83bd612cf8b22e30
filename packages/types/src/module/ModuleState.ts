/**
 * Lifecycle state of one registered module.
 *
 * - `registered`: known to the manager, not yet touched
 * - `initializing`: `initialize()` in flight
 * - `ready`: initialized, routes mounted, polled for health
 * - `failed`: `initialize()` rejected; never initialized again, skipped at cleanup
 * - `cleaning_up`: `cleanup()` in flight
 * - `stopped`: cleanup attempted during shutdown or rollback
 */
export type ModuleState =
    | 'registered'
    | 'initializing'
    | 'ready'
    | 'failed'
    | 'cleaning_up'
    | 'stopped';

/**
 * Lifecycle state of the module manager itself.
 *
 * `idle → starting → running | start_failed`, then `running → stopping → stopped`.
 * `stop()` from `idle` or `start_failed` moves straight to `stopped`.
 */
export type ModuleManagerState =
    | 'idle'
    | 'starting'
    | 'running'
    | 'start_failed'
    | 'stopping'
    | 'stopped';
