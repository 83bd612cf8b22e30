import { StatusCodes } from 'http-status-codes';
import { EverlyError } from '../../lib/errors.js';

/**
 * Errors raised by the module manager.
 *
 * Every class carries a stable `code` so startup logs and the error handler
 * can tell failures apart without string matching on messages.
 */

/**
 * A module could not be registered: empty or duplicate name, a dependency on
 * itself, a malformed descriptor, or a manager that already started.
 */
export class RegistrationError extends EverlyError {
    constructor(message: string, public readonly moduleName: string, details?: unknown) {
        super(message, 'MODULE_REGISTRATION_ERROR', details, StatusCodes.INTERNAL_SERVER_ERROR);
        this.name = 'RegistrationError';
    }
}

/**
 * The dependency graph has no valid initialization order.
 */
export abstract class ResolutionError extends EverlyError {
    protected constructor(message: string, code: string, details: unknown) {
        super(message, code, details, StatusCodes.INTERNAL_SERVER_ERROR);
    }
}

/**
 * A module declares a dependency on a name nobody registered.
 */
export class MissingDependencyError extends ResolutionError {
    constructor(public readonly moduleName: string, public readonly dependencyName: string) {
        super(
            `Module "${moduleName}" depends on "${dependencyName}", which is not registered`,
            'MODULE_MISSING_DEPENDENCY',
            { moduleName, dependencyName }
        );
        this.name = 'MissingDependencyError';
    }
}

/**
 * Declared dependencies form at least one cycle.
 *
 * `remaining` lists every module that could not be ordered, in registration
 * order. It contains the cycle and everything that depends on it.
 */
export class DependencyCycleError extends ResolutionError {
    constructor(public readonly remaining: readonly string[]) {
        super(
            `Dependency cycle among modules: ${remaining.join(', ')}`,
            'MODULE_DEPENDENCY_CYCLE',
            { remaining }
        );
        this.name = 'DependencyCycleError';
    }
}

/**
 * A module's `cleanup()` rejected. Collected, never thrown by `stop()`.
 */
export class CleanupError extends EverlyError {
    constructor(public readonly moduleName: string, options: { cause: unknown }) {
        super(
            `Cleanup of module "${moduleName}" failed: ${describeError(options.cause)}`,
            'MODULE_CLEANUP_ERROR',
            { moduleName },
            StatusCodes.INTERNAL_SERVER_ERROR
        );
        this.name = 'CleanupError';
        this.cause = options.cause;
    }
}

/**
 * A module's `initialize()` rejected and startup was rolled back.
 *
 * `cause` is the module's own error. Rollback failures are listed in
 * `rollbackErrors` and never replace it.
 */
export class InitializationError extends EverlyError {
    /** Modules cleaned up during rollback, in the order they were cleaned up. */
    public readonly rolledBack: readonly string[];

    /** Cleanup failures that happened during rollback. */
    public readonly rollbackErrors: readonly CleanupError[];

    constructor(
        public readonly moduleName: string,
        options: {
            cause: unknown;
            rolledBack: readonly string[];
            rollbackErrors: readonly CleanupError[];
        }
    ) {
        super(
            `Initialization of module "${moduleName}" failed: ${describeError(options.cause)}`,
            'MODULE_INITIALIZATION_ERROR',
            {
                moduleName,
                rolledBack: options.rolledBack,
                rollbackErrors: options.rollbackErrors.map(error => error.message)
            },
            StatusCodes.INTERNAL_SERVER_ERROR
        );
        this.name = 'InitializationError';
        this.cause = options.cause;
        this.rolledBack = options.rolledBack;
        this.rollbackErrors = options.rollbackErrors;
    }
}

/**
 * A health check did not settle within the manager's timeout.
 */
export class HealthCheckTimeoutError extends EverlyError {
    constructor(public readonly moduleName: string, public readonly timeoutMs: number) {
        super(
            `Health check of module "${moduleName}" timed out after ${timeoutMs}ms`,
            'MODULE_HEALTH_TIMEOUT',
            { moduleName, timeoutMs },
            StatusCodes.SERVICE_UNAVAILABLE
        );
        this.name = 'HealthCheckTimeoutError';
    }
}

/**
 * An operation was called in a manager state that does not allow it.
 */
export class LifecycleStateError extends EverlyError {
    constructor(public readonly operation: string, public readonly state: string) {
        super(
            `Cannot ${operation} while the module manager is ${state}`,
            'MODULE_LIFECYCLE_STATE',
            { operation, state },
            StatusCodes.CONFLICT
        );
        this.name = 'LifecycleStateError';
    }
}

/**
 * Message of an unknown thrown value.
 */
export function describeError(error: unknown): string {
    if (error instanceof Error) {
        return error.message;
    }
    return String(error);
}
