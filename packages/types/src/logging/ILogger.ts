/**
 * Structured logging contract shared by the backend and its modules.
 *
 * Mirrors the subset of Pino's API the code base relies on, so modules can log
 * through the handle they receive at initialization without importing a
 * logging library. Pino loggers satisfy it directly; tests substitute a mock.
 */
export interface ILogger {
    /**
     * Emit a fatal-level entry for failures that end the process.
     *
     * @param args - Structured payloads and/or a message string
     */
    fatal(...args: readonly unknown[]): void;

    /**
     * Emit an error-level entry for failures that need attention.
     *
     * @param args - Structured payloads and/or a message string
     */
    error(...args: readonly unknown[]): void;

    /**
     * Emit a warning for degraded but non-fatal behavior.
     *
     * @param args - Structured payloads and/or a message string
     */
    warn(...args: readonly unknown[]): void;

    /**
     * Emit an info-level entry for normal milestones.
     *
     * @param args - Structured payloads and/or a message string
     */
    info(...args: readonly unknown[]): void;

    /**
     * Emit a debug-level entry. Suppressed in production.
     *
     * @param args - Structured payloads and/or a message string
     */
    debug(...args: readonly unknown[]): void;

    /**
     * Emit a trace-level entry.
     *
     * @param args - Structured payloads and/or a message string
     */
    trace(...args: readonly unknown[]): void;

    /**
     * Create a child logger that merges `bindings` into every entry.
     *
     * @param bindings - Static key-value pairs such as `{ module: 'diaries' }`
     */
    child(bindings: Record<string, unknown>): ILogger;
}
