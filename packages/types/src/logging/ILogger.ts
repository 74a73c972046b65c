/**
 * Structured logging contract shared across backend services.
 *
 * Mirrors the Pino method surface so services can emit structured logs without
 * importing the logging library directly. Implementations wrap Pino in
 * production and lightweight spies in tests.
 */
export interface ILogger {
    /**
     * Emit a fatal-level log entry for failures that stop the process.
     *
     * @param args - Structured payloads or message strings
     */
    fatal(...args: readonly unknown[]): void;

    /**
     * Emit an error-level log entry.
     *
     * @param args - Structured payloads or message strings
     */
    error(...args: readonly unknown[]): void;

    /**
     * Emit a warning-level log entry.
     *
     * @param args - Structured payloads or message strings
     */
    warn(...args: readonly unknown[]): void;

    /**
     * Emit an info-level log entry.
     *
     * @param args - Structured payloads or message strings
     */
    info(...args: readonly unknown[]): void;

    /**
     * Emit a debug-level log entry. Usually suppressed in production.
     *
     * @param args - Structured payloads or message strings
     */
    debug(...args: readonly unknown[]): void;

    /**
     * Emit a trace-level log entry.
     *
     * @param args - Structured payloads or message strings
     */
    trace(...args: readonly unknown[]): void;

    /**
     * Create a scoped child logger whose entries all carry the given bindings.
     *
     * @param bindings - Static key-value pairs merged into each log entry
     * @returns Logger inheriting from this instance
     */
    child(bindings: Record<string, unknown>): ILogger;
}
