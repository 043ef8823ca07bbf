/**
 * Framework-agnostic logger contract.
 *
 * Mirrors the pino method surface so services can take a pino instance, a
 * child logger or a test double interchangeably.
 */
export interface ILogger {
    fatal(...args: readonly unknown[]): void;
    error(...args: readonly unknown[]): void;
    warn(...args: readonly unknown[]): void;
    info(...args: readonly unknown[]): void;
    debug(...args: readonly unknown[]): void;
    trace(...args: readonly unknown[]): void;

    /**
     * Create a child logger that adds `bindings` to every entry.
     */
    child(bindings: Record<string, unknown>): ILogger;
}
