// src/infrastructure/loggerInterface.ts

/** Structured fields attached to one log entry */
export type LogContext = Record<string, unknown>;

export type LogMethod = (
    message: string,
    context?: LogContext,
    correlationId?: string
) => void;

/**
 * Logging surface handed to every component. Entries that share a
 * correlation id can carry a label registered with `setCorrelationId`
 * (e.g. "ws /ws/market").
 */
export interface ILogger {
    info: LogMethod;
    warn: LogMethod;
    error: LogMethod;
    debug: LogMethod;
    setCorrelationId(id: string, context: string): void;
    removeCorrelationId(id: string): void;
}
