// src/infrastructure/logger.ts
import {
    pino,
    type DestinationStream,
    type Logger as PinoLogger,
    type LoggerOptions as PinoOptions,
} from "pino";
import type { ILogger, LogContext } from "./loggerInterface.js";

type Level = "info" | "error" | "warn" | "debug";

export interface LoggerOptions {
    level?: string;
    /** Human-readable output through pino-pretty */
    pretty?: boolean;
    name?: string;
    /** Explicit sink, mainly for tests */
    destination?: DestinationStream;
}

/**
 * Structured JSON logger backed by pino.
 */
export class Logger implements ILogger {
    private readonly correlationContext = new Map<string, string>();
    private readonly pino: PinoLogger;

    constructor(options: LoggerOptions = {}) {
        const base: PinoOptions = {
            name: options.name ?? "market-sentinel",
            level: options.level ?? "info",
            base: undefined,
            timestamp: pino.stdTimeFunctions.isoTime,
        };

        if (options.destination) {
            this.pino = pino(
                {
                    ...base,
                    formatters: { level: (label) => ({ level: label }) },
                },
                options.destination
            );
        } else if (options.pretty) {
            this.pino = pino({ ...base, transport: { target: "pino-pretty" } });
        } else {
            this.pino = pino({
                ...base,
                formatters: { level: (label) => ({ level: label }) },
            });
        }
    }

    public info(
        message: string,
        context?: LogContext,
        correlationId?: string
    ): void {
        this.log("info", message, context, correlationId);
    }

    public error(
        message: string,
        context?: LogContext,
        correlationId?: string
    ): void {
        this.log("error", message, context, correlationId);
    }

    public warn(
        message: string,
        context?: LogContext,
        correlationId?: string
    ): void {
        this.log("warn", message, context, correlationId);
    }

    public debug(
        message: string,
        context?: LogContext,
        correlationId?: string
    ): void {
        this.log("debug", message, context, correlationId);
    }

    private log(
        level: Level,
        message: string,
        context?: LogContext,
        correlationId?: string
    ): void {
        if (!this.pino.isLevelEnabled(level)) return;

        const entry: Record<string, unknown> = { ...context };
        if (correlationId) {
            entry["correlationId"] = correlationId;
            const scope = this.correlationContext.get(correlationId);
            if (scope) entry["correlationContext"] = scope;
        }
        this.pino[level](entry, message);
    }

    /**
     * Attach a context label to every entry logged with this correlation id
     */
    public setCorrelationId(id: string, context: string): void {
        this.correlationContext.set(id, context);
    }

    public removeCorrelationId(id: string): void {
        this.correlationContext.delete(id);
    }
}
