// src/core/errors.ts

export type ErrorCode =
    | "VALIDATION_FAILED"
    | "UNAUTHORIZED"
    | "TRADE_REJECTED"
    | "CONFIGURATION_INVALID";

/**
 * Base class for failures surfaced to an immediate caller.
 */
export class ServiceError extends Error {
    constructor(
        message: string,
        public readonly code: ErrorCode,
        public readonly correlationId?: string
    ) {
        super(message);
        this.name = "ServiceError";
    }
}

export class ValidationError extends ServiceError {
    constructor(
        message: string,
        public readonly issues: string[] = [],
        correlationId?: string
    ) {
        super(message, "VALIDATION_FAILED", correlationId);
        this.name = "ValidationError";
    }
}

export class AuthenticationError extends ServiceError {
    constructor(message = "Invalid webhook token", correlationId?: string) {
        super(message, "UNAUTHORIZED", correlationId);
        this.name = "AuthenticationError";
    }
}

export class TradeRejectedError extends ServiceError {
    constructor(message: string, correlationId?: string) {
        super(message, "TRADE_REJECTED", correlationId);
        this.name = "TradeRejectedError";
    }
}

export class ConfigurationError extends ServiceError {
    constructor(
        message: string,
        public readonly issues: string[] = []
    ) {
        super(message, "CONFIGURATION_INVALID");
        this.name = "ConfigurationError";
    }
}
