/**
 * Standardized error classes for the application.
 * NotFound and budget exhaustion are not errors: they travel as empty results and statuses.
 */

export class LeadRadarError extends Error {
    constructor(message: string, public code: string, public context?: Record<string, unknown>) {
        super(message);
        this.name = this.constructor.name;
        Error.captureStackTrace(this, this.constructor);
    }
}

export class NetworkError extends LeadRadarError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'NETWORK_ERROR', context);
    }
}

export class ConfigurationError extends LeadRadarError {
    constructor(message: string) {
        super(message, 'CONFIG_ERROR', { fatal: true });
    }
}

export class ValidationError extends LeadRadarError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'VALIDATION_ERROR', { fatal: false, ...context });
    }
}

export function toError(value: unknown): Error {
    return value instanceof Error ? value : new Error(String(value));
}
