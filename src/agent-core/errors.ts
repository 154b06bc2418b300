/**
 * Tax Advisor Errors
 * Typed failures surfaced by the engine, the ingestor and the model boundary
 */

/**
 * Thrown when financial metrics are missing a mandatory figure or carry a
 * negative or non-numeric amount
 */
export class InvalidInputError extends Error {
    field?: string;

    constructor(message: string, field?: string) {
        super(message);
        this.name = 'InvalidInputError';
        this.field = field;

        Error.captureStackTrace(this, this.constructor);
    }
}

/**
 * Thrown when the tax rate table is incomplete or out of range
 */
export class InvalidConfigurationError extends Error {
    setting?: string;

    constructor(message: string, setting?: string) {
        super(message);
        this.name = 'InvalidConfigurationError';
        this.setting = setting;

        Error.captureStackTrace(this, this.constructor);
    }
}

/**
 * Thrown when an uploaded file cannot be read or mapped to metrics
 */
export class IngestionError extends Error {
    constructor(message: string) {
        super(message);
        this.name = 'IngestionError';

        Error.captureStackTrace(this, this.constructor);
    }
}

/**
 * Thrown when the model reply is not valid JSON for the expected schema
 */
export class AdvisorResponseError extends Error {
    issues: string[];

    constructor(message: string, issues: string[] = []) {
        super(message);
        this.name = 'AdvisorResponseError';
        this.issues = issues;

        Error.captureStackTrace(this, this.constructor);
    }
}

/**
 * Thrown when an AI provider call fails. `status` is the HTTP status when the
 * provider answered; `retryable` marks rate limits, 5xx and timeouts.
 */
export class ProviderError extends Error {
    provider: string;
    status?: number;
    retryable: boolean;

    constructor(provider: string, message: string, options: { status?: number; retryable: boolean }) {
        super(message);
        this.name = 'ProviderError';
        this.provider = provider;
        this.status = options.status;
        this.retryable = options.retryable;

        Error.captureStackTrace(this, this.constructor);
    }
}

/**
 * Message of any thrown value
 */
export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
