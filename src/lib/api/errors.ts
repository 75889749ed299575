// src/lib/api/errors.ts

/**
 * Base error for anything that stops a call to the backend from yielding a result
 */
export class ApiError extends Error {
    public readonly statusCode: number;
    public readonly code: string;
    public readonly details?: unknown;

    constructor(message: string, statusCode: number, code: string, details?: unknown) {
        super(message);
        this.name = 'ApiError';
        this.statusCode = statusCode;
        this.code = code;
        this.details = details;
    }
}

/**
 * Request never got a response (connection refused, DNS, reset)
 */
export class NetworkError extends ApiError {
    public readonly url: string;

    constructor(url: string, cause?: unknown) {
        const reason = cause instanceof Error ? cause.message : String(cause ?? 'unknown error');
        super(`Request to ${url} failed: ${reason}`, 0, 'NETWORK_ERROR', { cause: reason });
        this.name = 'NetworkError';
        this.url = url;
    }
}

/**
 * Login answered without session.access_token
 */
export class MissingTokenError extends ApiError {
    public readonly email: string;

    constructor(email: string, statusCode: number, details?: unknown) {
        super(`no access_token obtained for ${email}`, statusCode, 'MISSING_TOKEN', details);
        this.name = 'MissingTokenError';
        this.email = email;
    }
}

/**
 * Run configuration failed validation
 */
export class ConfigError extends ApiError {
    constructor(message: string = 'Invalid configuration', details?: unknown) {
        super(message, 0, 'CONFIG_ERROR', details);
        this.name = 'ConfigError';
    }
}
