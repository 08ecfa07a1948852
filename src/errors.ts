/**
 * Error taxonomy shared by the store, the providers and the entry points
 */

/**
 * Persistence failure. The operation that raised it did not partially apply.
 */
export class StorageError extends Error {
    constructor(message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'StorageError';
    }
}

export type ProviderErrorKind =
    | 'network'
    | 'auth'
    | 'quota'
    | 'timeout'
    | 'http'
    | 'malformed_response';

/**
 * Recoverable classifier failure. The fine filter turns it into a degraded decision.
 */
export class ProviderError extends Error {
    readonly kind: ProviderErrorKind;

    constructor(kind: ProviderErrorKind, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = 'ProviderError';
        this.kind = kind;
    }
}

/**
 * Missing or invalid configuration, raised before any pipeline object exists
 */
export class ConfigError extends Error {
    readonly field: string;

    constructor(field: string, message: string) {
        super(`${field}: ${message}`);
        this.name = 'ConfigError';
        this.field = field;
    }
}

export class RunCancelledError extends Error {
    constructor(message = 'Run cancelled') {
        super(message);
        this.name = 'RunCancelledError';
    }
}

export function errorMessage(error: unknown): string {
    return error instanceof Error ? error.message : String(error);
}
