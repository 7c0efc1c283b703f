/**
 * Error classes for calcgraph.
 * Structured errors with codes and context for logging.
 */

/**
 * Error codes for categorizing errors
 */
export enum ErrorCode {
    // Input errors (1xxx)
    INVALID_INPUT = 'E1000',
    DUPLICATE_ENTRY_ID = 'E1001',
    MALFORMED_ENTRY_ID = 'E1002',

    // Source errors (2xxx)
    SOURCE_READ_FAILED = 'E2000',
    SOURCE_INVALID_RECORD = 'E2001',

    // Store errors (3xxx)
    UPSERT_FAILED = 'E3000',
    DATABASE_NOT_FOUND = 'E3001',

    // Configuration errors (4xxx)
    CONFIGURATION_INVALID = 'E4000',
    ANALYZER_NOT_FOUND = 'E4001',
    ANALYZER_DUPLICATE = 'E4002',

    // General errors (9xxx)
    UNKNOWN_ERROR = 'E9000',
}

/**
 * Base error class for all calcgraph errors
 */
export class CalcGraphError extends Error {
    public readonly code: ErrorCode;
    public readonly context?: Record<string, unknown>;

    constructor(
        message: string,
        code: ErrorCode = ErrorCode.UNKNOWN_ERROR,
        context?: Record<string, unknown>
    ) {
        super(message);
        this.name = 'CalcGraphError';
        this.code = code;
        this.context = context;

        Error.captureStackTrace(this, this.constructor);
    }

    /**
     * Convert error to JSON for logging
     */
    toJSON(): Record<string, unknown> {
        return {
            name: this.name,
            message: this.message,
            code: this.code,
            context: this.context,
        };
    }

    toString(): string {
        return `[${this.code}] ${this.name}: ${this.message}`;
    }
}

/**
 * Malformed or conflicting entries in the input population.
 * Fatal: raised before any graph mutation.
 */
export class InvalidInputError extends CalcGraphError {
    constructor(message: string, code: ErrorCode = ErrorCode.INVALID_INPUT, context?: Record<string, unknown>) {
        super(message, code, context);
        this.name = 'InvalidInputError';
    }
}

/**
 * The graph store rejected or failed one edge mutation.
 * Collected per edge; never aborts a batch.
 */
export class UpsertError extends CalcGraphError {
    constructor(message: string, context?: Record<string, unknown>, options?: { cause?: unknown }) {
        super(message, ErrorCode.UPSERT_FAILED, context);
        this.name = 'UpsertError';
        if (options?.cause !== undefined) {
            this.cause = options.cause;
        }
    }
}

/**
 * Entry source could not be read or holds invalid records.
 */
export class SourceError extends CalcGraphError {
    constructor(message: string, code: ErrorCode = ErrorCode.SOURCE_READ_FAILED, context?: Record<string, unknown>) {
        super(message, code, context);
        this.name = 'SourceError';
    }
}

/**
 * The graph database could not be opened.
 */
export class StoreError extends CalcGraphError {
    constructor(message: string, code: ErrorCode = ErrorCode.DATABASE_NOT_FOUND, context?: Record<string, unknown>) {
        super(message, code, context);
        this.name = 'StoreError';
    }
}

/**
 * Invalid configuration or analyzer selection.
 */
export class ConfigurationError extends CalcGraphError {
    constructor(message: string, code: ErrorCode = ErrorCode.CONFIGURATION_INVALID, context?: Record<string, unknown>) {
        super(message, code, context);
        this.name = 'ConfigurationError';
    }
}

/**
 * Extract a readable message from an unknown thrown value.
 */
export function errorMessage(error: unknown): string {
    if (error instanceof Error) return error.message;
    return String(error);
}
