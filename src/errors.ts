// ============================================================================
// Feed Image Cache — Error Types
// ============================================================================

/**
 * Base error class for all feed cache errors.
 * Carries an error code, optional context and the underlying cause.
 */
export class FeedCacheError extends Error {
    readonly code: string;
    readonly context?: Record<string, unknown>;

    constructor(
        message: string,
        code: string = "FEED_CACHE_ERROR",
        context?: Record<string, unknown>,
        options?: ErrorOptions
    ) {
        super(message, options);
        this.name = "FeedCacheError";
        this.code = code;
        this.context = context;
    }
}

/**
 * Thrown when the backing database file cannot be opened or created.
 */
export class OpenError extends FeedCacheError {
    constructor(message: string, context?: Record<string, unknown>, options?: ErrorOptions) {
        super(message, "OPEN_ERROR", context, options);
        this.name = "OpenError";
    }
}

/**
 * Thrown when the cache table cannot be created, usually because the
 * file is not an SQLite database.
 */
export class SchemaError extends FeedCacheError {
    constructor(message: string, context?: Record<string, unknown>, options?: ErrorOptions) {
        super(message, "SCHEMA_ERROR", context, options);
        this.name = "SchemaError";
    }
}

/**
 * Thrown when a statement fails or a stored row cannot be parsed.
 */
export class QueryError extends FeedCacheError {
    constructor(message: string, context?: Record<string, unknown>, options?: ErrorOptions) {
        super(message, "QUERY_ERROR", context, options);
        this.name = "QueryError";
    }
}

/**
 * Thrown when records handed to the store fail validation.
 */
export class ValidationError extends FeedCacheError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, "VALIDATION_ERROR", context);
        this.name = "ValidationError";
    }
}

export function errorMessage(err: unknown): string {
    return err instanceof Error ? err.message : String(err);
}
