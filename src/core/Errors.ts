// Errors.ts - Error taxonomy and result type shared by tables, search and IO

export type KNNErrorKind = 'schema' | 'bounds' | 'io';

/**
 * Base error for every failure the library reports.
 * Errors are returned inside a {@link Result}, not thrown across the public API.
 */
export class KNNError extends Error {
    /** Error code for programmatic handling */
    public readonly code: string;

    public readonly kind: KNNErrorKind;

    /** Additional error context */
    public readonly context?: Record<string, unknown>;

    constructor(message: string, code: string, kind: KNNErrorKind, context?: Record<string, unknown>) {
        super(message);
        this.name = 'KNNError';
        this.code = code;
        this.kind = kind;
        this.context = context;
    }
}

/**
 * Unknown attribute, unset label, or a point whose shape does not fit the table.
 */
export class SchemaError extends KNNError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'SCHEMA_ERROR', 'schema', context);
        this.name = 'SchemaError';
    }
}

/**
 * Row index, split ratio or k outside its allowed range.
 */
export class BoundsError extends KNNError {
    constructor(message: string, context?: Record<string, unknown>) {
        super(message, 'BOUNDS_ERROR', 'bounds', context);
        this.name = 'BoundsError';
    }
}

export class IOError extends KNNError {
    public readonly path: string;

    constructor(path: string, message: string, context?: Record<string, unknown>) {
        super(`${path}: ${message}`, 'IO_ERROR', 'io', { path, ...context });
        this.name = 'IOError';
        this.path = path;
    }
}

export type Result<T> =
    | { success: true; data: T }
    | { success: false; error: KNNError };

export function ok<T>(data: T): Result<T> {
    return { success: true, data };
}

export function fail<T>(error: KNNError): Result<T> {
    return { success: false, error };
}
