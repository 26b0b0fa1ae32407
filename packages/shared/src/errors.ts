/**
 * Error taxonomy shared by core and CLI.
 *
 * Row-level coercion failures are NOT errors: the cleaner drops those rows
 * and reports them as warnings.
 */

import { ERROR_CODES } from './constants.js';

export type ErrorCode = (typeof ERROR_CODES)[keyof typeof ERROR_CODES];

/**
 * Base class for every fatal condition the pipeline raises on purpose.
 * Anything else reaching the caller is an unexpected failure.
 */
export class LedgerLensError extends Error {
    readonly code: ErrorCode;

    constructor(code: ErrorCode, message: string, options?: { cause?: unknown }) {
        super(message, options);
        this.name = new.target.name;
        this.code = code;
    }
}

/**
 * The tabular source could not be read at all.
 */
export class SourceUnavailableError extends LedgerLensError {
    readonly source: string;

    constructor(source: string, message: string, options?: { cause?: unknown }) {
        super(ERROR_CODES.SOURCE_UNAVAILABLE, message, options);
        this.source = source;
    }
}

/**
 * Required columns are absent from the source header.
 */
export class SchemaError extends LedgerLensError {
    readonly missingColumns: string[];
    readonly foundColumns: string[];

    constructor(missingColumns: string[], foundColumns: string[]) {
        super(
            ERROR_CODES.SCHEMA,
            `Missing required columns: ${missingColumns.join(', ')}. ` +
            `Found: ${foundColumns.length > 0 ? foundColumns.join(', ') : '(none)'}`
        );
        this.missingColumns = missingColumns;
        this.foundColumns = foundColumns;
    }
}

/**
 * A stage ran before the stage it depends on completed.
 */
export class StateError extends LedgerLensError {
    constructor(message: string) {
        super(ERROR_CODES.STATE, message);
    }
}

/**
 * Keyword configuration failed validation.
 */
export class ConfigError extends LedgerLensError {
    constructor(message: string, options?: { cause?: unknown }) {
        super(ERROR_CODES.CONFIG, message, options);
    }
}

export function isLedgerLensError(err: unknown): err is LedgerLensError {
    return err instanceof LedgerLensError;
}
