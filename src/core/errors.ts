/**
 * @module core/errors
 * @description Unified error types and error codes for the design and delivery engine
 *
 * Numeric degeneracies (zero-length vectors, zero distances) are never raised;
 * they are resolved with fallback values where they occur. Running out of steps
 * is reported as data on the simulation result.
 */

// ==================== Error Codes ====================

/**
 * Standard error codes
 */
export const ErrorCodes = {
    /** Out-of-domain input at a call boundary (size <= 0, missing config, bad vector) */
    INVALID_PARAMETER: 'INVALID_PARAMETER',
    /** Unexpected failure wrapped from a foreign error */
    INTERNAL_ERROR: 'INTERNAL_ERROR',
} as const;

export type ErrorCode = (typeof ErrorCodes)[keyof typeof ErrorCodes];

// ==================== Error Classes ====================

/**
 * Base error class for the engine
 */
export class NanobotError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;
    readonly timestamp: number;

    constructor(code: ErrorCode, message: string, details?: unknown) {
        super(message);
        this.name = 'NanobotError';
        this.code = code;
        this.details = details;
        this.timestamp = Date.now();

        // Maintain proper stack trace in V8
        if (Error.captureStackTrace) {
            Error.captureStackTrace(this, NanobotError);
        }
    }

    /**
     * Convert to JSON-serializable object
     */
    toJSON(): {
        name: string;
        code: ErrorCode;
        message: string;
        details: unknown;
        timestamp: number;
    } {
        return {
            name: this.name,
            code: this.code,
            message: this.message,
            details: this.details,
            timestamp: this.timestamp,
        };
    }
}

/**
 * Invalid parameter (fails fast, never retried by the engine)
 */
export class InvalidParameterError extends NanobotError {
    readonly parameter: string;

    constructor(parameter: string, message: string, details?: unknown) {
        super(ErrorCodes.INVALID_PARAMETER, message, details);
        this.name = 'InvalidParameterError';
        this.parameter = parameter;
    }
}

// ==================== Error Utilities ====================

/**
 * Check if an error is a NanobotError
 */
export function isNanobotError(error: unknown): error is NanobotError {
    return error instanceof NanobotError;
}

/**
 * Check if an error has a specific error code
 */
export function hasErrorCode(error: unknown, code: ErrorCode): boolean {
    return isNanobotError(error) && error.code === code;
}

/**
 * Wrap any error into a NanobotError
 */
export function wrapError(error: unknown, defaultCode: ErrorCode = ErrorCodes.INTERNAL_ERROR): NanobotError {
    if (isNanobotError(error)) {
        return error;
    }

    if (error instanceof Error) {
        return new NanobotError(defaultCode, error.message, {
            originalName: error.name,
            originalStack: error.stack,
        });
    }

    return new NanobotError(defaultCode, String(error));
}
