/**
 * PetLogError - Base error class for every failure the pet log surfaces.
 *
 * Carries a stable code so callers can tell a missing entity apart from a
 * storage or cancellation failure without matching on messages.
 */

import type { ErrorCode } from './ErrorCodes.js';

export class PetLogError extends Error {
    readonly code: ErrorCode;
    readonly details?: unknown;

    constructor(code: ErrorCode, message: string, details?: unknown, cause?: unknown) {
        super(message, cause === undefined ? undefined : { cause });
        this.name = 'PetLogError';
        this.code = code;
        this.details = details;

        // Ensure proper prototype chain for instanceof checks
        Object.setPrototypeOf(this, PetLogError.prototype);
    }

    /**
     * Check whether an error is a PetLogError with the given code.
     */
    static is(error: unknown, code: ErrorCode): error is PetLogError {
        return error instanceof PetLogError && error.code === code;
    }

    /**
     * Create a not found error.
     */
    static notFound(resource: string, id?: string): PetLogError {
        const message = id
            ? `No ${resource.toLowerCase()} found with identifier ${id}.`
            : `${resource} not found`;
        return new PetLogError('NOT_FOUND', message, id === undefined ? undefined : { resource, id });
    }

    static conflict(message: string, details?: unknown): PetLogError {
        return new PetLogError('CONFLICT', message, details);
    }

    static validation(message: string, details?: unknown): PetLogError {
        return new PetLogError('VALIDATION_ERROR', message, details);
    }

    /**
     * Create an error for a backing file that is not a readable snapshot.
     */
    static parse(message: string, details?: unknown, cause?: unknown): PetLogError {
        return new PetLogError('PARSE_ERROR', message, details, cause);
    }

    static storage(message: string, cause?: unknown): PetLogError {
        return new PetLogError('STORAGE_ERROR', message, undefined, cause);
    }

    static cancelled(message = 'The operation was cancelled', cause?: unknown): PetLogError {
        return new PetLogError('CANCELLED', message, undefined, cause);
    }

    static internal(message = 'An unexpected error occurred', cause?: unknown): PetLogError {
        return new PetLogError('INTERNAL_ERROR', message, undefined, cause);
    }
}

/**
 * Throw a CANCELLED error when the signal has fired.
 */
export function throwIfCancelled(signal: AbortSignal | undefined): void {
    if (signal?.aborted) {
        throw PetLogError.cancelled();
    }
}
