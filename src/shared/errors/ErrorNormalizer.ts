/**
 * ErrorNormalizer - Convert any error to a PetLogError.
 */

import { PetLogError } from './PetLogError.js';

/**
 * Errors raised by Node's filesystem calls.
 */
export function isSystemError(error: unknown): error is NodeJS.ErrnoException {
    return error instanceof Error && 'code' in error && typeof error.code === 'string';
}

/**
 * Normalize any error to a PetLogError.
 */
export function normalizeError(error: unknown): PetLogError {
    // Already a PetLogError
    if (error instanceof PetLogError) {
        return error;
    }

    if (error instanceof Error) {
        if (error.name === 'AbortError') {
            return PetLogError.cancelled(undefined, error);
        }
        if (error instanceof SyntaxError) {
            return PetLogError.parse(`Pet log data is not valid JSON: ${error.message}`, undefined, error);
        }
        if (isSystemError(error)) {
            return PetLogError.storage(error.message, error);
        }
        return PetLogError.internal(error.message, error);
    }

    return PetLogError.internal();
}

/**
 * Build the status line shown to the user after a failed action,
 * e.g. "Failed to add pet: No pet found with identifier p-1."
 */
export function toStatusMessage(action: string, error: unknown): string {
    return `Failed to ${action}: ${normalizeError(error).message}`;
}
