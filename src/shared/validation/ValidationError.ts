/**
 * ValidationError - Validation-specific error class.
 *
 * Extends PetLogError with field-level details.
 */

import { PetLogError } from '../errors/PetLogError.js';
import type { ValidationFieldError } from './ValidationSchema.js';

/**
 * Rejected input is VALIDATION_ERROR; a rejected snapshot file is PARSE_ERROR.
 */
export type ValidationErrorCode = 'VALIDATION_ERROR' | 'PARSE_ERROR';

export class ValidationError extends PetLogError {
    readonly fieldErrors: ValidationFieldError[];

    constructor(message: string, fieldErrors: ValidationFieldError[] = [], code: ValidationErrorCode = 'VALIDATION_ERROR') {
        super(code, message, {
            fields: fieldErrors.map(e => ({
                field: e.field,
                message: e.message,
            })),
        });
        this.name = 'ValidationError';
        this.fieldErrors = fieldErrors;

        // Ensure proper prototype chain
        Object.setPrototypeOf(this, ValidationError.prototype);
    }

    /**
     * Create a validation error for missing required fields.
     */
    static missingFields(fields: string[]): ValidationError {
        const fieldErrors = fields.map(field => ({
            field,
            message: `${field} is required`,
        }));
        return new ValidationError(
            `Missing required fields: ${fields.join(', ')}`,
            fieldErrors
        );
    }

    /**
     * Create a validation error from multiple field errors.
     */
    static fromFieldErrors(fieldErrors: ValidationFieldError[], code: ValidationErrorCode = 'VALIDATION_ERROR'): ValidationError {
        if (fieldErrors.length === 0) {
            return new ValidationError('Validation failed', [], code);
        }
        if (fieldErrors.length === 1) {
            return new ValidationError(fieldErrors[0].message, fieldErrors, code);
        }
        return new ValidationError(
            `Validation failed: ${fieldErrors.map(e => e.message).join('; ')}`,
            fieldErrors,
            code
        );
    }
}
