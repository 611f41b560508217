/**
 * ErrorCodes - Error code constants for the pet log.
 */

/**
 * Resource error codes.
 */
export const NOT_FOUND = 'NOT_FOUND';
export const CONFLICT = 'CONFLICT';

/**
 * Input error codes.
 */
export const VALIDATION_ERROR = 'VALIDATION_ERROR';
export const PARSE_ERROR = 'PARSE_ERROR';

/**
 * Operational error codes.
 */
export const STORAGE_ERROR = 'STORAGE_ERROR';
export const CANCELLED = 'CANCELLED';
export const INTERNAL_ERROR = 'INTERNAL_ERROR';

export type ErrorCode =
    | typeof NOT_FOUND
    | typeof CONFLICT
    | typeof VALIDATION_ERROR
    | typeof PARSE_ERROR
    | typeof STORAGE_ERROR
    | typeof CANCELLED
    | typeof INTERNAL_ERROR;
