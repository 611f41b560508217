/**
 * CommonSchemas - Common validation schemas.
 *
 * Provides reusable field definitions and patterns.
 */

import { stringField } from '../ValidationSchema.js';

/**
 * ISO 8601 timestamp with an explicit offset, as written by Date#toISOString
 * or by other writers that emit "+hh:mm" offsets.
 */
export const ISO_TIMESTAMP_PATTERN = /^\d{4}-\d{2}-\d{2}T\d{2}:\d{2}:\d{2}(\.\d+)?(Z|[+-]\d{2}:\d{2})$/;

/**
 * Entity identifier.
 */
export const idField = stringField({
    required: true,
    min: 1,
    max: 1_000,
});

export const timestampField = stringField({
    required: true,
    pattern: ISO_TIMESTAMP_PATTERN,
    max: 40,
});

export const optionalTimestampField = stringField({
    required: false,
    pattern: ISO_TIMESTAMP_PATTERN,
    max: 40,
});
