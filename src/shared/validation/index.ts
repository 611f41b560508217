/**
 * Validation module exports.
 */

export * from './ValidationSchema.js';
export * from './ValidationError.js';
export * from './SchemaValidator.js';
export * from './schemas/CommonSchemas.js';
export * from './schemas/SnapshotSchemas.js';
