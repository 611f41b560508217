/**
 * ValidationSchema - Schema definition types.
 *
 * Provides type-safe schema definitions for validating untrusted data,
 * such as a snapshot read back from disk.
 */

/**
 * Supported field types.
 */
export type FieldType = 'string' | 'number' | 'boolean' | 'array' | 'object';

/**
 * Field validation rule.
 */
export interface FieldRule {
    /** Field type, or the list of types the field may take */
    type: FieldType | readonly FieldType[];
    /** Whether the field is required */
    required?: boolean;
    /** Minimum length for strings or minimum value for numbers */
    min?: number;
    /** Maximum length for strings or maximum value for numbers */
    max?: number;
    /** Regular expression pattern for strings */
    pattern?: RegExp;
    /** Allowed values (enum) */
    enum?: readonly (string | number | boolean)[];
    /** For array types: schema for array items */
    items?: FieldRule;
    /** For object types: nested schema */
    properties?: ValidationSchema;
    /** Whether to allow additional properties not in schema (for object type) */
    allowAdditional?: boolean;
    /** Custom error message */
    message?: string;
}

/**
 * Validation schema definition.
 */
export interface ValidationSchema {
    [field: string]: FieldRule;
}

export interface SchemaOptions {
    /** Whether to reject top-level fields missing from the schema (default: false) */
    rejectUnknown?: boolean;
}

export interface ValidationResult {
    valid: boolean;
    errors: ValidationFieldError[];
}

/**
 * Validation error for a specific field.
 */
export interface ValidationFieldError {
    field: string;
    message: string;
    value?: unknown;
}

export function stringField(options: Partial<Omit<FieldRule, 'type'>> = {}): FieldRule {
    return { type: 'string', ...options };
}

export function numberField(options: Partial<Omit<FieldRule, 'type'>> = {}): FieldRule {
    return { type: 'number', ...options };
}

export function arrayField(items: FieldRule, options: Partial<Omit<FieldRule, 'type' | 'items'>> = {}): FieldRule {
    return { type: 'array', items, ...options };
}

export function objectField(properties: ValidationSchema, options: Partial<Omit<FieldRule, 'type' | 'properties'>> = {}): FieldRule {
    return { type: 'object', properties, ...options };
}
