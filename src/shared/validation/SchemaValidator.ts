/**
 * SchemaValidator - Validates untrusted data against a ValidationSchema.
 */

import type {
    ValidationSchema,
    FieldRule,
    FieldType,
    ValidationResult,
    ValidationFieldError,
    SchemaOptions,
} from './ValidationSchema.js';
import { ValidationError, type ValidationErrorCode } from './ValidationError.js';

/**
 * Default maximum string length.
 */
const MAX_STRING_LENGTH = 500;

/**
 * Default maximum array length.
 */
const MAX_ARRAY_LENGTH = 100;

export function isRecord(value: unknown): value is Record<string, unknown> {
    return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Validate a value against a schema.
 */
export function validate(
    data: unknown,
    schema: ValidationSchema,
    options: SchemaOptions = {}
): ValidationResult {
    const errors: ValidationFieldError[] = [];
    const { rejectUnknown = false } = options;

    if (!isRecord(data)) {
        errors.push({
            field: '$root',
            message: 'Document must be an object',
            value: data,
        });
        return { valid: false, errors };
    }

    if (rejectUnknown) {
        const schemaKeys = new Set(Object.keys(schema));
        const unknownFields = Object.keys(data).filter(key => !schemaKeys.has(key));
        errors.push(...unknownFields.map(field => ({
            field,
            message: `Unknown field: ${field}`,
        })));
    }

    for (const [fieldName, rule] of Object.entries(schema)) {
        errors.push(...validateField(fieldName, data[fieldName], rule));
    }

    return {
        valid: errors.length === 0,
        errors,
    };
}

/**
 * Validate a single field against a rule.
 */
function validateField(
    fieldName: string,
    value: unknown,
    rule: FieldRule
): ValidationFieldError[] {
    const errors: ValidationFieldError[] = [];

    // Check required
    if (rule.required && (value === undefined || value === null || value === '')) {
        errors.push({
            field: fieldName,
            message: rule.message ?? `${fieldName} is required`,
        });
        return errors;
    }

    // Absent and null optional values are both treated as missing
    if (value === undefined || value === null) {
        return errors;
    }

    const allowed: readonly FieldType[] = typeof rule.type === 'string' ? [rule.type] : rule.type;
    const actualType = typeOf(value);
    if (!allowed.some(type => type === actualType)) {
        errors.push({
            field: fieldName,
            message: rule.message ?? `${fieldName} must be a ${allowed.join(' or ')}, got ${actualType}`,
            value,
        });
        return errors;
    }

    if (typeof value === 'string') {
        errors.push(...validateString(fieldName, value, rule));
    } else if (typeof value === 'number') {
        errors.push(...validateNumber(fieldName, value, rule));
    } else if (Array.isArray(value)) {
        errors.push(...validateArray(fieldName, value, rule));
    } else if (isRecord(value)) {
        errors.push(...validateObject(fieldName, value, rule));
    }

    if (rule.enum && !isEnumMember(rule.enum, value)) {
        errors.push({
            field: fieldName,
            message: rule.message ?? `${fieldName} must be one of [${rule.enum.join(', ')}]`,
            value,
        });
    }

    return errors;
}

function typeOf(value: unknown): FieldType | 'other' {
    if (Array.isArray(value)) return 'array';
    if (typeof value === 'string') return 'string';
    if (typeof value === 'number') return 'number';
    if (typeof value === 'boolean') return 'boolean';
    if (typeof value === 'object' && value !== null) return 'object';
    return 'other';
}

function isEnumMember(allowed: readonly (string | number | boolean)[], value: unknown): boolean {
    return (typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean') &&
        allowed.includes(value);
}

function validateString(
    fieldName: string,
    value: string,
    rule: FieldRule
): ValidationFieldError[] {
    const errors: ValidationFieldError[] = [];
    const maxLen = rule.max ?? MAX_STRING_LENGTH;

    if (rule.min !== undefined && value.length < rule.min) {
        errors.push({
            field: fieldName,
            message: rule.message ?? `${fieldName} must be at least ${rule.min} characters`,
            value,
        });
    }

    if (value.length > maxLen) {
        errors.push({
            field: fieldName,
            message: rule.message ?? `${fieldName} must be at most ${maxLen} characters`,
            value: `(${value.length} chars)`,
        });
    }

    if (rule.pattern && !rule.pattern.test(value)) {
        errors.push({
            field: fieldName,
            message: rule.message ?? `${fieldName} has invalid format`,
            value,
        });
    }

    return errors;
}

function validateNumber(
    fieldName: string,
    value: number,
    rule: FieldRule
): ValidationFieldError[] {
    const errors: ValidationFieldError[] = [];

    if (!Number.isFinite(value)) {
        errors.push({
            field: fieldName,
            message: rule.message ?? `${fieldName} must be a finite number`,
            value,
        });
        return errors;
    }

    if (rule.min !== undefined && value < rule.min) {
        errors.push({
            field: fieldName,
            message: rule.message ?? `${fieldName} must be at least ${rule.min}`,
            value,
        });
    }

    if (rule.max !== undefined && value > rule.max) {
        errors.push({
            field: fieldName,
            message: rule.message ?? `${fieldName} must be at most ${rule.max}`,
            value,
        });
    }

    return errors;
}

function validateArray(
    fieldName: string,
    value: unknown[],
    rule: FieldRule
): ValidationFieldError[] {
    const errors: ValidationFieldError[] = [];
    const maxLen = rule.max ?? MAX_ARRAY_LENGTH;

    if (rule.min !== undefined && value.length < rule.min) {
        errors.push({
            field: fieldName,
            message: rule.message ?? `${fieldName} must have at least ${rule.min} items`,
            value: `(${value.length} items)`,
        });
    }

    if (value.length > maxLen) {
        errors.push({
            field: fieldName,
            message: rule.message ?? `${fieldName} must have at most ${maxLen} items`,
            value: `(${value.length} items)`,
        });
    }

    if (rule.items) {
        for (let i = 0; i < value.length; i++) {
            errors.push(...validateField(`${fieldName}[${i}]`, value[i], rule.items));
        }
    }

    return errors;
}

function validateObject(
    fieldName: string,
    value: Record<string, unknown>,
    rule: FieldRule
): ValidationFieldError[] {
    const errors: ValidationFieldError[] = [];

    if (rule.properties) {
        if (rule.allowAdditional === false) {
            const schemaKeys = new Set(Object.keys(rule.properties));
            const unknownFields = Object.keys(value).filter(key => !schemaKeys.has(key));
            for (const unknown of unknownFields) {
                errors.push({
                    field: `${fieldName}.${unknown}`,
                    message: `Unknown field: ${fieldName}.${unknown}`,
                });
            }
        }

        for (const [nestedField, nestedRule] of Object.entries(rule.properties)) {
            errors.push(...validateField(
                `${fieldName}.${nestedField}`,
                value[nestedField],
                nestedRule
            ));
        }
    }

    return errors;
}

/**
 * Validate data and throw ValidationError if invalid.
 */
export function validateOrThrow(
    data: unknown,
    schema: ValidationSchema,
    options: SchemaOptions = {},
    code: ValidationErrorCode = 'VALIDATION_ERROR'
): void {
    const result = validate(data, schema, options);
    if (!result.valid) {
        throw ValidationError.fromFieldErrors(result.errors, code);
    }
}
