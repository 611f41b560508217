import { describe, it, expect } from 'vitest';
import { validate, validateOrThrow } from '../SchemaValidator.js';
import { ValidationError } from '../ValidationError.js';
import { numberField, stringField } from '../ValidationSchema.js';
import { PetLogSnapshotSchema, RecurrenceSchema } from '../schemas/SnapshotSchemas.js';
import { PetLogError } from '../../errors/PetLogError.js';

describe('SchemaValidator', () => {
    it('should reject a document that is not an object', () => {
        const result = validate([], PetLogSnapshotSchema);

        expect(result.valid).toBe(false);
        expect(result.errors).toEqual([{ field: '$root', message: 'Document must be an object', value: [] }]);
    });

    it('should report missing required fields', () => {
        const result = validate({}, { name: stringField({ required: true }) });
        expect(result.errors.map(e => e.message)).toEqual(['name is required']);
    });

    it('should treat null optional fields as absent', () => {
        expect(validate({ name: null }, { name: stringField() }).valid).toBe(true);
    });

    it('should report type mismatches', () => {
        const result = validate({ count: 'three' }, { count: numberField() });
        expect(result.errors.map(e => e.message)).toEqual(['count must be a number, got string']);
    });

    it('should list every allowed type for multi-type fields', () => {
        const result = validate({ frequency: true, interval: 1 }, RecurrenceSchema);
        expect(result.errors.map(e => e.message)).toEqual(['frequency must be a string or number, got boolean']);
    });

    it('should accept frequency names and legacy numeric codes', () => {
        expect(validate({ frequency: 'monthly', interval: 1 }, RecurrenceSchema).valid).toBe(true);
        expect(validate({ frequency: 4, interval: 1 }, RecurrenceSchema).valid).toBe(true);
    });

    it('should reject unknown frequencies', () => {
        const result = validate({ frequency: 'hourly', interval: 1 }, RecurrenceSchema);
        expect(result.errors.map(e => e.message)).toEqual([
            'frequency must be one of [none, daily, weekly, monthly, yearly, 0, 1, 2, 3, 4]',
        ]);
    });

    it('should name nested fields by their path', () => {
        const result = validate({ pets: [{ id: '', createdAt: 'yesterday' }] }, PetLogSnapshotSchema);
        expect(result.errors.map(e => e.message)).toEqual([
            'pets[0].id is required',
            'pets[0].createdAt has invalid format',
        ]);
    });

    it('should reject unknown top-level fields when asked to', () => {
        const result = validate({ a: 1, b: 2 }, { a: numberField() }, { rejectUnknown: true });
        expect(result.errors).toEqual([{ field: 'b', message: 'Unknown field: b' }]);
    });

    it('should throw a ValidationError with the requested code', () => {
        let caught: unknown;
        try {
            validateOrThrow({ pets: 'none' }, PetLogSnapshotSchema, {}, 'PARSE_ERROR');
        } catch (error) {
            caught = error;
        }

        expect(caught).toBeInstanceOf(ValidationError);
        expect(caught).toBeInstanceOf(PetLogError);
        expect(caught).toMatchObject({
            code: 'PARSE_ERROR',
            message: 'pets must be a array, got string',
        });
    });

    it('should summarize several field errors in one message', () => {
        const error = ValidationError.fromFieldErrors([
            { field: 'a', message: 'a is required' },
            { field: 'b', message: 'b is required' },
        ]);

        expect(error.code).toBe('VALIDATION_ERROR');
        expect(error.message).toBe('Validation failed: a is required; b is required');
    });

    it('should describe missing fields', () => {
        const error = ValidationError.missingFields(['displayName']);

        expect(error.message).toBe('Missing required fields: displayName');
        expect(error.fieldErrors).toEqual([{ field: 'displayName', message: 'displayName is required' }]);
    });
});
