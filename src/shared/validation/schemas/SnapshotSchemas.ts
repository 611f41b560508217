/**
 * SnapshotSchemas - Shape of the pet log file.
 */

import {
    type ValidationSchema,
    arrayField,
    numberField,
    objectField,
    stringField,
} from '../ValidationSchema.js';
import { idField, optionalTimestampField, timestampField } from './CommonSchemas.js';
import { RECURRENCE_FREQUENCIES } from '../../../domain/value-objects/RecurrenceInfo.js';

/**
 * Upper bound on the entries of one collection in a snapshot.
 */
export const MAX_SNAPSHOT_ITEMS = 100_000;

/**
 * Free text is not length-limited on write, so the reader only guards
 * against absurd values.
 */
export const MAX_TEXT_LENGTH = 1_000_000;

const displayNameField = stringField({ max: MAX_TEXT_LENGTH });
const notesField = stringField({ max: MAX_TEXT_LENGTH });

export const RecurrenceSchema: ValidationSchema = {
    frequency: {
        type: ['string', 'number'],
        required: true,
        // Numeric codes are accepted for files written by older versions
        enum: [...RECURRENCE_FREQUENCIES, ...RECURRENCE_FREQUENCIES.map((_, code) => code)],
    },
    interval: numberField(),
    nextOccurrence: optionalTimestampField,
    endDate: optionalTimestampField,
};

export const PetSchema: ValidationSchema = {
    id: idField,
    displayName: displayNameField,
    notes: notesField,
    createdAt: timestampField,
    updatedAt: optionalTimestampField,
    archivedAt: optionalTimestampField,
};

export const PetActivitySchema: ValidationSchema = {
    id: idField,
    petId: idField,
    displayName: displayNameField,
    notes: notesField,
    occurredAt: timestampField,
    recurrence: objectField(RecurrenceSchema),
    createdAt: timestampField,
    updatedAt: optionalTimestampField,
};

export const PetReminderSchema: ValidationSchema = {
    id: idField,
    petId: idField,
    displayName: displayNameField,
    notes: notesField,
    remindAt: optionalTimestampField,
    recurrence: objectField(RecurrenceSchema),
    createdAt: timestampField,
    updatedAt: optionalTimestampField,
};

export const PetLogSnapshotSchema: ValidationSchema = {
    pets: arrayField(objectField(PetSchema), { max: MAX_SNAPSHOT_ITEMS }),
    activities: arrayField(objectField(PetActivitySchema), { max: MAX_SNAPSHOT_ITEMS }),
    reminders: arrayField(objectField(PetReminderSchema), { max: MAX_SNAPSHOT_ITEMS }),
};
