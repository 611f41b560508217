import type { IPet } from '../../../domain/entities/Pet.js';
import type { IPetActivity } from '../../../domain/entities/PetActivity.js';
import type { IPetReminder } from '../../../domain/entities/PetReminder.js';
import {
    RECURRENCE_FREQUENCIES,
    type IRecurrenceInfo,
    type RecurrenceFrequency,
    clampInterval,
    isRecurrenceFrequency,
} from '../../../domain/value-objects/RecurrenceInfo.js';
import { PetLogError } from '../../../shared/errors/PetLogError.js';
import { isRecord, validateOrThrow } from '../../../shared/validation/SchemaValidator.js';
import { PetLogSnapshotSchema } from '../../../shared/validation/schemas/SnapshotSchemas.js';

/**
 * In-memory contents of the pet log.
 */
export interface PetLogState {
    readonly pets: readonly IPet[];
    readonly activities: readonly IPetActivity[];
    readonly reminders: readonly IPetReminder[];
}

export interface RecurrenceDocument {
    frequency: RecurrenceFrequency;
    interval: number;
    nextOccurrence?: string;
    endDate?: string;
}

export interface PetDocument {
    id: string;
    displayName: string;
    notes?: string;
    createdAt: string;
    updatedAt?: string;
    archivedAt?: string;
}

export interface PetActivityDocument {
    id: string;
    petId: string;
    displayName: string;
    notes?: string;
    occurredAt: string;
    recurrence?: RecurrenceDocument;
    createdAt: string;
    updatedAt?: string;
}

export interface PetReminderDocument {
    id: string;
    petId: string;
    displayName: string;
    notes?: string;
    remindAt?: string;
    recurrence?: RecurrenceDocument;
    createdAt: string;
    updatedAt?: string;
}

/**
 * On-disk shape of the pet log file.
 */
export interface PetLogSnapshotDocument {
    pets: PetDocument[];
    activities: PetActivityDocument[];
    reminders: PetReminderDocument[];
}

/**
 * Converts between the in-memory collections and the JSON snapshot.
 *
 * Absent optional fields are left undefined in documents so that
 * JSON.stringify omits them; nothing is ever written as null.
 */
export class PetLogSnapshotMapper {
    /**
     * Build a detached copy of the state; later mutations of the entities
     * do not affect the returned document.
     */
    static toDocument(state: Readonly<PetLogState>): PetLogSnapshotDocument {
        return {
            pets: state.pets.map(pet => ({
                id: pet.id,
                displayName: pet.displayName,
                notes: pet.notes,
                createdAt: pet.createdAt.toISOString(),
                updatedAt: pet.updatedAt?.toISOString(),
                archivedAt: pet.archivedAt?.toISOString(),
            })),
            activities: state.activities.map(activity => ({
                id: activity.id,
                petId: activity.petId,
                displayName: activity.displayName,
                notes: activity.notes,
                occurredAt: activity.occurredAt.toISOString(),
                recurrence: PetLogSnapshotMapper.recurrenceToDocument(activity.recurrence),
                createdAt: activity.createdAt.toISOString(),
                updatedAt: activity.updatedAt?.toISOString(),
            })),
            reminders: state.reminders.map(reminder => ({
                id: reminder.id,
                petId: reminder.petId,
                displayName: reminder.displayName,
                notes: reminder.notes,
                remindAt: reminder.remindAt?.toISOString(),
                recurrence: PetLogSnapshotMapper.recurrenceToDocument(reminder.recurrence),
                createdAt: reminder.createdAt.toISOString(),
                updatedAt: reminder.updatedAt?.toISOString(),
            })),
        };
    }

    /**
     * Pretty-printed file contents for a state.
     */
    static serialize(state: Readonly<PetLogState>): string {
        return `${JSON.stringify(PetLogSnapshotMapper.toDocument(state), null, 2)}\n`;
    }

    /**
     * Parse file contents. Returns null for a document that is JSON null.
     *
     * @throws PetLogError PARSE_ERROR for malformed JSON, a document that fails
     * the snapshot schema, an unreadable timestamp or a duplicated id.
     */
    static parse(contents: string): PetLogState | null {
        let raw: unknown;
        try {
            raw = JSON.parse(contents);
        } catch (error) {
            const reason = error instanceof Error ? error.message : String(error);
            throw PetLogError.parse(`Pet log data is not valid JSON: ${reason}`, undefined, error);
        }

        if (raw === null) {
            return null;
        }

        validateOrThrow(raw, PetLogSnapshotSchema, {}, 'PARSE_ERROR');
        return PetLogSnapshotMapper.toDomain(raw);
    }

    static toDomain(raw: unknown): PetLogState {
        const document = asRecord(raw, '$root');

        const pets = readArray(document, 'pets').map((item, index) => {
            const field = `pets[${index}]`;
            const source = asRecord(item, field);
            const pet: IPet = {
                id: readString(source, 'id', field),
                displayName: readOptionalString(source, 'displayName', field) ?? '',
                notes: readOptionalString(source, 'notes', field),
                createdAt: readDate(source, 'createdAt', field),
                updatedAt: readOptionalDate(source, 'updatedAt', field),
                archivedAt: readOptionalDate(source, 'archivedAt', field),
            };
            return pet;
        });

        const activities = readArray(document, 'activities').map((item, index) => {
            const field = `activities[${index}]`;
            const source = asRecord(item, field);
            const activity: IPetActivity = {
                id: readString(source, 'id', field),
                petId: readString(source, 'petId', field),
                displayName: readOptionalString(source, 'displayName', field) ?? '',
                notes: readOptionalString(source, 'notes', field),
                occurredAt: readDate(source, 'occurredAt', field),
                recurrence: readRecurrence(source, field),
                createdAt: readDate(source, 'createdAt', field),
                updatedAt: readOptionalDate(source, 'updatedAt', field),
            };
            return activity;
        });

        const reminders = readArray(document, 'reminders').map((item, index) => {
            const field = `reminders[${index}]`;
            const source = asRecord(item, field);
            const reminder: IPetReminder = {
                id: readString(source, 'id', field),
                petId: readString(source, 'petId', field),
                displayName: readOptionalString(source, 'displayName', field) ?? '',
                notes: readOptionalString(source, 'notes', field),
                remindAt: readOptionalDate(source, 'remindAt', field),
                recurrence: readRecurrence(source, field),
                createdAt: readDate(source, 'createdAt', field),
                updatedAt: readOptionalDate(source, 'updatedAt', field),
            };
            return reminder;
        });

        assertUniqueIds('pets', pets);
        assertUniqueIds('activities', activities);
        assertUniqueIds('reminders', reminders);

        return { pets, activities, reminders };
    }

    private static recurrenceToDocument(recurrence: IRecurrenceInfo | undefined): RecurrenceDocument | undefined {
        if (!recurrence) {
            return undefined;
        }
        return {
            frequency: recurrence.frequency,
            interval: recurrence.interval,
            nextOccurrence: recurrence.nextOccurrence?.toISOString(),
            endDate: recurrence.endDate?.toISOString(),
        };
    }
}

function asRecord(value: unknown, field: string): Record<string, unknown> {
    if (!isRecord(value)) {
        throw PetLogError.parse(`${field} must be an object`, { field });
    }
    return value;
}

function readArray(source: Record<string, unknown>, key: string): unknown[] {
    const value = source[key];
    if (value === undefined || value === null) {
        return [];
    }
    if (!Array.isArray(value)) {
        throw PetLogError.parse(`${key} must be an array`, { field: key });
    }
    return value;
}

function readString(source: Record<string, unknown>, key: string, parent: string): string {
    const value = readOptionalString(source, key, parent);
    if (value === undefined) {
        throw PetLogError.parse(`${parent}.${key} is required`, { field: `${parent}.${key}` });
    }
    return value;
}

function readOptionalString(source: Record<string, unknown>, key: string, parent: string): string | undefined {
    const value = source[key];
    if (value === undefined || value === null) {
        return undefined;
    }
    if (typeof value !== 'string') {
        throw PetLogError.parse(`${parent}.${key} must be a string`, { field: `${parent}.${key}` });
    }
    return value;
}

function readDate(source: Record<string, unknown>, key: string, parent: string): Date {
    const value = readOptionalDate(source, key, parent);
    if (value === undefined) {
        throw PetLogError.parse(`${parent}.${key} is required`, { field: `${parent}.${key}` });
    }
    return value;
}

function readOptionalDate(source: Record<string, unknown>, key: string, parent: string): Date | undefined {
    const text = readOptionalString(source, key, parent);
    if (text === undefined) {
        return undefined;
    }
    const date = new Date(text);
    if (Number.isNaN(date.getTime())) {
        throw PetLogError.parse(`${parent}.${key} is not a valid timestamp`, { field: `${parent}.${key}`, value: text });
    }
    return date;
}

function readRecurrence(source: Record<string, unknown>, parent: string): IRecurrenceInfo | undefined {
    const value = source.recurrence;
    if (value === undefined || value === null) {
        return undefined;
    }

    const field = `${parent}.recurrence`;
    const recurrence = asRecord(value, field);
    const interval = recurrence.interval;

    return {
        frequency: readFrequency(recurrence.frequency, field),
        interval: typeof interval === 'number' ? clampInterval(interval) : 1,
        nextOccurrence: readOptionalDate(recurrence, 'nextOccurrence', field),
        endDate: readOptionalDate(recurrence, 'endDate', field),
    };
}

function readFrequency(value: unknown, parent: string): RecurrenceFrequency {
    if (isRecurrenceFrequency(value)) {
        return value;
    }
    if (typeof value === 'number' && Number.isInteger(value) && value >= 0 && value < RECURRENCE_FREQUENCIES.length) {
        return RECURRENCE_FREQUENCIES[value];
    }
    throw PetLogError.parse(`${parent}.frequency is not a known frequency`, { field: `${parent}.frequency`, value });
}

function assertUniqueIds(collection: string, entities: readonly { id: string }[]): void {
    const seen = new Set<string>();
    for (const entity of entities) {
        if (seen.has(entity.id)) {
            throw PetLogError.parse(`Duplicate id in ${collection}: ${entity.id}`, { collection, id: entity.id });
        }
        seen.add(entity.id);
    }
}
