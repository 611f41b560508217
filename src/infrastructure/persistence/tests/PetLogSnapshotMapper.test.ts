import { describe, it, expect } from 'vitest';
import { PetLogSnapshotMapper, type PetLogState } from '../mappers/PetLogSnapshotMapper.js';

function captureError(action: () => unknown): unknown {
    try {
        action();
    } catch (error) {
        return error;
    }
    return undefined;
}

const createdAt = new Date('2024-05-01T12:00:00.000Z');

function sampleState(): PetLogState {
    return {
        pets: [
            { id: 'p-1', displayName: 'Rex', createdAt, updatedAt: createdAt },
            {
                id: 'p-2',
                displayName: 'Bella',
                notes: 'Shy with strangers',
                createdAt,
                archivedAt: new Date('2024-05-03T09:00:00.000Z'),
            },
        ],
        activities: [
            {
                id: 'a-1',
                petId: 'p-1',
                displayName: 'Morning walk',
                occurredAt: new Date('2024-05-02T07:30:00.000Z'),
                recurrence: { frequency: 'daily', interval: 1 },
                createdAt,
            },
        ],
        reminders: [
            {
                id: 'r-1',
                petId: 'p-2',
                displayName: 'Flea treatment',
                remindAt: new Date('2024-06-01T09:00:00.000Z'),
                recurrence: {
                    frequency: 'monthly',
                    interval: 1,
                    nextOccurrence: new Date('2024-06-01T09:00:00.000Z'),
                    endDate: new Date('2024-12-31T00:00:00.000Z'),
                },
                createdAt,
            },
            { id: 'r-2', petId: 'p-1', displayName: 'Buy treats', createdAt },
        ],
    };
}

describe('PetLogSnapshotMapper', () => {
    describe('serialize', () => {
        it('should pretty-print with two spaces and end with a newline', () => {
            const text = PetLogSnapshotMapper.serialize({ pets: [], activities: [], reminders: [] });
            expect(text).toBe('{\n  "pets": [],\n  "activities": [],\n  "reminders": []\n}\n');
        });

        it('should omit absent optional fields instead of writing null', () => {
            const text = PetLogSnapshotMapper.serialize(sampleState());
            const document = JSON.parse(text);

            expect(text).not.toContain('null');
            expect(Object.keys(document.pets[0])).toEqual(['id', 'displayName', 'createdAt', 'updatedAt']);
            expect(Object.keys(document.reminders[1])).toEqual(['id', 'petId', 'displayName', 'createdAt']);
        });

        it('should write timestamps as ISO strings and frequencies by name', () => {
            const document = PetLogSnapshotMapper.toDocument(sampleState());

            expect(document.activities[0].occurredAt).toBe('2024-05-02T07:30:00.000Z');
            expect(document.reminders[0].recurrence).toEqual({
                frequency: 'monthly',
                interval: 1,
                nextOccurrence: '2024-06-01T09:00:00.000Z',
                endDate: '2024-12-31T00:00:00.000Z',
            });
        });
    });

    describe('parse', () => {
        it('should read back what it wrote', () => {
            const state = sampleState();
            expect(PetLogSnapshotMapper.parse(PetLogSnapshotMapper.serialize(state))).toEqual(state);
        });

        it('should return null for a JSON null document', () => {
            expect(PetLogSnapshotMapper.parse('null')).toBeNull();
        });

        it('should default missing collections to empty', () => {
            expect(PetLogSnapshotMapper.parse('{}')).toEqual({ pets: [], activities: [], reminders: [] });
        });

        it('should reject malformed JSON with PARSE_ERROR', () => {
            const error = captureError(() => PetLogSnapshotMapper.parse('{ "pets": ['));

            expect(error).toMatchObject({ code: 'PARSE_ERROR' });
            expect(error).toHaveProperty('message', expect.stringMatching(/^Pet log data is not valid JSON: /));
        });

        it('should reject a document that is not an object', () => {
            expect(captureError(() => PetLogSnapshotMapper.parse('[]'))).toMatchObject({
                code: 'PARSE_ERROR',
                message: 'Document must be an object',
            });
        });

        it('should reject timestamps that do not name a real instant', () => {
            const contents = JSON.stringify({
                pets: [{ id: 'p-1', displayName: 'Rex', createdAt: '2024-13-45T00:00:00Z' }],
            });

            expect(() => PetLogSnapshotMapper.parse(contents)).toThrow('pets[0].createdAt is not a valid timestamp');
        });

        it('should reject duplicated ids within a collection', () => {
            const contents = JSON.stringify({
                pets: [
                    { id: 'p-1', displayName: 'Rex', createdAt: '2024-05-01T12:00:00.000Z' },
                    { id: 'p-1', displayName: 'Rex again', createdAt: '2024-05-01T12:00:00.000Z' },
                ],
            });

            expect(() => PetLogSnapshotMapper.parse(contents)).toThrow('Duplicate id in pets: p-1');
        });

        it('should accept null optionals, numeric frequencies and out of range intervals', () => {
            const contents = JSON.stringify({
                pets: [{ id: 'p-1', displayName: 'Rex', notes: null, createdAt: '2024-05-01T12:00:00.000Z' }],
                activities: [],
                reminders: [{
                    id: 'r-1',
                    petId: 'p-1',
                    displayName: 'Walk',
                    remindAt: null,
                    recurrence: { frequency: 2, interval: 0 },
                    createdAt: '2024-05-01T12:00:00+02:00',
                }],
            });

            const state = PetLogSnapshotMapper.parse(contents);

            expect(state?.pets[0].notes).toBeUndefined();
            expect(state?.reminders[0].remindAt).toBeUndefined();
            expect(state?.reminders[0].recurrence).toEqual({ frequency: 'weekly', interval: 1 });
            expect(state?.reminders[0].createdAt.toISOString()).toBe('2024-05-01T10:00:00.000Z');
        });

        it('should keep entries that reference a missing pet', () => {
            const contents = JSON.stringify({
                activities: [{
                    id: 'a-1',
                    petId: 'gone',
                    displayName: 'Feeding',
                    occurredAt: '2024-05-01T12:00:00.000Z',
                    createdAt: '2024-05-01T12:00:00.000Z',
                }],
            });

            expect(PetLogSnapshotMapper.parse(contents)?.activities.map(a => a.petId)).toEqual(['gone']);
        });
    });
});
