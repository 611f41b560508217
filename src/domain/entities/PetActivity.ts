import type { IRecurrenceInfo } from '../value-objects/RecurrenceInfo.js';

export interface IPetActivity {
    id: string;
    petId: string; // Must reference a live pet
    displayName: string;
    notes?: string;
    occurredAt: Date;
    recurrence?: IRecurrenceInfo;
    createdAt: Date;
    updatedAt?: Date;
}

export interface PetActivityDraft {
    id?: string;
    petId: string;
    displayName: string;
    notes?: string;
    occurredAt?: Date; // Defaults to the time of creation
    recurrence?: IRecurrenceInfo;
}

export type PetActivityUpdate = Pick<
    IPetActivity,
    'id' | 'petId' | 'displayName' | 'notes' | 'occurredAt' | 'recurrence'
>;
