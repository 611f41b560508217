import type { IRecurrenceInfo } from '../value-objects/RecurrenceInfo.js';

export interface IPetReminder {
    id: string;
    petId: string;
    displayName: string;
    notes?: string;
    remindAt?: Date; // Absent means "ready any time"
    recurrence?: IRecurrenceInfo;
    createdAt: Date;
    updatedAt?: Date;
}

export interface PetReminderDraft {
    id?: string;
    petId: string;
    displayName: string;
    notes?: string;
    remindAt?: Date;
    recurrence?: IRecurrenceInfo;
}

export type PetReminderUpdate = Pick<
    IPetReminder,
    'id' | 'petId' | 'displayName' | 'notes' | 'remindAt' | 'recurrence'
>;
