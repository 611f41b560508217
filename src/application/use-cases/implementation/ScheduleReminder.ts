import type { IPetLogRepository } from '../../ports/IPetLogRepository.js';
import type { IPetReminder } from '../../../domain/entities/PetReminder.js';
import type { IRecurrenceInfo } from '../../../domain/value-objects/RecurrenceInfo.js';
import { ValidationError } from '../../../shared/validation/ValidationError.js';
import { normalizeNotes } from './normalizeNotes.js';
import { requireFirstPet } from './requireFirstPet.js';

/**
 * How far ahead a reminder is scheduled when no time is given.
 */
export const DEFAULT_REMINDER_LEAD_MS = 60 * 60 * 1000;

export interface ScheduleReminderRequest {
    title: string;
    notes?: string;
    remindAt?: Date;
    recurrence?: IRecurrenceInfo;
}

export class ScheduleReminder {
    constructor(
        private petLogRepository: IPetLogRepository,
        private clock: () => Date = () => new Date()
    ) { }

    async execute(request: ScheduleReminderRequest, signal?: AbortSignal): Promise<IPetReminder> {
        const pet = requireFirstPet(this.petLogRepository, 'Add a pet before scheduling reminders.');

        const displayName = request.title.trim();
        if (displayName.length === 0) {
            throw ValidationError.missingFields(['title']);
        }

        return this.petLogRepository.createReminder({
            petId: pet.id,
            displayName,
            notes: normalizeNotes(request.notes),
            remindAt: request.remindAt ?? new Date(this.clock().getTime() + DEFAULT_REMINDER_LEAD_MS),
            recurrence: request.recurrence,
        }, signal);
    }
}
