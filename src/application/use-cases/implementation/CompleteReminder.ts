import type { IPetLogRepository } from '../../ports/IPetLogRepository.js';
import type { IPetReminder } from '../../../domain/entities/PetReminder.js';
import { nextOccurrenceAfter } from '../../../domain/value-objects/RecurrenceInfo.js';
import { PetLogError } from '../../../shared/errors/PetLogError.js';

/**
 * Mark a reminder done. A recurring reminder moves to its next occurrence;
 * any other reminder, or one whose schedule has ended, is deleted.
 * Returns the rescheduled reminder, or null when it was deleted.
 */
export class CompleteReminder {
    constructor(
        private petLogRepository: IPetLogRepository,
        private clock: () => Date = () => new Date()
    ) { }

    async execute(id: string, signal?: AbortSignal): Promise<IPetReminder | null> {
        const reminder = await this.petLogRepository.getReminder(id, signal);
        if (!reminder) {
            throw PetLogError.notFound('Reminder', id);
        }

        const recurrence = reminder.recurrence;
        const next = recurrence
            ? nextOccurrenceAfter(recurrence, reminder.remindAt ?? this.clock())
            : undefined;

        if (!recurrence || !next) {
            await this.petLogRepository.deleteReminder(id, signal);
            return null;
        }

        return this.petLogRepository.updateReminder({
            id: reminder.id,
            petId: reminder.petId,
            displayName: reminder.displayName,
            notes: reminder.notes,
            remindAt: next,
            recurrence: { ...recurrence, nextOccurrence: next },
        }, signal);
    }
}
