import type { IPetLogRepository } from '../../ports/IPetLogRepository.js';
import type { IPetActivity } from '../../../domain/entities/PetActivity.js';
import { ValidationError } from '../../../shared/validation/ValidationError.js';
import { requireFirstPet } from './requireFirstPet.js';

export class LogActivity {
    constructor(
        private petLogRepository: IPetLogRepository,
        private clock: () => Date = () => new Date()
    ) { }

    async execute(description: string, signal?: AbortSignal): Promise<IPetActivity> {
        const pet = requireFirstPet(this.petLogRepository, 'Add a pet before logging activities.');

        const displayName = description.trim();
        if (displayName.length === 0) {
            throw ValidationError.missingFields(['description']);
        }

        return this.petLogRepository.createActivity({
            petId: pet.id,
            displayName,
            occurredAt: this.clock(),
        }, signal);
    }
}
