import type { IPetLogRepository } from '../../ports/IPetLogRepository.js';
import type { IPetActivity } from '../../../domain/entities/PetActivity.js';
import { requireFirstPet } from './requireFirstPet.js';

export class LogFeeding {
    constructor(
        private petLogRepository: IPetLogRepository,
        private clock: () => Date = () => new Date()
    ) { }

    async execute(signal?: AbortSignal): Promise<IPetActivity> {
        const pet = requireFirstPet(this.petLogRepository, 'Add a pet before logging activities.');

        return this.petLogRepository.createActivity({
            petId: pet.id,
            displayName: `Feeding for ${pet.displayName}`,
            notes: 'Auto-logged feeding',
            occurredAt: this.clock(),
        }, signal);
    }
}
