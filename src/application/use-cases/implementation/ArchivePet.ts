import type { IPetLogRepository } from '../../ports/IPetLogRepository.js';
import type { IPet } from '../../../domain/entities/Pet.js';
import { PetLogError } from '../../../shared/errors/PetLogError.js';

/**
 * Archive or restore a pet. Archiving keeps the pet and its history;
 * only deletion cascades.
 */
export class ArchivePet {
    constructor(
        private petLogRepository: IPetLogRepository,
        private clock: () => Date = () => new Date()
    ) { }

    async execute(id: string, archived = true, signal?: AbortSignal): Promise<IPet> {
        const existing = await this.petLogRepository.getPet(id, signal);
        if (!existing) {
            throw PetLogError.notFound('Pet', id);
        }

        return this.petLogRepository.updatePet({
            id: existing.id,
            displayName: existing.displayName,
            notes: existing.notes,
            archivedAt: archived ? this.clock() : undefined,
        }, signal);
    }
}
