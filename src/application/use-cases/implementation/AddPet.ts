import type { IPetLogRepository } from '../../ports/IPetLogRepository.js';
import type { IPet } from '../../../domain/entities/Pet.js';
import { ValidationError } from '../../../shared/validation/ValidationError.js';
import { normalizeNotes } from './normalizeNotes.js';

export interface AddPetRequest {
    displayName: string;
    notes?: string;
}

export class AddPet {
    constructor(private petLogRepository: IPetLogRepository) { }

    async execute(request: AddPetRequest, signal?: AbortSignal): Promise<IPet> {
        const displayName = request.displayName.trim();
        if (displayName.length === 0) {
            throw ValidationError.missingFields(['displayName']);
        }

        return this.petLogRepository.createPet({
            displayName,
            notes: normalizeNotes(request.notes),
        }, signal);
    }
}
