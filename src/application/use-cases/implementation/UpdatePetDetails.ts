import type { IPetLogRepository } from '../../ports/IPetLogRepository.js';
import type { IPet } from '../../../domain/entities/Pet.js';
import { PetLogError } from '../../../shared/errors/PetLogError.js';
import { ValidationError } from '../../../shared/validation/ValidationError.js';
import { normalizeNotes } from './normalizeNotes.js';

export interface UpdatePetDetailsRequest {
    id: string;
    displayName: string;
    notes?: string;
}

export interface UpdatePetDetailsResult {
    pet: IPet;
    changed: boolean;
}

export class UpdatePetDetails {
    constructor(private petLogRepository: IPetLogRepository) { }

    async execute(request: UpdatePetDetailsRequest, signal?: AbortSignal): Promise<UpdatePetDetailsResult> {
        // 1. Check if pet exists
        const existing = await this.petLogRepository.getPet(request.id, signal);
        if (!existing) {
            throw PetLogError.notFound('Pet', request.id);
        }

        const displayName = request.displayName.trim();
        if (displayName.length === 0) {
            throw ValidationError.missingFields(['displayName']);
        }
        const notes = normalizeNotes(request.notes);

        // 2. Nothing to write when the details are unchanged
        if (displayName === existing.displayName && (notes ?? '') === (existing.notes ?? '')) {
            return { pet: existing, changed: false };
        }

        const pet = await this.petLogRepository.updatePet({
            id: existing.id,
            displayName,
            notes,
            archivedAt: existing.archivedAt,
        }, signal);

        return { pet, changed: true };
    }
}
