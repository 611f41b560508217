import type { IPetLogRepository } from '../../ports/IPetLogRepository.js';
import type { IPet } from '../../../domain/entities/Pet.js';
import { PetLogError } from '../../../shared/errors/PetLogError.js';

/**
 * Quick-log actions attach to the first pet that was added.
 */
export function requireFirstPet(repository: IPetLogRepository, missingMessage: string): IPet {
    const pet = repository.pets[0];
    if (!pet) {
        throw PetLogError.validation(missingMessage);
    }
    return pet;
}
