import type { IPet, PetDraft, PetUpdate } from '../../domain/entities/Pet.js';
import type { IPetActivity, PetActivityDraft, PetActivityUpdate } from '../../domain/entities/PetActivity.js';
import type { IPetReminder, PetReminderDraft, PetReminderUpdate } from '../../domain/entities/PetReminder.js';

/**
 * Store for pets and their activities and reminders.
 *
 * Mutations and the bulk load/save are serialized; lookups and the live
 * views never wait for an in-flight mutation. Every operation accepts an
 * optional AbortSignal.
 */
export interface IPetLogRepository {
    /** Live views in insertion order. */
    readonly pets: readonly IPet[];
    readonly activities: readonly IPetActivity[];
    readonly reminders: readonly IPetReminder[];

    load(signal?: AbortSignal): Promise<void>;
    save(signal?: AbortSignal): Promise<void>;

    createPet(draft: PetDraft, signal?: AbortSignal): Promise<IPet>;
    getPet(id: string, signal?: AbortSignal): Promise<IPet | null>;
    updatePet(update: PetUpdate, signal?: AbortSignal): Promise<IPet>;
    deletePet(id: string, signal?: AbortSignal): Promise<boolean>;

    createActivity(draft: PetActivityDraft, signal?: AbortSignal): Promise<IPetActivity>;
    getActivity(id: string, signal?: AbortSignal): Promise<IPetActivity | null>;
    updateActivity(update: PetActivityUpdate, signal?: AbortSignal): Promise<IPetActivity>;
    deleteActivity(id: string, signal?: AbortSignal): Promise<boolean>;

    createReminder(draft: PetReminderDraft, signal?: AbortSignal): Promise<IPetReminder>;
    getReminder(id: string, signal?: AbortSignal): Promise<IPetReminder | null>;
    updateReminder(update: PetReminderUpdate, signal?: AbortSignal): Promise<IPetReminder>;
    deleteReminder(id: string, signal?: AbortSignal): Promise<boolean>;
}
