export interface IPet {
    id: string;
    displayName: string;
    notes?: string;
    createdAt: Date;
    updatedAt?: Date;
    archivedAt?: Date; // Soft delete; archived pets keep their history
}

/**
 * Input for creating a pet. An absent or empty id is replaced with a fresh one.
 */
export interface PetDraft {
    id?: string;
    displayName: string;
    notes?: string;
    archivedAt?: Date;
}

export type PetUpdate = Pick<IPet, 'id' | 'displayName' | 'notes' | 'archivedAt'>;
