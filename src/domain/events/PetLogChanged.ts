import type { IDomainEvent } from './IDomainEvent.js';

export type PetLogChangeKind = 'created' | 'updated' | 'deleted' | 'reloaded';
export type PetLogEntityType = 'pet' | 'activity' | 'reminder' | 'snapshot';

/**
 * Entities removed together with a deleted pet.
 */
export interface CascadedRemovals {
    activityIds: string[];
    reminderIds: string[];
}

/**
 * Raised after a mutation has been persisted, or after the snapshot was reloaded.
 */
export class PetLogChanged implements IDomainEvent {
    public dateTimeOccurred: Date;

    constructor(
        public readonly change: PetLogChangeKind,
        public readonly entityType: PetLogEntityType,
        public readonly entityId: string | null,
        public readonly cascaded: CascadedRemovals = { activityIds: [], reminderIds: [] }
    ) {
        this.dateTimeOccurred = new Date();
    }

    getAggregateId(): string {
        return this.entityId ?? 'snapshot';
    }
}
