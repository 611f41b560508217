import type { IEventHandler } from '../ports/IEventDispatcher.js';
import type { PetLogChanged } from '../../domain/events/PetLogChanged.js';
import type { ILogger } from '../../infrastructure/observability/Logger.js';

/**
 * Writes one debug line per persisted change to the pet log.
 */
export class PetLogChangeLogger implements IEventHandler<PetLogChanged> {
    private readonly logger: ILogger;

    constructor(logger: ILogger) {
        this.logger = logger.child({ component: 'PetLogChangeLogger' });
    }

    async handle(event: PetLogChanged): Promise<void> {
        this.logger.debug(`Pet log ${event.entityType} ${event.change}`, {
            entityType: event.entityType,
            entityId: event.entityId ?? undefined,
            cascadedActivities: event.cascaded.activityIds.length,
            cascadedReminders: event.cascaded.reminderIds.length,
            occurredAt: event.dateTimeOccurred.toISOString(),
        });
    }
}
