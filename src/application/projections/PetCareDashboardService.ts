/**
 * PetCareDashboardService - Projection builder for the home and pet screens.
 *
 * Pure projection service with:
 * - No side effects
 * - No writes
 * - No domain mutation
 */

import type { IPetLogRepository } from '../ports/IPetLogRepository.js';
import type {
    DashboardReadModel,
    PetListItemReadModel,
    RecentActivityReadModel,
    UpcomingReminderReadModel,
} from '../read-models/DashboardReadModel.js';
import type { IPetActivity } from '../../domain/entities/PetActivity.js';
import type { IPetReminder } from '../../domain/entities/PetReminder.js';
import {
    activityIcon,
    classifyActivity,
    isFeedingActivity,
    isWalkReminder,
} from '../../domain/services/ActivityClassifier.js';
import {
    describeReminderStatus,
    formatRelativeFuture,
    formatRelativePast,
    isSameLocalDay,
    reminderTemplate,
} from '../../shared/utils/RelativeTime.js';

export const RECENT_ACTIVITY_LIMIT = 20;

const UNKNOWN_PET_NAME = 'your pet';

export class PetCareDashboardService {
    constructor(private readonly repository: IPetLogRepository) {}

    buildDashboard(now: Date = new Date()): DashboardReadModel {
        const activities = this.repository.activities;
        const reminders = sortByRemindAt(this.repository.reminders);

        return {
            totalPets: this.repository.pets.length,
            activitiesLoggedToday: activities.filter(a => isSameLocalDay(a.occurredAt, now)).length,
            pendingReminders: reminders.filter(r => !r.remindAt || r.remindAt.getTime() >= now.getTime()).length,
            lastFeedingSummary: this.buildLastFeedingSummary(activities, now),
            nextWalkSummary: this.buildNextWalkSummary(reminders, now),
            recentActivities: sortByOccurredAtDesc(activities)
                .slice(0, RECENT_ACTIVITY_LIMIT)
                .map(activity => this.toRecentActivity(activity)),
            upcomingReminders: reminders.map(reminder => this.toUpcomingReminder(reminder, now)),
        };
    }

    /**
     * Pets ordered by name (case-insensitive), then by creation time.
     */
    buildPetList(): PetListItemReadModel[] {
        return [...this.repository.pets]
            .sort((a, b) =>
                a.displayName.localeCompare(b.displayName, undefined, { sensitivity: 'accent' }) ||
                a.createdAt.getTime() - b.createdAt.getTime()
            )
            .map(pet => ({
                id: pet.id,
                displayName: pet.displayName,
                notes: pet.notes,
                createdAt: pet.createdAt.toISOString(),
                archived: pet.archivedAt !== undefined,
            }));
    }

    private buildLastFeedingSummary(activities: readonly IPetActivity[], now: Date): string {
        const lastFeeding = sortByOccurredAtDesc(activities.filter(isFeedingActivity))[0];
        if (!lastFeeding) {
            return 'No feedings logged yet.';
        }

        const petName = this.petName(lastFeeding.petId);
        return `${petName} was fed ${formatRelativePast(lastFeeding.occurredAt, now)}.`;
    }

    private buildNextWalkSummary(sortedReminders: readonly IPetReminder[], now: Date): string {
        const nextWalk = sortedReminders.find(isWalkReminder);
        if (!nextWalk) {
            return 'No walks scheduled.';
        }

        const petName = this.petName(nextWalk.petId);
        if (!nextWalk.remindAt) {
            return `Walk ${petName} when you're ready.`;
        }

        return nextWalk.remindAt.getTime() <= now.getTime()
            ? `Next walk for ${petName} was due ${formatRelativePast(nextWalk.remindAt, now)}.`
            : `Next walk for ${petName} is scheduled ${formatRelativeFuture(nextWalk.remindAt, now)}.`;
    }

    private toRecentActivity(activity: IPetActivity): RecentActivityReadModel {
        const kind = classifyActivity(activity);
        return {
            id: activity.id,
            petId: activity.petId,
            petName: this.petName(activity.petId),
            displayName: activity.displayName,
            notes: activity.notes,
            occurredAt: activity.occurredAt.toISOString(),
            kind,
            icon: activityIcon(kind),
        };
    }

    private toUpcomingReminder(reminder: IPetReminder, now: Date): UpcomingReminderReadModel {
        return {
            id: reminder.id,
            petId: reminder.petId,
            petName: this.petName(reminder.petId),
            displayName: reminder.displayName,
            notes: reminder.notes,
            remindAt: reminder.remindAt?.toISOString(),
            status: describeReminderStatus(reminder, now),
            template: reminderTemplate(reminder, now),
        };
    }

    private petName(petId: string): string {
        return this.repository.pets.find(p => p.id === petId)?.displayName ?? UNKNOWN_PET_NAME;
    }
}

function sortByOccurredAtDesc(activities: readonly IPetActivity[]): IPetActivity[] {
    return [...activities].sort((a, b) => b.occurredAt.getTime() - a.occurredAt.getTime());
}

/**
 * Earliest first; reminders without a time go last.
 */
function sortByRemindAt(reminders: readonly IPetReminder[]): IPetReminder[] {
    const key = (r: IPetReminder) => r.remindAt?.getTime() ?? Number.POSITIVE_INFINITY;
    return [...reminders].sort((a, b) => {
        const diff = key(a) - key(b);
        return Number.isNaN(diff) ? 0 : diff;
    });
}
