/**
 * DashboardReadModel - Home screen summary of pets, activities and reminders.
 */

import type { ActivityKind } from '../../domain/services/ActivityClassifier.js';
import type { ReminderTemplate } from '../../shared/utils/RelativeTime.js';

export interface RecentActivityReadModel {
    id: string;
    petId: string;
    petName: string;
    displayName: string;
    notes?: string;
    occurredAt: string;
    kind: ActivityKind;
    icon: string;
}

export interface UpcomingReminderReadModel {
    id: string;
    petId: string;
    petName: string;
    displayName: string;
    notes?: string;
    remindAt?: string;
    status: string;
    template: ReminderTemplate;
}

export interface DashboardReadModel {
    totalPets: number;
    activitiesLoggedToday: number;
    pendingReminders: number;
    lastFeedingSummary: string;
    nextWalkSummary: string;
    recentActivities: RecentActivityReadModel[];
    upcomingReminders: UpcomingReminderReadModel[];
}

export interface PetListItemReadModel {
    id: string;
    displayName: string;
    notes?: string;
    createdAt: string;
    archived: boolean;
}
