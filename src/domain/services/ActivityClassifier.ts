import type { IPetActivity } from '../entities/PetActivity.js';
import type { IPetReminder } from '../entities/PetReminder.js';

export const ACTIVITY_KINDS = ['feeding', 'walk', 'medication', 'other'] as const;
export type ActivityKind = (typeof ACTIVITY_KINDS)[number];

const ACTIVITY_ICONS: Record<ActivityKind, string> = {
    feeding: '🍽️',
    walk: '🚶',
    medication: '💊',
    other: '🐾',
};

/**
 * Infer what kind of care an activity was from its name, or its notes when
 * the name is blank.
 */
export function classifyActivity(activity: Pick<IPetActivity, 'displayName' | 'notes'>): ActivityKind {
    let text = activity.displayName.trim();
    if (text.length === 0 && activity.notes && activity.notes.trim().length > 0) {
        text = activity.notes;
    }

    if (containsKeyword(text, 'feed')) {
        return 'feeding';
    }
    if (containsKeyword(text, 'walk') || containsKeyword(text, 'stroll')) {
        return 'walk';
    }
    if (containsKeyword(text, 'med')) {
        return 'medication';
    }
    return 'other';
}

export function activityIcon(kind: ActivityKind): string {
    return ACTIVITY_ICONS[kind];
}

export function isFeedingActivity(activity: Pick<IPetActivity, 'displayName' | 'notes'>): boolean {
    return containsKeyword(activity.displayName, 'feed') ||
        (activity.notes !== undefined && containsKeyword(activity.notes, 'feed'));
}

export function isWalkReminder(reminder: Pick<IPetReminder, 'displayName' | 'notes'>): boolean {
    return containsKeyword(reminder.displayName, 'walk') ||
        (reminder.notes !== undefined && containsKeyword(reminder.notes, 'walk'));
}

function containsKeyword(text: string, keyword: string): boolean {
    return text.toLowerCase().includes(keyword);
}
