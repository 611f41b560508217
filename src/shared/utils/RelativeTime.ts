/**
 * RelativeTime - Human-readable distances between timestamps.
 */

import type { IPetReminder } from '../../domain/entities/PetReminder.js';

const MINUTE_MS = 60 * 1000;
const HOUR_MS = 60 * MINUTE_MS;
const DAY_MS = 24 * HOUR_MS;

export type ReminderTemplate = 'upcoming' | 'overdue';

/**
 * "moments", "1 minute", "5 hours", "2 days".
 */
export function formatDuration(spanMs: number): string {
    if (spanMs < MINUTE_MS) {
        return 'moments';
    }
    if (spanMs < HOUR_MS) {
        return plural(wholeUnits(spanMs, MINUTE_MS), 'minute');
    }
    if (spanMs < DAY_MS) {
        return plural(wholeUnits(spanMs, HOUR_MS), 'hour');
    }
    return plural(wholeUnits(spanMs, DAY_MS), 'day');
}

export function formatRelativePast(timestamp: Date, now: Date): string {
    const spanMs = now.getTime() - timestamp.getTime();
    if (spanMs < MINUTE_MS) {
        return 'just now';
    }
    return `${formatDuration(spanMs)} ago`;
}

export function formatRelativeFuture(timestamp: Date, now: Date): string {
    const spanMs = timestamp.getTime() - now.getTime();
    if (spanMs < MINUTE_MS) {
        return 'momentarily';
    }
    if (spanMs >= DAY_MS && wholeUnits(spanMs, DAY_MS) === 1) {
        return 'tomorrow';
    }
    return `in ${formatDuration(spanMs)}`;
}

/**
 * Status line for a reminder: untimed, due, overdue or still ahead.
 */
export function describeReminderStatus(reminder: Pick<IPetReminder, 'remindAt'>, now: Date): string {
    if (!reminder.remindAt) {
        return 'Ready when you are';
    }

    const spanMs = now.getTime() - reminder.remindAt.getTime();
    if (spanMs >= 0) {
        return spanMs < MINUTE_MS ? 'Due now' : `Overdue by ${formatDuration(spanMs)}`;
    }

    return -spanMs < MINUTE_MS ? 'Due now' : `Due in ${formatDuration(-spanMs)}`;
}

export function reminderTemplate(reminder: Pick<IPetReminder, 'remindAt'>, now: Date): ReminderTemplate {
    if (reminder.remindAt && reminder.remindAt.getTime() <= now.getTime()) {
        return 'overdue';
    }
    return 'upcoming';
}

export function isSameLocalDay(a: Date, b: Date): boolean {
    return a.getFullYear() === b.getFullYear() &&
        a.getMonth() === b.getMonth() &&
        a.getDate() === b.getDate();
}

function wholeUnits(spanMs: number, unitMs: number): number {
    return Math.max(1, Math.round(spanMs / unitMs));
}

function plural(count: number, unit: string): string {
    return count === 1 ? `1 ${unit}` : `${count} ${unit}s`;
}
