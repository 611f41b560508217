/**
 * RecurrenceInfo - Optional repeat schedule attached to activities and reminders.
 */

/**
 * Supported frequencies. The position of each entry is its legacy numeric code.
 */
export const RECURRENCE_FREQUENCIES = ['none', 'daily', 'weekly', 'monthly', 'yearly'] as const;
export type RecurrenceFrequency = (typeof RECURRENCE_FREQUENCIES)[number];

export interface IRecurrenceInfo {
    frequency: RecurrenceFrequency;
    interval: number; // Always >= 1 once stored
    nextOccurrence?: Date;
    endDate?: Date;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export function isRecurrenceFrequency(value: unknown): value is RecurrenceFrequency {
    return typeof value === 'string' && RECURRENCE_FREQUENCIES.some(f => f === value);
}

/**
 * Clamp an interval to a positive integer.
 */
export function clampInterval(interval: number): number {
    if (!Number.isFinite(interval) || interval < 1) {
        return 1;
    }
    return Math.trunc(interval);
}

/**
 * Copy a recurrence descriptor with its interval clamped.
 */
export function normalizeRecurrence(recurrence: IRecurrenceInfo | undefined): IRecurrenceInfo | undefined {
    if (!recurrence) {
        return undefined;
    }

    return {
        frequency: recurrence.frequency,
        interval: clampInterval(recurrence.interval),
        nextOccurrence: copyDate(recurrence.nextOccurrence),
        endDate: copyDate(recurrence.endDate),
    };
}

/**
 * Compute the occurrence that follows `from`.
 *
 * Calendar arithmetic is done in UTC. Monthly and yearly steps land on the
 * last day of the month when the source day does not exist there.
 * Returns undefined for non-repeating schedules and once `endDate` is passed.
 */
export function nextOccurrenceAfter(recurrence: IRecurrenceInfo, from: Date): Date | undefined {
    if (recurrence.frequency === 'none') {
        return undefined;
    }

    const next = advance(from, recurrence.frequency, clampInterval(recurrence.interval));

    if (recurrence.endDate && next.getTime() > recurrence.endDate.getTime()) {
        return undefined;
    }

    return next;
}

export function copyDate(date: Date | undefined): Date | undefined {
    return date ? new Date(date.getTime()) : undefined;
}

function advance(from: Date, frequency: Exclude<RecurrenceFrequency, 'none'>, interval: number): Date {
    switch (frequency) {
        case 'daily':
            return new Date(from.getTime() + interval * DAY_MS);
        case 'weekly':
            return new Date(from.getTime() + interval * 7 * DAY_MS);
        case 'monthly':
            return addUtcMonths(from, interval);
        case 'yearly':
            return addUtcMonths(from, interval * 12);
    }
}

function addUtcMonths(from: Date, months: number): Date {
    const total = from.getUTCFullYear() * 12 + from.getUTCMonth() + months;
    const year = Math.floor(total / 12);
    const month = total % 12;
    const lastDay = new Date(Date.UTC(year, month + 1, 0)).getUTCDate();

    return new Date(Date.UTC(
        year,
        month,
        Math.min(from.getUTCDate(), lastDay),
        from.getUTCHours(),
        from.getUTCMinutes(),
        from.getUTCSeconds(),
        from.getUTCMilliseconds()
    ));
}
