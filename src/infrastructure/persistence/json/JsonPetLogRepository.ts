/**
 * JsonPetLogRepository - Pet log backed by a single JSON file.
 *
 * All three collections live in memory. Every mutation, and the bulk
 * load/save, runs inside one FIFO mutex and rewrites the whole snapshot
 * before the next caller is admitted. Lookups and the live views do not
 * take the lock.
 *
 * Cancellation is checked before the lock is taken, after it is acquired
 * and at file I/O boundaries. A mutation that was applied in memory is not
 * rolled back when persisting it is cancelled or fails; memory stays ahead
 * of disk until the next successful save().
 */

import { mkdir, readFile, rename, rm, writeFile } from 'fs/promises';
import { dirname } from 'path';
import type { IPetLogRepository } from '../../../application/ports/IPetLogRepository.js';
import type { IEventDispatcher } from '../../../application/ports/IEventDispatcher.js';
import type { IPet, PetDraft, PetUpdate } from '../../../domain/entities/Pet.js';
import type { IPetActivity, PetActivityDraft, PetActivityUpdate } from '../../../domain/entities/PetActivity.js';
import type { IPetReminder, PetReminderDraft, PetReminderUpdate } from '../../../domain/entities/PetReminder.js';
import { PetLogChanged } from '../../../domain/events/PetLogChanged.js';
import { copyDate, type IRecurrenceInfo, normalizeRecurrence } from '../../../domain/value-objects/RecurrenceInfo.js';
import { PetLogError, throwIfCancelled } from '../../../shared/errors/PetLogError.js';
import { isSystemError, normalizeError } from '../../../shared/errors/ErrorNormalizer.js';
import { IdGenerator } from '../../../shared/utils/IdGenerator.js';
import { AsyncMutex } from '../../concurrency/AsyncMutex.js';
import { type ILogger, NullLogger } from '../../observability/Logger.js';
import { PetLogSnapshotMapper } from '../mappers/PetLogSnapshotMapper.js';

export interface JsonPetLogRepositoryOptions {
    /** Absolute path of the snapshot file */
    filePath: string;
    /** Write to a temp file and rename it over the target (default: true) */
    atomicWrites?: boolean;
    logger?: ILogger;
    /** Receives a PetLogChanged event after every persisted change */
    eventDispatcher?: IEventDispatcher;
    clock?: () => Date;
    idGenerator?: () => string;
}

export class JsonPetLogRepository implements IPetLogRepository {
    private readonly petsById = new Map<string, IPet>();
    private readonly activitiesById = new Map<string, IPetActivity>();
    private readonly remindersById = new Map<string, IPetReminder>();
    private readonly mutex = new AsyncMutex();

    private readonly filePath: string;
    private readonly atomicWrites: boolean;
    private readonly logger: ILogger;
    private readonly eventDispatcher?: IEventDispatcher;
    private readonly clock: () => Date;
    private readonly idGenerator: () => string;

    constructor(options: JsonPetLogRepositoryOptions) {
        this.filePath = options.filePath;
        this.atomicWrites = options.atomicWrites ?? true;
        this.logger = (options.logger ?? new NullLogger()).child({ component: 'JsonPetLogRepository' });
        this.eventDispatcher = options.eventDispatcher;
        this.clock = options.clock ?? (() => new Date());
        this.idGenerator = options.idGenerator ?? IdGenerator.generate;
    }

    /**
     * Create a repository and load the existing snapshot.
     *
     * A failed initial load is logged and leaves the store empty, so a
     * corrupt file never prevents the application from starting.
     */
    static async open(options: JsonPetLogRepositoryOptions): Promise<JsonPetLogRepository> {
        const repository = new JsonPetLogRepository(options);
        try {
            await repository.load();
        } catch (error) {
            repository.logger.error('Failed to load pet log data', normalizeError(error), { path: options.filePath });
        }
        return repository;
    }

    get pets(): readonly IPet[] {
        return Array.from(this.petsById.values());
    }

    get activities(): readonly IPetActivity[] {
        return Array.from(this.activitiesById.values());
    }

    get reminders(): readonly IPetReminder[] {
        return Array.from(this.remindersById.values());
    }

    async load(signal?: AbortSignal): Promise<void> {
        const reloaded = await this.exclusive(signal, async () => {
            const contents = await this.readSnapshot(signal);
            if (contents === null) {
                this.logger.debug('No pet log file yet', { path: this.filePath });
                return false;
            }

            const state = PetLogSnapshotMapper.parse(contents);
            if (state === null) {
                return false;
            }

            replaceAll(this.petsById, state.pets);
            replaceAll(this.activitiesById, state.activities);
            replaceAll(this.remindersById, state.reminders);

            this.logger.info('Pet log loaded', {
                path: this.filePath,
                pets: state.pets.length,
                activities: state.activities.length,
                reminders: state.reminders.length,
            });
            return true;
        });

        if (reloaded) {
            await this.notify(new PetLogChanged('reloaded', 'snapshot', null));
        }
    }

    async save(signal?: AbortSignal): Promise<void> {
        await this.exclusive(signal, () => this.persist(signal));
    }

    // ---- Pets ----

    async createPet(draft: PetDraft, signal?: AbortSignal): Promise<IPet> {
        const pet = await this.exclusive(signal, async () => {
            assertValidDates('Pet', { archivedAt: draft.archivedAt });
            const id = this.resolveId(draft.id, this.petsById, 'Pet');
            const created: IPet = {
                id,
                displayName: draft.displayName,
                notes: draft.notes,
                createdAt: this.timestamp(),
                updatedAt: this.timestamp(),
                archivedAt: copyDate(draft.archivedAt),
            };

            this.petsById.set(id, created);
            await this.persist(signal);
            return created;
        });

        await this.notify(new PetLogChanged('created', 'pet', pet.id));
        return pet;
    }

    async getPet(id: string, signal?: AbortSignal): Promise<IPet | null> {
        throwIfCancelled(signal);
        return this.petsById.get(id) ?? null;
    }

    async updatePet(update: PetUpdate, signal?: AbortSignal): Promise<IPet> {
        const pet = await this.exclusive(signal, async () => {
            const existing = this.petsById.get(update.id);
            if (!existing) {
                throw PetLogError.notFound('Pet', update.id);
            }
            assertValidDates('Pet', { archivedAt: update.archivedAt });

            existing.displayName = update.displayName;
            existing.notes = update.notes;
            existing.archivedAt = copyDate(update.archivedAt);
            existing.updatedAt = this.timestamp();

            await this.persist(signal);
            return existing;
        });

        await this.notify(new PetLogChanged('updated', 'pet', pet.id));
        return pet;
    }

    /**
     * Delete a pet together with its activities and reminders.
     * Returns false when no such pet exists.
     */
    async deletePet(id: string, signal?: AbortSignal): Promise<boolean> {
        const cascaded = await this.exclusive(signal, async () => {
            if (!this.petsById.has(id)) {
                return null;
            }

            const activityIds = removeWhere(this.activitiesById, activity => activity.petId === id);
            const reminderIds = removeWhere(this.remindersById, reminder => reminder.petId === id);
            this.petsById.delete(id);

            await this.persist(signal);
            return { activityIds, reminderIds };
        });

        if (!cascaded) {
            return false;
        }

        await this.notify(new PetLogChanged('deleted', 'pet', id, cascaded));
        return true;
    }

    // ---- Activities ----

    async createActivity(draft: PetActivityDraft, signal?: AbortSignal): Promise<IPetActivity> {
        const activity = await this.exclusive(signal, async () => {
            assertValidDates('Activity', { occurredAt: draft.occurredAt, ...recurrenceDates(draft.recurrence) });
            this.assertPetExists(draft.petId);
            const id = this.resolveId(draft.id, this.activitiesById, 'Activity');
            const created: IPetActivity = {
                id,
                petId: draft.petId,
                displayName: draft.displayName,
                notes: draft.notes,
                occurredAt: copyDate(draft.occurredAt) ?? this.timestamp(),
                recurrence: normalizeRecurrence(draft.recurrence),
                createdAt: this.timestamp(),
                updatedAt: this.timestamp(),
            };

            this.activitiesById.set(id, created);
            await this.persist(signal);
            return created;
        });

        await this.notify(new PetLogChanged('created', 'activity', activity.id));
        return activity;
    }

    async getActivity(id: string, signal?: AbortSignal): Promise<IPetActivity | null> {
        throwIfCancelled(signal);
        return this.activitiesById.get(id) ?? null;
    }

    async updateActivity(update: PetActivityUpdate, signal?: AbortSignal): Promise<IPetActivity> {
        const activity = await this.exclusive(signal, async () => {
            const existing = this.activitiesById.get(update.id);
            if (!existing) {
                throw PetLogError.notFound('Activity', update.id);
            }
            assertValidDates('Activity', { occurredAt: update.occurredAt, ...recurrenceDates(update.recurrence) });
            this.assertPetExists(update.petId);

            existing.petId = update.petId;
            existing.displayName = update.displayName;
            existing.notes = update.notes;
            existing.occurredAt = new Date(update.occurredAt.getTime());
            existing.recurrence = normalizeRecurrence(update.recurrence);
            existing.updatedAt = this.timestamp();

            await this.persist(signal);
            return existing;
        });

        await this.notify(new PetLogChanged('updated', 'activity', activity.id));
        return activity;
    }

    async deleteActivity(id: string, signal?: AbortSignal): Promise<boolean> {
        const removed = await this.exclusive(signal, async () => {
            if (!this.activitiesById.delete(id)) {
                return false;
            }
            await this.persist(signal);
            return true;
        });

        if (removed) {
            await this.notify(new PetLogChanged('deleted', 'activity', id));
        }
        return removed;
    }

    // ---- Reminders ----

    async createReminder(draft: PetReminderDraft, signal?: AbortSignal): Promise<IPetReminder> {
        const reminder = await this.exclusive(signal, async () => {
            assertValidDates('Reminder', { remindAt: draft.remindAt, ...recurrenceDates(draft.recurrence) });
            this.assertPetExists(draft.petId);
            const id = this.resolveId(draft.id, this.remindersById, 'Reminder');
            const created: IPetReminder = {
                id,
                petId: draft.petId,
                displayName: draft.displayName,
                notes: draft.notes,
                remindAt: copyDate(draft.remindAt),
                recurrence: normalizeRecurrence(draft.recurrence),
                createdAt: this.timestamp(),
                updatedAt: this.timestamp(),
            };

            this.remindersById.set(id, created);
            await this.persist(signal);
            return created;
        });

        await this.notify(new PetLogChanged('created', 'reminder', reminder.id));
        return reminder;
    }

    async getReminder(id: string, signal?: AbortSignal): Promise<IPetReminder | null> {
        throwIfCancelled(signal);
        return this.remindersById.get(id) ?? null;
    }

    async updateReminder(update: PetReminderUpdate, signal?: AbortSignal): Promise<IPetReminder> {
        const reminder = await this.exclusive(signal, async () => {
            const existing = this.remindersById.get(update.id);
            if (!existing) {
                throw PetLogError.notFound('Reminder', update.id);
            }
            assertValidDates('Reminder', { remindAt: update.remindAt, ...recurrenceDates(update.recurrence) });
            this.assertPetExists(update.petId);

            existing.petId = update.petId;
            existing.displayName = update.displayName;
            existing.notes = update.notes;
            existing.remindAt = copyDate(update.remindAt);
            existing.recurrence = normalizeRecurrence(update.recurrence);
            existing.updatedAt = this.timestamp();

            await this.persist(signal);
            return existing;
        });

        await this.notify(new PetLogChanged('updated', 'reminder', reminder.id));
        return reminder;
    }

    async deleteReminder(id: string, signal?: AbortSignal): Promise<boolean> {
        const removed = await this.exclusive(signal, async () => {
            if (!this.remindersById.delete(id)) {
                return false;
            }
            await this.persist(signal);
            return true;
        });

        if (removed) {
            await this.notify(new PetLogChanged('deleted', 'reminder', id));
        }
        return removed;
    }

    // ---- Internals ----

    private exclusive<T>(signal: AbortSignal | undefined, task: () => Promise<T>): Promise<T> {
        return this.mutex.runExclusive(async () => {
            throwIfCancelled(signal);
            return task();
        }, signal);
    }

    /** A fresh Date per field so entities never share a timestamp instance */
    private timestamp(): Date {
        return new Date(this.clock().getTime());
    }

    private resolveId<T>(requested: string | undefined, collection: Map<string, T>, resource: string): string {
        if (!requested) {
            return this.idGenerator();
        }
        if (collection.has(requested)) {
            throw PetLogError.conflict(`${resource} with identifier ${requested} already exists.`, { id: requested });
        }
        return requested;
    }

    private assertPetExists(petId: string): void {
        if (!this.petsById.has(petId)) {
            throw PetLogError.notFound('Pet', petId);
        }
    }

    private async readSnapshot(signal: AbortSignal | undefined): Promise<string | null> {
        try {
            return await readFile(this.filePath, { encoding: 'utf8', signal });
        } catch (error) {
            if (isSystemError(error) && error.code === 'ENOENT') {
                return null;
            }
            throw normalizeError(error);
        }
    }

    /**
     * Write the full snapshot. Must be called while holding the lock.
     */
    private async persist(signal: AbortSignal | undefined): Promise<void> {
        const startedAt = Date.now();
        let contents: string;
        try {
            contents = PetLogSnapshotMapper.serialize({
                pets: this.pets,
                activities: this.activities,
                reminders: this.reminders,
            });
            await this.writeSnapshot(contents, signal);
        } catch (error) {
            const failure = normalizeError(error);
            this.logger.warn('Pet log snapshot was not written; in-memory state is ahead of disk', {
                path: this.filePath,
                code: failure.code,
            });
            throw failure;
        }

        this.logger.debug('Pet log snapshot written', {
            path: this.filePath,
            bytes: Buffer.byteLength(contents),
            durationMs: Date.now() - startedAt,
        });
    }

    private async writeSnapshot(contents: string, signal: AbortSignal | undefined): Promise<void> {
        await mkdir(dirname(this.filePath), { recursive: true });
        throwIfCancelled(signal);

        if (!this.atomicWrites) {
            await writeFile(this.filePath, contents, { encoding: 'utf8', signal });
            return;
        }

        const tempPath = `${this.filePath}.${process.pid}.tmp`;
        try {
            await writeFile(tempPath, contents, { encoding: 'utf8', signal });
            throwIfCancelled(signal);
            await rename(tempPath, this.filePath);
        } catch (error) {
            await rm(tempPath, { force: true }).catch((cleanupError: unknown) => {
                this.logger.warn('Could not remove temporary snapshot file', {
                    path: tempPath,
                    reason: normalizeError(cleanupError).message,
                });
            });
            throw error;
        }
    }

    /**
     * Publish a change. A failing handler is logged; the change itself is
     * already durable and is not reported as failed.
     */
    private async notify(event: PetLogChanged): Promise<void> {
        if (!this.eventDispatcher) {
            return;
        }
        try {
            await this.eventDispatcher.dispatch(event);
        } catch (error) {
            this.logger.error('PetLogChanged handler failed', normalizeError(error), {
                change: event.change,
                entityType: event.entityType,
                entityId: event.entityId ?? undefined,
            });
        }
    }
}

/**
 * Reject Invalid Date values before anything is stored; one would
 * otherwise fail every later snapshot write.
 */
function assertValidDates(resource: string, dates: Record<string, Date | undefined>): void {
    for (const [field, value] of Object.entries(dates)) {
        if (value !== undefined && Number.isNaN(value.getTime())) {
            throw PetLogError.validation(`${resource} ${field} is not a valid date.`, { field });
        }
    }
}

function recurrenceDates(recurrence: IRecurrenceInfo | undefined): Record<string, Date | undefined> {
    return {
        'recurrence.nextOccurrence': recurrence?.nextOccurrence,
        'recurrence.endDate': recurrence?.endDate,
    };
}

function replaceAll<T extends { id: string }>(target: Map<string, T>, items: readonly T[]): void {
    target.clear();
    for (const item of items) {
        target.set(item.id, item);
    }
}

function removeWhere<T extends { id: string }>(target: Map<string, T>, predicate: (item: T) => boolean): string[] {
    const removed: string[] = [];
    for (const [id, item] of target) {
        if (predicate(item)) {
            removed.push(id);
        }
    }
    for (const id of removed) {
        target.delete(id);
    }
    return removed;
}
