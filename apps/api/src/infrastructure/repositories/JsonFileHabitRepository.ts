import { mkdir, readFile, rename, writeFile } from 'fs/promises';
import path from 'path';
import { habitStoreSchema, type HabitStore } from '@habit-streaks/types';
import { Habit } from '../../domain/entities/Habit';
import { HabitRepository } from '../../domain/entities/HabitRepository';
import { DuplicateHabitError, StorageFailureError } from '../../domain/errors/HabitErrors';
import { sortByCreation } from '../../domain/services/HabitAnalytics';
import logger from '../logger';
import { guardStorage, restoreHabit } from './storageGuard';

/**
 * Keeps every habit in one JSON document: `{ "habits": [record, ...] }`.
 *
 * Operations are queued so each read-modify-write finishes before the next
 * one reads the file. Writes land in a temporary file renamed over the store.
 */
export class JsonFileHabitRepository extends HabitRepository {
    private queue: Promise<unknown> = Promise.resolve();

    constructor(private readonly filePath: string) {
        super();
    }

    async create(habit: Habit): Promise<void> {
        await this.exclusive('create habit', async () => {
            const store = await this.load();
            if (store.habits.some(record => record.id === habit.id)) {
                throw new DuplicateHabitError(habit.id);
            }
            store.habits.push(habit.toRecord());
            await this.save(store);
        });
    }

    async findById(id: string): Promise<Habit | null> {
        return this.exclusive('load habit', async () => {
            const store = await this.load();
            const record = store.habits.find(candidate => candidate.id === id);
            return record ? this.toHabit(record) : null;
        });
    }

    async findAll(): Promise<Habit[]> {
        return this.exclusive('load habits', async () => {
            const store = await this.load();
            return sortByCreation(store.habits.map(record => this.toHabit(record)));
        });
    }

    async update(habit: Habit): Promise<boolean> {
        return this.exclusive('update habit', async () => {
            const store = await this.load();
            const index = store.habits.findIndex(record => record.id === habit.id);
            if (index === -1) return false;

            store.habits[index] = habit.toRecord();
            await this.save(store);
            return true;
        });
    }

    async delete(id: string): Promise<boolean> {
        return this.exclusive('delete habit', async () => {
            const store = await this.load();
            const remaining = store.habits.filter(record => record.id !== id);
            if (remaining.length === store.habits.length) return false;

            await this.save({ habits: remaining });
            return true;
        });
    }

    async addCheckOff(id: string, timestamp: Date): Promise<boolean> {
        return this.exclusive('add check-off', async () => {
            const store = await this.load();
            const index = store.habits.findIndex(record => record.id === id);
            if (index === -1) return false;

            const habit = this.toHabit(store.habits[index]);
            if (!habit.addCheckOff(timestamp)) return false;

            store.habits[index] = habit.toRecord();
            await this.save(store);
            return true;
        });
    }

    async count(): Promise<number> {
        return this.exclusive('count habits', async () => (await this.load()).habits.length);
    }

    private exclusive<T>(operation: string, work: () => Promise<T>): Promise<T> {
        const run = this.queue.then(() => guardStorage(operation, work));
        // The caller receives the rejection through `run`; the queue only needs to settle.
        this.queue = run.then(() => undefined, () => undefined);
        return run;
    }

    private async load(): Promise<HabitStore> {
        let content: string;
        try {
            content = await readFile(this.filePath, 'utf-8');
        } catch (error) {
            if (isMissingFile(error)) return { habits: [] };
            throw error;
        }

        if (content.trim().length === 0) return { habits: [] };

        let raw: unknown;
        try {
            raw = JSON.parse(content);
        } catch (error) {
            throw new StorageFailureError(`Habit store ${this.filePath} is not valid JSON`, error);
        }

        const parsed = habitStoreSchema.safeParse(raw);
        if (!parsed.success) {
            throw new StorageFailureError(`Habit store ${this.filePath} has an unexpected shape`, parsed.error);
        }
        return parsed.data;
    }

    private async save(store: HabitStore): Promise<void> {
        await mkdir(path.dirname(this.filePath), { recursive: true });
        const tempPath = `${this.filePath}.tmp`;
        await writeFile(tempPath, `${JSON.stringify(store, null, 2)}\n`, 'utf-8');
        await rename(tempPath, this.filePath);
    }

    private toHabit(record: HabitStore['habits'][number]): Habit {
        const habit = restoreHabit(record.id, () => Habit.fromRecord(record));
        if (habit.checkOffCount !== record.check_offs.length) {
            logger.warn('Dropped check-offs sharing a period while loading habit', {
                habitId: record.id,
                stored: record.check_offs.length,
                kept: habit.checkOffCount,
            });
        }
        return habit;
    }
}

function isMissingFile(error: unknown): boolean {
    return error instanceof Error && 'code' in error && error.code === 'ENOENT';
}
