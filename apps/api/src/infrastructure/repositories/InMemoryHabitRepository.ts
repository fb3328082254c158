import type { HabitRecord } from '@habit-streaks/types';
import { Habit } from '../../domain/entities/Habit';
import { HabitRepository } from '../../domain/entities/HabitRepository';
import { DuplicateHabitError } from '../../domain/errors/HabitErrors';
import { sortByCreation } from '../../domain/services/HabitAnalytics';
import { restoreHabit } from './storageGuard';

/**
 * Process-local store. Keeps records rather than aggregates so a caller
 * mutating a loaded habit changes nothing until it calls `update`.
 */
export class InMemoryHabitRepository extends HabitRepository {
    private records = new Map<string, HabitRecord>();

    constructor(seed: Habit[] = []) {
        super();
        seed.forEach(habit => this.records.set(habit.id, habit.toRecord()));
    }

    async create(habit: Habit): Promise<void> {
        if (this.records.has(habit.id)) {
            throw new DuplicateHabitError(habit.id);
        }
        this.records.set(habit.id, habit.toRecord());
    }

    async findById(id: string): Promise<Habit | null> {
        const record = this.records.get(id);
        return record ? this.toHabit(record) : null;
    }

    async findAll(): Promise<Habit[]> {
        return sortByCreation([...this.records.values()].map(record => this.toHabit(record)));
    }

    async update(habit: Habit): Promise<boolean> {
        if (!this.records.has(habit.id)) return false;
        this.records.set(habit.id, habit.toRecord());
        return true;
    }

    async delete(id: string): Promise<boolean> {
        return this.records.delete(id);
    }

    async addCheckOff(id: string, timestamp: Date): Promise<boolean> {
        const record = this.records.get(id);
        if (!record) return false;

        const habit = this.toHabit(record);
        if (!habit.addCheckOff(timestamp)) return false;

        this.records.set(id, habit.toRecord());
        return true;
    }

    async count(): Promise<number> {
        return this.records.size;
    }

    private toHabit(record: HabitRecord): Habit {
        return restoreHabit(record.id, () => Habit.fromRecord(record));
    }
}
