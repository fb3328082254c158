import { asc, count, eq } from 'drizzle-orm';
import type { Database } from '../db';
import { checkOffs, habits } from '../db/schema';
import { Habit } from '../../domain/entities/Habit';
import { HabitRepository } from '../../domain/entities/HabitRepository';
import { parsePeriodicity } from '../../domain/entities/Periodicity';
import { DuplicateHabitError } from '../../domain/errors/HabitErrors';
import { periodKey } from '../../domain/services/PeriodCalendar';
import { guardStorage, restoreHabit } from './storageGuard';

type HabitRow = typeof habits.$inferSelect;

export class DrizzleHabitRepository extends HabitRepository {
    constructor(private db: Database) {
        super();
    }

    async create(habit: Habit): Promise<void> {
        await guardStorage('create habit', () => this.db.transaction(async (tx) => {
            const inserted = await tx.insert(habits).values({
                id: habit.id,
                name: habit.name,
                periodicity: habit.periodicity,
                createdAt: habit.createdAt,
            }).onConflictDoNothing().returning({ id: habits.id });
            if (inserted.length === 0) {
                throw new DuplicateHabitError(habit.id);
            }

            const rows = this.checkOffRows(habit);
            if (rows.length > 0) {
                await tx.insert(checkOffs).values(rows);
            }
        }));
    }

    async findById(id: string): Promise<Habit | null> {
        return guardStorage('load habit', async () => {
            const result = await this.db.select().from(habits).where(eq(habits.id, id)).limit(1);
            if (result.length === 0) return null;

            const events = await this.db
                .select({ checkedAt: checkOffs.checkedAt })
                .from(checkOffs)
                .where(eq(checkOffs.habitId, id))
                .orderBy(asc(checkOffs.checkedAt));

            return this.toHabit(result[0], events.map(event => event.checkedAt));
        });
    }

    async findAll(): Promise<Habit[]> {
        return guardStorage('load habits', async () => {
            const rows = await this.db.select().from(habits).orderBy(asc(habits.createdAt));
            const events = await this.db
                .select({ habitId: checkOffs.habitId, checkedAt: checkOffs.checkedAt })
                .from(checkOffs)
                .orderBy(asc(checkOffs.checkedAt));

            const eventsByHabit = new Map<string, Date[]>();
            for (const event of events) {
                const list = eventsByHabit.get(event.habitId) ?? [];
                list.push(event.checkedAt);
                eventsByHabit.set(event.habitId, list);
            }

            return rows.map(row => this.toHabit(row, eventsByHabit.get(row.id) ?? []));
        });
    }

    async update(habit: Habit): Promise<boolean> {
        return guardStorage('update habit', () => this.db.transaction(async (tx) => {
            const locked = await tx.select({ id: habits.id }).from(habits).where(eq(habits.id, habit.id)).for('update');
            if (locked.length === 0) return false;

            await tx.update(habits).set({ name: habit.name }).where(eq(habits.id, habit.id));
            await tx.delete(checkOffs).where(eq(checkOffs.habitId, habit.id));

            const rows = this.checkOffRows(habit);
            if (rows.length > 0) {
                await tx.insert(checkOffs).values(rows);
            }
            return true;
        }));
    }

    async delete(id: string): Promise<boolean> {
        return guardStorage('delete habit', async () => {
            // check_offs rows go with it through ON DELETE CASCADE
            const deleted = await this.db.delete(habits).where(eq(habits.id, id)).returning({ id: habits.id });
            return deleted.length > 0;
        });
    }

    async addCheckOff(id: string, timestamp: Date): Promise<boolean> {
        return guardStorage('add check-off', () => this.db.transaction(async (tx) => {
            // Row lock keeps concurrent check-offs for the same habit from both passing the duplicate test
            const result = await tx.select().from(habits).where(eq(habits.id, id)).for('update');
            if (result.length === 0) return false;

            const events = await tx
                .select({ checkedAt: checkOffs.checkedAt })
                .from(checkOffs)
                .where(eq(checkOffs.habitId, id))
                .orderBy(asc(checkOffs.checkedAt));

            const habit = this.toHabit(result[0], events.map(event => event.checkedAt));
            if (!habit.addCheckOff(timestamp)) return false;

            await tx.insert(checkOffs).values({
                habitId: id,
                checkedAt: timestamp,
                periodKey: periodKey(habit.periodicity, timestamp),
            });
            return true;
        }));
    }

    async count(): Promise<number> {
        return guardStorage('count habits', async () => {
            const [row] = await this.db.select({ value: count() }).from(habits);
            return row?.value ?? 0;
        });
    }

    private toHabit(row: HabitRow, events: Date[]): Habit {
        return restoreHabit(row.id, () => new Habit(row.id, row.name, parsePeriodicity(row.periodicity), row.createdAt, events));
    }

    private checkOffRows(habit: Habit) {
        return habit.checkOffs.map(checkedAt => ({
            habitId: habit.id,
            checkedAt,
            periodKey: periodKey(habit.periodicity, checkedAt),
        }));
    }
}
