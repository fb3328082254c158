import { Habit } from '../../domain/entities/Habit';
import { HabitRepository } from '../../domain/entities/HabitRepository';
import type { RepositoryProvider } from '../../infrastructure/repositories/RepositoryProvider';
import type { ClockProvider } from '../providers/ClockProvider';
import { createSampleHabits } from '../sampleData/sampleHabits';
import logger from '../../infrastructure/logger';

export type SeedResult =
    | { seeded: true; habits: Habit[] }
    | { seeded: false; existing: number };

export class SeedSampleHabits {
    constructor(
        private repositories: RepositoryProvider,
        private clock: ClockProvider,
    ) {}

    /** Populates an empty store; leaves a store that already has habits untouched. */
    async execute(): Promise<SeedResult> {
        const repository = this.repositories.get(HabitRepository);
        const existing = await repository.count();
        if (existing > 0) {
            logger.warn('Store already contains habits, skipping sample data', { existing });
            return { seeded: false, existing };
        }

        const habits = createSampleHabits(this.clock.now());
        for (const habit of habits) {
            await repository.create(habit);
        }

        logger.info('Sample habits created', {
            habits: habits.map(habit => ({ name: habit.name, checkOffs: habit.checkOffCount })),
        });
        return { seeded: true, habits };
    }
}
