import { Habit } from '../../domain/entities/Habit';
import { HabitRepository } from '../../domain/entities/HabitRepository';
import { parsePeriodicity } from '../../domain/entities/Periodicity';
import type { RepositoryProvider } from '../../infrastructure/repositories/RepositoryProvider';
import type { ClockProvider } from '../providers/ClockProvider';
import logger from '../../infrastructure/logger';

export class CreateHabit {
    constructor(
        private repositories: RepositoryProvider,
        private clock: ClockProvider,
    ) {}

    async execute(name: string, periodicity: string): Promise<Habit> {
        const habit = Habit.create(name, parsePeriodicity(periodicity), this.clock.now());
        await this.repositories.get(HabitRepository).create(habit);

        logger.info('Habit created', { habitId: habit.id, periodicity: habit.periodicity });
        return habit;
    }
}
