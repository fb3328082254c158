import { Habit } from '../../domain/entities/Habit';
import { HabitRepository } from '../../domain/entities/HabitRepository';
import type { Periodicity } from '../../domain/entities/Periodicity';
import { filterByPeriodicity, sortByCreation } from '../../domain/services/HabitAnalytics';
import type { RepositoryProvider } from '../../infrastructure/repositories/RepositoryProvider';

export class GetHabits {
    constructor(private repositories: RepositoryProvider) {}

    async executeGetAll(periodicity?: Periodicity): Promise<Habit[]> {
        const habits = await this.repositories.get(HabitRepository).findAll();
        return periodicity ? filterByPeriodicity(habits, periodicity) : sortByCreation(habits);
    }

    async executeGetById(id: string): Promise<Habit | null> {
        return this.repositories.get(HabitRepository).findById(id);
    }
}
