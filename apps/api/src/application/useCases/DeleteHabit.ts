import { HabitRepository } from '../../domain/entities/HabitRepository';
import type { RepositoryProvider } from '../../infrastructure/repositories/RepositoryProvider';
import logger from '../../infrastructure/logger';

export class DeleteHabit {
    constructor(private repositories: RepositoryProvider) {}

    async execute(id: string): Promise<boolean> {
        const deleted = await this.repositories.get(HabitRepository).delete(id);
        if (deleted) {
            logger.info('Habit deleted', { habitId: id });
        }
        return deleted;
    }
}
