import { Habit } from '../../domain/entities/Habit';
import { HabitRepository } from '../../domain/entities/HabitRepository';
import type { RepositoryProvider } from '../../infrastructure/repositories/RepositoryProvider';

export class RenameHabit {
    constructor(private repositories: RepositoryProvider) {}

    /** Null when the habit does not exist. */
    async execute(id: string, name: string): Promise<Habit | null> {
        const repository = this.repositories.get(HabitRepository);
        const habit = await repository.findById(id);
        if (!habit) return null;

        habit.rename(name);
        return (await repository.update(habit)) ? habit : null;
    }
}
