import { HabitRepository } from '../../domain/entities/HabitRepository';
import type { RepositoryProvider } from '../../infrastructure/repositories/RepositoryProvider';
import type { ClockProvider } from '../providers/ClockProvider';
import logger from '../../infrastructure/logger';

export type CheckOffOutcome =
    | { status: 'accepted'; timestamp: Date }
    | { status: 'duplicate' }
    | { status: 'not-found' };

export class CheckOffHabit {
    constructor(
        private repositories: RepositoryProvider,
        private clock: ClockProvider,
    ) {}

    /**
     * Checks a habit off at `timestamp`, or now when omitted.
     * The repository only answers accepted or not; the existence check
     * beforehand tells a duplicate period apart from a missing habit.
     */
    async execute(id: string, timestamp?: Date): Promise<CheckOffOutcome> {
        const repository = this.repositories.get(HabitRepository);
        const checkedAt = timestamp ?? this.clock.now();

        const habit = await repository.findById(id);
        if (!habit) {
            return { status: 'not-found' };
        }

        if (!(await repository.addCheckOff(id, checkedAt))) {
            return { status: 'duplicate' };
        }

        logger.info('Habit checked off', { habitId: id, timestamp: checkedAt.toISOString() });
        return { status: 'accepted', timestamp: checkedAt };
    }
}
