import { Habit } from './Habit';

/**
 * Persistence contract for habits. Lookups and mutations on an unknown id
 * resolve to null/false; storage faults reject with StorageFailureError.
 */
export abstract class HabitRepository {
    abstract create(habit: Habit): Promise<void>;
    abstract findById(id: string): Promise<Habit | null>;
    /** Ordered by creation time, oldest first. */
    abstract findAll(): Promise<Habit[]>;
    /** Replaces name and check-offs. False when the habit does not exist. */
    abstract update(habit: Habit): Promise<boolean>;
    /** Removes the habit together with its check-offs. */
    abstract delete(id: string): Promise<boolean>;
    /**
     * Loads the habit, applies the check-off and persists it as one unit.
     * False when the habit is missing or the period is already checked off.
     */
    abstract addCheckOff(id: string, timestamp: Date): Promise<boolean>;
    abstract count(): Promise<number>;
}
