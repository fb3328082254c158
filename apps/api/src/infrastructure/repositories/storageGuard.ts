import type { Habit } from '../../domain/entities/Habit';
import { AppError } from '../../domain/errors/AppError';
import { StorageFailureError } from '../../domain/errors/HabitErrors';
import logger from '../logger';

/**
 * Runs a storage operation, letting domain errors through and turning
 * driver or file-system faults into StorageFailureError.
 */
export async function guardStorage<T>(operation: string, work: () => Promise<T>): Promise<T> {
    try {
        return await work();
    } catch (error) {
        if (error instanceof AppError) {
            throw error;
        }
        logger.error('Habit storage failure', {
            operation,
            error: error instanceof Error ? error.message : String(error),
        });
        throw new StorageFailureError(`Could not ${operation}`, error);
    }
}

/**
 * Rebuilds a stored habit. A record the domain rejects (unknown periodicity,
 * bad timestamp, invalid name) means the store is corrupt, so the domain error
 * is reported as the cause of a StorageFailureError.
 */
export function restoreHabit(habitId: string, restore: () => Habit): Habit {
    try {
        return restore();
    } catch (error) {
        if (error instanceof AppError && !(error instanceof StorageFailureError)) {
            throw new StorageFailureError(`Stored habit ${habitId} is invalid: ${error.message}`, error);
        }
        throw error;
    }
}
