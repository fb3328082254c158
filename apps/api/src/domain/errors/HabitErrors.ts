import { AppError } from './AppError';

export class InvalidPeriodicityError extends AppError {
    constructor(public readonly value: unknown) {
        super(`Invalid periodicity "${String(value)}". Expected "daily" or "weekly"`, 400);
    }
}

export class InvalidHabitNameError extends AppError {
    constructor(reason: string) {
        super(`Invalid habit name: ${reason}`, 400);
    }
}

/**
 * Raised by repositories when the backing store cannot be read or written,
 * or holds data that does not parse. Never retried here.
 */
export class StorageFailureError extends AppError {
    constructor(message: string, cause?: unknown) {
        super(message, 503, { cause });
    }
}

export class InvalidTimestampError extends AppError {
    constructor(value: unknown) {
        super(`Invalid timestamp "${String(value)}"`, 400);
    }
}

export class InvalidHabitRecordError extends AppError {
    constructor(habitId: string, reason: string) {
        super(`Habit record ${habitId} is invalid: ${reason}`, 400);
    }
}

export class DuplicateHabitError extends AppError {
    constructor(habitId: string) {
        super(`Habit ${habitId} already exists`, 409);
    }
}
