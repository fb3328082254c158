import { InvalidPeriodicityError } from '../errors/HabitErrors';

export const PERIODICITIES = ['daily', 'weekly'] as const;

export type Periodicity = (typeof PERIODICITIES)[number];

export function isPeriodicity(value: unknown): value is Periodicity {
    return typeof value === 'string' && (PERIODICITIES as readonly string[]).includes(value);
}

/**
 * Boundary parser for periodicity strings coming from requests, rows or files.
 * Accepts surrounding whitespace and any letter case.
 */
export function parsePeriodicity(value: unknown): Periodicity {
    const normalized = typeof value === 'string' ? value.trim().toLowerCase() : value;
    if (!isPeriodicity(normalized)) {
        throw new InvalidPeriodicityError(value);
    }
    return normalized;
}
