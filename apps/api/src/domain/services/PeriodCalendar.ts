import { differenceInCalendarDays, format, parse, startOfISOWeek, subDays } from 'date-fns';
import type { Periodicity } from '../entities/Periodicity';

/**
 * First calendar day of a period, formatted `yyyy-MM-dd`.
 * Keys of the same periodicity order chronologically as plain strings.
 */
export type PeriodKey = string;

const KEY_FORMAT = 'yyyy-MM-dd';

function periodLengthInDays(periodicity: Periodicity): number {
    switch (periodicity) {
        case 'daily':
            return 1;
        case 'weekly':
            return 7;
    }
}

function keyToDate(key: PeriodKey): Date {
    return parse(key, KEY_FORMAT, new Date());
}

/**
 * Maps a timestamp to its period under the local calendar:
 * the date itself for daily habits, the Monday of its ISO week for weekly ones.
 */
export function periodKey(periodicity: Periodicity, timestamp: Date): PeriodKey {
    switch (periodicity) {
        case 'daily':
            return format(timestamp, KEY_FORMAT);
        case 'weekly':
            return format(startOfISOWeek(timestamp), KEY_FORMAT);
    }
}

export function samePeriod(periodicity: Periodicity, a: Date, b: Date): boolean {
    return periodKey(periodicity, a) === periodKey(periodicity, b);
}

/** True iff `next` is exactly one period after `previous`. */
export function isNextPeriod(periodicity: Periodicity, previous: PeriodKey, next: PeriodKey): boolean {
    return differenceInCalendarDays(keyToDate(next), keyToDate(previous)) === periodLengthInDays(periodicity);
}

export function previousPeriod(periodicity: Periodicity, key: PeriodKey): PeriodKey {
    return format(subDays(keyToDate(key), periodLengthInDays(periodicity)), KEY_FORMAT);
}

/**
 * Whole periods elapsed between two timestamps, counted in calendar days
 * (weekly: completed 7-day spans, not week boundaries crossed).
 * Negative when `to` precedes `from`.
 */
export function periodsBetween(periodicity: Periodicity, from: Date, to: Date): number {
    const days = differenceInCalendarDays(to, from);
    return Math.floor(days / periodLengthInDays(periodicity));
}
