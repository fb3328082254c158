import { randomUUID } from 'crypto';
import { compareAsc, isValid } from 'date-fns';
import type { HabitRecord, StoredHabitRecord } from '@habit-streaks/types';
import { isNextPeriod, periodKey, previousPeriod, samePeriod } from '../services/PeriodCalendar';
import { formatTimestamp, parseTimestamp } from '../services/Timestamps';
import { parsePeriodicity, type Periodicity } from './Periodicity';
import { InvalidHabitNameError, InvalidHabitRecordError, InvalidTimestampError } from '../errors/HabitErrors';

const MAX_NAME_LENGTH = 100;

/**
 * A recurring habit and its check-off history.
 *
 * Holds at most one check-off per period (calendar day or Monday-anchored week)
 * and keeps them in ascending order. Streaks are derived from the stored events
 * on every call.
 */
export class Habit {
    private readonly events: Date[] = [];
    private currentName: string;

    constructor(
        public readonly id: string,
        name: string,
        public readonly periodicity: Periodicity,
        public readonly createdAt: Date,
        checkOffs: readonly Date[] = []
    ) {
        this.currentName = Habit.validateName(name);
        // Oldest first, so the earliest check-off of a period is the one kept.
        [...checkOffs].sort(compareAsc).forEach(checkOff => this.addCheckOff(checkOff));
    }

    static create(name: string, periodicity: Periodicity, createdAt: Date): Habit {
        return new Habit(randomUUID(), name, periodicity, createdAt);
    }

    get name(): string {
        return this.currentName;
    }

    get checkOffs(): Date[] {
        return this.events.map(event => new Date(event.getTime()));
    }

    get checkOffCount(): number {
        return this.events.length;
    }

    rename(name: string): void {
        this.currentName = Habit.validateName(name);
    }

    /**
     * Records a completion. Returns false, leaving the history untouched,
     * when the timestamp's period already has a check-off.
     */
    addCheckOff(timestamp: Date): boolean {
        if (!isValid(timestamp)) {
            throw new InvalidTimestampError(timestamp);
        }
        if (this.hasCheckOffInPeriod(timestamp)) {
            return false;
        }

        const insertAt = this.events.findIndex(event => event.getTime() > timestamp.getTime());
        const copy = new Date(timestamp.getTime());
        if (insertAt === -1) {
            this.events.push(copy);
        } else {
            this.events.splice(insertAt, 0, copy);
        }
        return true;
    }

    hasCheckOffInPeriod(timestamp: Date): boolean {
        return this.events.some(event => samePeriod(this.periodicity, event, timestamp));
    }

    lastCheckOff(): Date | null {
        const last = this.events[this.events.length - 1];
        return last ? new Date(last.getTime()) : null;
    }

    /**
     * Consecutive periods with a check-off, counted back from the period
     * containing `today`. Zero when the current period has none yet.
     * Check-offs dated after today's period are ignored.
     */
    currentStreak(today: Date): number {
        const todayKey = periodKey(this.periodicity, today);
        let expected = todayKey;
        let streak = 0;

        for (let i = this.events.length - 1; i >= 0; i--) {
            const key = periodKey(this.periodicity, this.events[i]);
            if (key > todayKey) continue;
            if (key !== expected) break;

            streak++;
            expected = previousPeriod(this.periodicity, expected);
        }

        return streak;
    }

    longestStreak(): number {
        let longest = 0;
        let running = 0;
        let previousKey: string | null = null;

        for (const event of this.events) {
            const key = periodKey(this.periodicity, event);
            running = previousKey !== null && isNextPeriod(this.periodicity, previousKey, key) ? running + 1 : 1;
            longest = Math.max(longest, running);
            previousKey = key;
        }

        return longest;
    }

    toRecord(): HabitRecord {
        return {
            id: this.id,
            name: this.currentName,
            periodicity: this.periodicity,
            created_at: formatTimestamp(this.createdAt),
            check_offs: this.events.map(event => formatTimestamp(event)),
        };
    }

    /**
     * Rebuilds a habit from its stored shape. Check-offs are replayed through
     * `addCheckOff`, so out-of-order or same-period entries are normalised.
     */
    static fromRecord(record: StoredHabitRecord): Habit {
        const createdAt = parseTimestamp(record.created_at);
        if (!isValid(createdAt)) {
            throw new InvalidHabitRecordError(record.id, `created_at "${record.created_at}" is not a valid timestamp`);
        }

        const checkOffs = record.check_offs.map(value => {
            const timestamp = parseTimestamp(value);
            if (!isValid(timestamp)) {
                throw new InvalidHabitRecordError(record.id, `check-off "${value}" is not a valid timestamp`);
            }
            return timestamp;
        });

        return new Habit(record.id, record.name, parsePeriodicity(record.periodicity), createdAt, checkOffs);
    }

    private static validateName(name: string): string {
        const trimmed = name.trim();
        if (trimmed.length === 0) {
            throw new InvalidHabitNameError('name cannot be empty');
        }
        if (trimmed.length > MAX_NAME_LENGTH) {
            throw new InvalidHabitNameError(`name must be at most ${MAX_NAME_LENGTH} characters long`);
        }
        return trimmed;
    }
}
