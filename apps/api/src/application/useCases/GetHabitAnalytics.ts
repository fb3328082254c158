import { isValid, parseISO } from 'date-fns';
import type { CompletionRates, HabitStatisticsResponse, StreakMap } from '@habit-streaks/types';
import { Habit } from '../../domain/entities/Habit';
import { HabitRepository } from '../../domain/entities/HabitRepository';
import { InvalidTimestampError } from '../../domain/errors/HabitErrors';
import {
    completionRateByPeriodicity,
    currentStreaksById,
    filterByCreationDate,
    habitStatistics,
    habitsWithStreakAtLeast,
    longestStreakOverall,
    longestStreaksById,
    mostActive,
    staleHabits,
    type ActivityEntry,
    type LongestStreakResult,
} from '../../domain/services/HabitAnalytics';
import type { RepositoryProvider } from '../../infrastructure/repositories/RepositoryProvider';
import type { ClockProvider } from '../providers/ClockProvider';

export interface AnalyticsDefaults {
    staleDays: number;
    mostActiveLimit: number;
}

export interface StreakReport {
    current: StreakMap;
    longest: StreakMap;
}

/**
 * Loads the habit collection once per call and hands it to the pure
 * analytics functions with the clock's notion of today.
 */
export class GetHabitAnalytics {
    constructor(
        private repositories: RepositoryProvider,
        private clock: ClockProvider,
        private defaults: AnalyticsDefaults,
    ) {}

    async executeStatistics(): Promise<HabitStatisticsResponse> {
        return habitStatistics(await this.loadHabits(), this.clock.now());
    }

    async executeStreaks(): Promise<StreakReport> {
        const habits = await this.loadHabits();
        return {
            current: currentStreaksById(habits, this.clock.now()),
            longest: longestStreaksById(habits),
        };
    }

    async executeLongestStreak(): Promise<LongestStreakResult> {
        return longestStreakOverall(await this.loadHabits());
    }

    async executeActiveStreaks(threshold = 1): Promise<Habit[]> {
        return habitsWithStreakAtLeast(await this.loadHabits(), threshold, this.clock.now());
    }

    async executeStale(days = this.defaults.staleDays): Promise<Habit[]> {
        return staleHabits(await this.loadHabits(), this.clock.now(), days);
    }

    async executeMostActive(limit = this.defaults.mostActiveLimit): Promise<ActivityEntry[]> {
        return mostActive(await this.loadHabits(), limit);
    }

    async executeCompletionRates(): Promise<CompletionRates> {
        return completionRateByPeriodicity(await this.loadHabits(), this.clock.now());
    }

    /** `from` and `to` are `yyyy-MM-dd` calendar dates, both inclusive. */
    async executeCreatedBetween(from: string, to: string): Promise<Habit[]> {
        return filterByCreationDate(await this.loadHabits(), calendarDate(from), calendarDate(to));
    }

    private loadHabits(): Promise<Habit[]> {
        return this.repositories.get(HabitRepository).findAll();
    }
}

function calendarDate(value: string): Date {
    const date = parseISO(value);
    if (!isValid(date)) {
        throw new InvalidTimestampError(value);
    }
    return date;
}
