import { differenceInCalendarDays, startOfDay } from 'date-fns';
import type { CompletionRates, HabitDetail, HabitStatisticsResponse, HabitSummary, StreakMap } from '@habit-streaks/types';
import { Habit } from '../entities/Habit';
import { PERIODICITIES, type Periodicity } from '../entities/Periodicity';
import { periodsBetween } from './PeriodCalendar';
import { formatTimestamp } from './Timestamps';

/**
 * Reporting over collections of habits.
 *
 * Every function is pure: inputs are never mutated and "today" is passed in,
 * so repeated calls over the same data give the same answer.
 */

export const DEFAULT_STALE_DAYS = 7;
export const DEFAULT_MOST_ACTIVE_LIMIT = 5;

export interface LongestStreakResult {
    habit: Habit | null;
    streak: number;
}

export interface ActivityEntry {
    habit: Habit;
    checkOffCount: number;
}

export function sortByCreation(habits: readonly Habit[]): Habit[] {
    return [...habits].sort((a, b) => a.createdAt.getTime() - b.createdAt.getTime());
}

export function filterByPeriodicity(habits: readonly Habit[], periodicity: Periodicity): Habit[] {
    return sortByCreation(habits.filter(habit => habit.periodicity === periodicity));
}

/**
 * Habit with the highest longest streak; the first one wins ties.
 * `habit` stays null when no habit has any streak.
 */
export function longestStreakOverall(habits: readonly Habit[]): LongestStreakResult {
    let result: LongestStreakResult = { habit: null, streak: 0 };

    for (const habit of habits) {
        const streak = habit.longestStreak();
        if (streak > result.streak) {
            result = { habit, streak };
        }
    }

    return result;
}

export function longestStreaksById(habits: readonly Habit[]): StreakMap {
    return Object.fromEntries(
        habits.map(habit => [habit.id, { name: habit.name, streak: habit.longestStreak() }])
    );
}

export function currentStreaksById(habits: readonly Habit[], today: Date): StreakMap {
    return Object.fromEntries(
        habits.map(habit => [habit.id, { name: habit.name, streak: habit.currentStreak(today) }])
    );
}

export function habitsWithStreakAtLeast(habits: readonly Habit[], threshold: number, today: Date): Habit[] {
    return habits.filter(habit => habit.currentStreak(today) >= threshold);
}

/**
 * Habits never checked off, or whose latest check-off falls on a calendar day
 * strictly before `today - days`.
 */
export function staleHabits(habits: readonly Habit[], today: Date, days: number = DEFAULT_STALE_DAYS): Habit[] {
    return habits.filter(habit => {
        const last = habit.lastCheckOff();
        return last === null || differenceInCalendarDays(today, last) > days;
    });
}

/**
 * Check-offs over expected periods since creation, per periodicity, capped at 1.
 * A habit expects `periodsBetween(createdAt, today) + 1` periods; habits created
 * after today expect none and add nothing to either side.
 */
export function completionRateByPeriodicity(habits: readonly Habit[], today: Date): CompletionRates {
    const rates: CompletionRates = { daily: 0, weekly: 0 };

    for (const periodicity of PERIODICITIES) {
        let expected = 0;
        let completed = 0;

        for (const habit of habits) {
            if (habit.periodicity !== periodicity) continue;

            const habitExpected = periodsBetween(periodicity, habit.createdAt, today) + 1;
            if (habitExpected <= 0) continue;

            expected += habitExpected;
            completed += habit.checkOffCount;
        }

        rates[periodicity] = expected > 0 ? Math.min(completed / expected, 1) : 0;
    }

    return rates;
}

/** Habits whose creation date lies within `[from, to]`, compared by calendar day. */
export function filterByCreationDate(habits: readonly Habit[], from: Date, to: Date): Habit[] {
    const start = startOfDay(from).getTime();
    const end = startOfDay(to).getTime();
    return habits.filter(habit => {
        const created = startOfDay(habit.createdAt).getTime();
        return created >= start && created <= end;
    });
}

export function mostActive(habits: readonly Habit[], limit: number = DEFAULT_MOST_ACTIVE_LIMIT): ActivityEntry[] {
    return habits
        .map(habit => ({ habit, checkOffCount: habit.checkOffCount }))
        .sort((a, b) => b.checkOffCount - a.checkOffCount)
        .slice(0, Math.max(0, limit));
}

export function summarizeHabit(habit: Habit, today: Date): HabitSummary {
    const last = habit.lastCheckOff();
    return {
        id: habit.id,
        name: habit.name,
        periodicity: habit.periodicity,
        createdAt: formatTimestamp(habit.createdAt),
        checkOffCount: habit.checkOffCount,
        currentStreak: habit.currentStreak(today),
        longestStreak: habit.longestStreak(),
        lastCheckOff: last ? formatTimestamp(last) : null,
    };
}

export function describeHabit(habit: Habit, today: Date): HabitDetail {
    return {
        ...summarizeHabit(habit, today),
        checkOffs: habit.checkOffs.map(checkOff => formatTimestamp(checkOff)),
    };
}

export function habitStatistics(habits: readonly Habit[], today: Date): HabitStatisticsResponse {
    const totalHabits = habits.length;
    const totalCheckOffs = habits.reduce((sum, habit) => sum + habit.checkOffCount, 0);

    return {
        totalHabits,
        dailyHabits: filterByPeriodicity(habits, 'daily').length,
        weeklyHabits: filterByPeriodicity(habits, 'weekly').length,
        totalCheckOffs,
        averageCheckOffsPerHabit: totalHabits > 0 ? totalCheckOffs / totalHabits : 0,
        longestStreakOverall: longestStreakOverall(habits).streak,
        habitsWithCurrentStreak: habits.filter(habit => habit.currentStreak(today) > 0).length,
        completionRates: completionRateByPeriodicity(habits, today),
    };
}
