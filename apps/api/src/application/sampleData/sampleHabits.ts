import { eachDayOfInterval, getISODay, isWeekend, setHours, startOfDay, subWeeks } from 'date-fns';
import { Habit } from '../../domain/entities/Habit';
import type { Periodicity } from '../../domain/entities/Periodicity';

export const SAMPLE_WEEKS = 4;

export const SAMPLE_HABITS: ReadonlyArray<{ name: string; periodicity: Periodicity }> = [
    { name: 'Brush teeth', periodicity: 'daily' },
    { name: 'Exercise', periodicity: 'daily' },
    { name: 'Read', periodicity: 'daily' },
    { name: 'Grocery shop', periodicity: 'weekly' },
    { name: 'Clean house', periodicity: 'weekly' },
];

// Deterministic gaps: weekends miss every day-of-month divisible by 3,
// weekdays every one divisible by 5.
function dailyCheckOffOn(day: Date): boolean {
    return isWeekend(day) ? day.getDate() % 3 !== 0 : day.getDate() % 5 !== 0;
}

// Mondays only, skipping those whose day-of-month is divisible by 7.
function weeklyCheckOffOn(day: Date): boolean {
    return getISODay(day) === 1 && day.getDate() % 7 !== 0;
}

/**
 * The five demo habits, created `SAMPLE_WEEKS` weeks before `today` and
 * checked off over that span (daily at 08:00, weekly at 10:00).
 */
export function createSampleHabits(today: Date): Habit[] {
    const start = subWeeks(startOfDay(today), SAMPLE_WEEKS);
    const days = eachDayOfInterval({ start, end: startOfDay(today) });

    return SAMPLE_HABITS.map(({ name, periodicity }) => {
        const habit = Habit.create(name, periodicity, start);
        const [shouldCheckOff, hour] = periodicity === 'daily'
            ? [dailyCheckOffOn, 8] as const
            : [weeklyCheckOffOn, 10] as const;

        days.filter(shouldCheckOff).forEach(day => habit.addCheckOff(setHours(day, hour)));
        return habit;
    });
}
