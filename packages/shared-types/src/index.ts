export * from './schemas';

import type { Periodicity } from './schemas';

/**
 * Habit as returned by the API, with its derived streaks
 */
export interface HabitSummary {
  id: string;
  name: string;
  periodicity: Periodicity;
  createdAt: string;    // ISO string
  checkOffCount: number;
  currentStreak: number;
  longestStreak: number;
  lastCheckOff: string | null;
}

export interface HabitDetail extends HabitSummary {
  checkOffs: string[];
}

/**
 * Result of a check-off request. A duplicate period is not an error.
 */
export type CheckOffResponse =
  | { accepted: true; habitId: string; timestamp: string }
  | { accepted: false; habitId: string; reason: 'duplicate-period' };

export interface StreakEntry {
  name: string;
  streak: number;
}

/** Keyed by habit id */
export type StreakMap = Record<string, StreakEntry>;

export type CompletionRates = Record<Periodicity, number>;

export interface HabitStatisticsResponse {
  totalHabits: number;
  dailyHabits: number;
  weeklyHabits: number;
  totalCheckOffs: number;
  averageCheckOffsPerHabit: number;
  longestStreakOverall: number;
  habitsWithCurrentStreak: number;
  completionRates: CompletionRates;
}

export interface MostActiveEntry {
  habit: HabitSummary;
  checkOffCount: number;
}
