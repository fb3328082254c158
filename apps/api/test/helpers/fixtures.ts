import { Habit } from '../../src/domain/entities/Habit';
import type { Periodicity } from '../../src/domain/entities/Periodicity';
import type { ClockProvider } from '../../src/application/providers/ClockProvider';
import { RegistryRepositoryProvider } from '../../src/infrastructure/repositories/RepositoryProvider';
import { HabitRepository } from '../../src/domain/entities/HabitRepository';

/** Local-time date at the given hour; month is 1-based. */
export function at(year: number, month: number, day: number, hour = 9): Date {
    return new Date(year, month - 1, day, hour, 0, 0);
}

export function daysBefore(date: Date, days: number, hour = 9): Date {
    return new Date(date.getFullYear(), date.getMonth(), date.getDate() - days, hour, 0, 0);
}

export function habitWith(
    periodicity: Periodicity,
    checkOffs: Date[] = [],
    options: { id?: string; name?: string; createdAt?: Date } = {}
): Habit {
    return new Habit(
        options.id ?? `habit-${Math.random().toString(36).slice(2, 10)}`,
        options.name ?? 'Test habit',
        periodicity,
        options.createdAt ?? at(2026, 1, 1),
        checkOffs
    );
}

export function fixedClock(now: Date): ClockProvider {
    return { now: () => new Date(now.getTime()) };
}

export function providerFor(repository: HabitRepository): RegistryRepositoryProvider {
    const provider = new RegistryRepositoryProvider();
    provider.register(HabitRepository, () => repository);
    return provider;
}
