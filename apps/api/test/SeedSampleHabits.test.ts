import { describe, it, expect, beforeEach } from 'vitest';
import { SeedSampleHabits } from '../src/application/useCases/SeedSampleHabits';
import { createSampleHabits } from '../src/application/sampleData/sampleHabits';
import { InMemoryHabitRepository } from '../src/infrastructure/repositories/InMemoryHabitRepository';
import { at, fixedClock, habitWith, providerFor } from './helpers/fixtures';

describe('createSampleHabits', () => {
    // Monday; the sample window starts on Monday 2026-09-21
    const today = at(2026, 10, 19, 12);

    it('should create three daily and two weekly habits at the start of the window', () => {
        const habits = createSampleHabits(today);

        expect(habits.map(habit => [habit.name, habit.periodicity])).toEqual([
            ['Brush teeth', 'daily'],
            ['Exercise', 'daily'],
            ['Read', 'daily'],
            ['Grocery shop', 'weekly'],
            ['Clean house', 'weekly'],
        ]);
        habits.forEach(habit => expect(habit.createdAt).toEqual(at(2026, 9, 21, 0)));
    });

    it('should skip the same days for every daily habit', () => {
        const [brushTeeth] = createSampleHabits(today);

        // 29 days in the window, minus Sep 25, 27, 30 and Oct 3, 5, 15, 18
        expect(brushTeeth.checkOffCount).toBe(22);
        expect(brushTeeth.checkOffs[0]).toEqual(at(2026, 9, 21, 8));
        expect(brushTeeth.longestStreak()).toBe(9);
        expect(brushTeeth.currentStreak(today)).toBe(1);
    });

    it('should check weekly habits off on Mondays not divisible by seven', () => {
        const groceryShop = createSampleHabits(today)[3];

        expect(groceryShop.checkOffs).toEqual([at(2026, 10, 5, 10), at(2026, 10, 12, 10), at(2026, 10, 19, 10)]);
        expect(groceryShop.currentStreak(today)).toBe(3);
    });
});

describe('SeedSampleHabits', () => {
    const now = at(2026, 10, 19, 12);
    let repository: InMemoryHabitRepository;

    beforeEach(() => {
        repository = new InMemoryHabitRepository();
    });

    it('should fill an empty store', async () => {
        const result = await new SeedSampleHabits(providerFor(repository), fixedClock(now)).execute();

        expect(result.seeded).toBe(true);
        expect(await repository.count()).toBe(5);
        expect((await repository.findAll()).map(habit => habit.checkOffCount)).toEqual([22, 22, 22, 3, 3]);
    });

    it('should leave a store with habits untouched', async () => {
        await repository.create(habitWith('daily', [], { id: 'mine' }));

        const result = await new SeedSampleHabits(providerFor(repository), fixedClock(now)).execute();

        expect(result).toEqual({ seeded: false, existing: 1 });
        expect(await repository.count()).toBe(1);
    });
});
