import 'dotenv/config';
import { Core } from '../src/infrastructure/Core';
import { loadAppConfig } from '../src/application/config/appConfig';
import { SeedSampleHabits } from '../src/application/useCases/SeedSampleHabits';

/**
 * Fills the configured store with the five demo habits and four weeks of check-offs.
 */
async function seed() {
    const core = new Core(loadAppConfig());

    try {
        const result = await core.getUseCase(SeedSampleHabits).execute();
        if (!result.seeded) {
            console.log(`⚠️  Store already contains ${result.existing} habit(s). Skipping sample data.`);
            return;
        }

        const today = core.clock.now();
        console.log(`✅ Created ${result.habits.length} sample habits:`);
        for (const habit of result.habits) {
            console.log(
                `   • ${habit.name} (${habit.periodicity}) - ${habit.checkOffCount} check-offs, ` +
                `current streak ${habit.currentStreak(today)}, longest ${habit.longestStreak()}`
            );
        }
    } finally {
        await core.close();
    }
}

seed().catch((error) => {
    console.error('❌ Error seeding sample data:', error);
    process.exitCode = 1;
});
