import 'dotenv/config';
import { createDatabase } from '../src/infrastructure/db';
import { checkOffs, habits } from '../src/infrastructure/db/schema';

async function reset() {
    const connectionString = process.env.DATABASE_URL;
    if (!connectionString) {
        throw new Error("DATABASE_URL environment variable is not set");
    }

    console.log('🗑️  Cleaning database...');
    const { db, pool } = createDatabase(connectionString);

    try {
        await db.delete(checkOffs);
        await db.delete(habits);
        console.log('✅ Database cleaned successfully.');
    } finally {
        await pool.end();
    }
}

reset().catch((error) => {
    console.error('❌ Error cleaning database:', error);
    process.exitCode = 1;
});
