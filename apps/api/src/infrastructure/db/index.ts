import { drizzle, type NodePgDatabase } from "drizzle-orm/node-postgres";
import { Pool } from "pg";
import * as schema from "./schema";
import logger from '../logger';

export type Database = NodePgDatabase<typeof schema>;

export interface DatabaseConnection {
    db: Database;
    pool: Pool;
}

export function createDatabase(connectionString: string): DatabaseConnection {
    const pool = new Pool({
        connectionString,
        min: 1,
        max: 10,
        idleTimeoutMillis: 30000,
        connectionTimeoutMillis: 2000,
    });

    pool.on('error', (err) => {
        logger.error('Unexpected database pool error', { error: err.message });
    });

    pool.on('connect', () => {
        logger.debug('New database connection established');
    });

    pool.on('remove', () => {
        logger.debug('Database connection removed from pool');
    });

    return { db: drizzle(pool, { schema }), pool };
}
