/**
 * Application configuration from environment variables
 */

export type StorageBackend = 'postgres' | 'json' | 'memory';

export interface AppConfig {
    port: number;
    storageBackend: StorageBackend;
    jsonPath: string;
    databaseUrl: string | undefined;
    staleDays: number;
    mostActiveLimit: number;
    corsOrigin: string;
}

const STORAGE_BACKENDS: readonly StorageBackend[] = ['postgres', 'json', 'memory'];

function parseStorageBackend(value: string): StorageBackend {
    const backend = STORAGE_BACKENDS.find(candidate => candidate === value.toLowerCase());
    if (!backend) {
        throw new Error(`STORAGE_BACKEND must be one of ${STORAGE_BACKENDS.join(', ')}`);
    }
    return backend;
}

/**
 * Reads the configuration from `env`, falling back to defaults
 * for every unset variable. Throws if a value is out of range.
 */
export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
    const config: AppConfig = {
        port: parseInt(env.PORT || '6060', 10),
        storageBackend: parseStorageBackend(env.STORAGE_BACKEND || 'json'),
        jsonPath: env.HABITS_JSON_PATH || 'habits.json',
        databaseUrl: env.DATABASE_URL || undefined,
        staleDays: parseInt(env.STALE_DAYS || '7', 10),
        mostActiveLimit: parseInt(env.MOST_ACTIVE_LIMIT || '5', 10),
        corsOrigin: env.CORS_ORIGIN || '*',
    };

    validateAppConfig(config);
    return config;
}

export function validateAppConfig(config: AppConfig): void {
    if (!Number.isInteger(config.port) || config.port < 1 || config.port > 65535) {
        throw new Error('PORT must be between 1 and 65535');
    }

    if (config.storageBackend === 'postgres' && !config.databaseUrl) {
        throw new Error('DATABASE_URL environment variable is required when STORAGE_BACKEND=postgres');
    }

    if (config.storageBackend === 'json' && config.jsonPath.trim().length === 0) {
        throw new Error('HABITS_JSON_PATH cannot be empty');
    }

    if (!Number.isInteger(config.staleDays) || config.staleDays < 0) {
        throw new Error('STALE_DAYS must be a non-negative integer');
    }

    if (!Number.isInteger(config.mostActiveLimit) || config.mostActiveLimit < 1 || config.mostActiveLimit > 100) {
        throw new Error('MOST_ACTIVE_LIMIT must be between 1 and 100');
    }
}
