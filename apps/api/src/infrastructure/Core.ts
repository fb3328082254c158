import { RegistryRepositoryProvider } from './repositories/RepositoryProvider';
import { type SConstructor, UseCaseProvider } from '../application/useCases/UseCaseProvider';
import { HabitRepository } from '../domain/entities/HabitRepository';
import { DrizzleHabitRepository } from './repositories/DrizzleHabitRepository';
import { JsonFileHabitRepository } from './repositories/JsonFileHabitRepository';
import { InMemoryHabitRepository } from './repositories/InMemoryHabitRepository';
import { createDatabase, type DatabaseConnection } from './db';
import { SystemClock } from './providers/SystemClock';
import type { ClockProvider } from '../application/providers/ClockProvider';
import type { AppConfig } from '../application/config/appConfig';
import { CreateHabit } from '../application/useCases/CreateHabit';
import { GetHabits } from '../application/useCases/GetHabits';
import { RenameHabit } from '../application/useCases/RenameHabit';
import { DeleteHabit } from '../application/useCases/DeleteHabit';
import { CheckOffHabit } from '../application/useCases/CheckOffHabit';
import { GetHabitAnalytics } from '../application/useCases/GetHabitAnalytics';
import { SeedSampleHabits } from '../application/useCases/SeedSampleHabits';
import logger from './logger';

/**
 * Composition root: picks the storage backend from configuration and wires
 * every use case to it. One instance per process, passed to whoever needs it.
 */
export class Core {
    public repositories = new RegistryRepositoryProvider();
    public useCases = new UseCaseProvider();
    private connection: DatabaseConnection | null = null;

    constructor(
        public readonly config: AppConfig,
        public readonly clock: ClockProvider = new SystemClock(),
    ) {
        this.initializeRepositories();
        this.initializeServices();
    }

    private initializeRepositories() {
        switch (this.config.storageBackend) {
            case 'postgres':
                this.repositories.register(HabitRepository, () => new DrizzleHabitRepository(this.openDatabase().db));
                break;
            case 'json':
                this.repositories.register(HabitRepository, () => new JsonFileHabitRepository(this.config.jsonPath));
                break;
            case 'memory':
                this.repositories.register(HabitRepository, () => new InMemoryHabitRepository());
                break;
        }
        logger.info('Habit storage configured', { backend: this.config.storageBackend });
    }

    private initializeServices() {
        this.useCases.register(CreateHabit, () => new CreateHabit(this.repositories, this.clock));
        this.useCases.register(GetHabits, () => new GetHabits(this.repositories));
        this.useCases.register(RenameHabit, () => new RenameHabit(this.repositories));
        this.useCases.register(DeleteHabit, () => new DeleteHabit(this.repositories));
        this.useCases.register(CheckOffHabit, () => new CheckOffHabit(this.repositories, this.clock));
        this.useCases.register(GetHabitAnalytics, () => new GetHabitAnalytics(this.repositories, this.clock, {
            staleDays: this.config.staleDays,
            mostActiveLimit: this.config.mostActiveLimit,
        }));
        this.useCases.register(SeedSampleHabits, () => new SeedSampleHabits(this.repositories, this.clock));
    }

    public getUseCase<T>(serviceType: SConstructor<T>): T {
        return this.useCases.get(serviceType);
    }

    /** Round-trips the storage backend; rejects with StorageFailureError when it is unreachable. */
    public async checkStorage(): Promise<number> {
        return this.repositories.get(HabitRepository).count();
    }

    public async close(): Promise<void> {
        if (this.connection) {
            await this.connection.pool.end();
            this.connection = null;
        }
    }

    private openDatabase(): DatabaseConnection {
        if (!this.connection) {
            if (!this.config.databaseUrl) {
                throw new Error("DATABASE_URL environment variable is not set");
            }
            this.connection = createDatabase(this.config.databaseUrl);
        }
        return this.connection;
    }
}
