export type RConstructor<T> = abstract new (...args: never[]) => T;

export abstract class RepositoryProvider {
    abstract get<T>(repositoryType: RConstructor<T>): T;
}

export class RegistryRepositoryProvider extends RepositoryProvider {
    private cache = new Map<RConstructor<unknown>, unknown>();
    private factories = new Map<RConstructor<unknown>, () => unknown>();

    register<T>(
        abstraction: RConstructor<T>,
        factory: () => T
    ): void {
        this.factories.set(abstraction, factory);
        this.cache.delete(abstraction);
    }

    get<T>(repositoryType: RConstructor<T>): T {
        if (!this.cache.has(repositoryType)) {
            const factory = this.factories.get(repositoryType);

            if (!factory) {
                throw new Error(
                    `${repositoryType.name} not registered`
                );
            }

            this.cache.set(repositoryType, factory());
        }

        const instance = this.cache.get(repositoryType);
        if (!(instance instanceof repositoryType)) {
            throw new Error(`${repositoryType.name} factory returned an unrelated object`);
        }
        return instance;
    }
}
