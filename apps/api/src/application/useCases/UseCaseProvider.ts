export type SConstructor<T> = new (...args: never[]) => T;

export class UseCaseProvider {
    private cache = new Map<SConstructor<unknown>, unknown>();
    private factories = new Map<SConstructor<unknown>, () => unknown>();

    register<T>(
        serviceType: SConstructor<T>,
        factory: () => T
    ): void {
        this.factories.set(serviceType, factory);
    }

    get<T>(serviceType: SConstructor<T>): T {
        if (!this.cache.has(serviceType)) {
            const factory = this.factories.get(serviceType);

            if (!factory) {
                throw new Error(
                    `Service ${serviceType.name} not registered`
                );
            }

            this.cache.set(serviceType, factory());
        }

        const service = this.cache.get(serviceType);
        if (!(service instanceof serviceType)) {
            throw new Error(`Service ${serviceType.name} factory returned an unrelated object`);
        }
        return service;
    }
}
