import { Subscription } from 'rxjs'
import { ServiceResolutionError } from './errors'

declare const serviceType: unique symbol

/**
 * A typed capability key. The phantom `serviceType` member only carries `T`
 * through the type checker; at run time a key is a plain symbol wrapper.
 */
export type ServiceKey<T> = {
    readonly id: symbol
    readonly description: string
    readonly [serviceType]?: T
}

export const serviceKey = <T>(description: string): ServiceKey<T> => {
    return {
        id: Symbol(description),
        description,
    }
}

export type ServiceFactory<T> = () => T

export type RegistrationCallback = (subscription: Subscription) => void

export interface ReadonlyServiceRegistry {
    getService<T>(key: ServiceKey<T>, contract?: string): T | undefined
    getServices<T>(key: ServiceKey<T>, contract?: string): T[]
    hasRegistration<T>(key: ServiceKey<T>, contract?: string): boolean
}

export interface ServiceRegistry extends ReadonlyServiceRegistry {
    register<T>(factory: ServiceFactory<T>, key: ServiceKey<T>, contract?: string): void
    registerConstant<T>(value: T, key: ServiceKey<T>, contract?: string): void
    registerLazySingleton<T>(factory: ServiceFactory<T>, key: ServiceKey<T>, contract?: string): void
    unregisterCurrent<T>(key: ServiceKey<T>, contract?: string): void
    unregisterAll<T>(key: ServiceKey<T>, contract?: string): void
    serviceRegistrationCallback<T>(key: ServiceKey<T>, callback: RegistrationCallback, contract?: string): Subscription
}

type Entry = {
    factories: Array<ServiceFactory<unknown>>
    callbacks: RegistrationCallback[]
}

const DEFAULT_CONTRACT = '\u0000default'

/**
 * Keeps registrations per `(key, contract)` pair. The most recent registration
 * wins for `getService`; `getServices` returns every provider in registration order.
 */
export class DependencyResolver implements ServiceRegistry {
    private readonly entries = new Map<symbol, Map<string, Entry>>()

    private entry<T>(key: ServiceKey<T>, contract: string | undefined): Entry {
        let byContract = this.entries.get(key.id)

        if (!byContract) {
            byContract = new Map()
            this.entries.set(key.id, byContract)
        }

        const name = contract ?? DEFAULT_CONTRACT
        let entry = byContract.get(name)

        if (!entry) {
            entry = { factories: [], callbacks: [] }
            byContract.set(name, entry)
        }

        return entry
    }

    private peek<T>(key: ServiceKey<T>, contract: string | undefined): Entry | undefined {
        return this.entries.get(key.id)?.get(contract ?? DEFAULT_CONTRACT)
    }

    getService<T>(key: ServiceKey<T>, contract?: string): T | undefined {
        const factories = this.peek(key, contract)?.factories

        if (!factories || factories.length === 0) {
            return undefined
        }

        return resolveWith<T>(factories[factories.length - 1])
    }

    getServices<T>(key: ServiceKey<T>, contract?: string): T[] {
        const factories = this.peek(key, contract)?.factories ?? []

        return factories.map((factory) => resolveWith<T>(factory))
    }

    hasRegistration<T>(key: ServiceKey<T>, contract?: string): boolean {
        const factories = this.peek(key, contract)?.factories

        return factories !== undefined && factories.length > 0
    }

    register<T>(factory: ServiceFactory<T>, key: ServiceKey<T>, contract?: string): void {
        const entry = this.entry(key, contract)

        entry.factories.push(factory)

        for (const callback of [...entry.callbacks]) {
            callback(new Subscription(() => removeItem(entry.callbacks, callback)))
        }
    }

    registerConstant<T>(value: T, key: ServiceKey<T>, contract?: string): void {
        this.register(() => value, key, contract)
    }

    registerLazySingleton<T>(factory: ServiceFactory<T>, key: ServiceKey<T>, contract?: string): void {
        let holder: { value: T } | undefined

        this.register(() => {
            if (!holder) {
                holder = { value: factory() }
            }

            return holder.value
        }, key, contract)
    }

    unregisterCurrent<T>(key: ServiceKey<T>, contract?: string): void {
        this.peek(key, contract)?.factories.pop()
    }

    unregisterAll<T>(key: ServiceKey<T>, contract?: string): void {
        const entry = this.peek(key, contract)

        if (entry) {
            entry.factories.length = 0
        }
    }

    serviceRegistrationCallback<T>(key: ServiceKey<T>, callback: RegistrationCallback, contract?: string): Subscription {
        const entry = this.entry(key, contract)
        const subscription = new Subscription(() => removeItem(entry.callbacks, callback))

        entry.callbacks.push(callback)

        // existing registrations are reported once each
        for (let i = 0; i < entry.factories.length; i++) {
            callback(subscription)
        }

        return subscription
    }
}

export function requireService<T>(resolver: ReadonlyServiceRegistry, key: ServiceKey<T>, contract?: string): T {
    if (!resolver.hasRegistration(key, contract)) {
        throw new ServiceResolutionError(
            `No service registered for ${key.description}${contract ? ` (contract: ${contract})` : ''}`,
            key.description,
            contract,
        )
    }

    const service = resolver.getService(key, contract)

    if (service === undefined) {
        throw new ServiceResolutionError(`Service ${key.description} resolved to undefined`, key.description, contract)
    }

    return service
}

// factories are stored erased; every factory was registered under a ServiceKey<T>
function resolveWith<T>(factory: ServiceFactory<unknown>): T {
    const typed: ServiceFactory<T> = factory as ServiceFactory<T>
    return typed()
}

function removeItem<T>(list: T[], item: T): void {
    const index = list.indexOf(item)

    if (index !== -1) {
        list.splice(index, 1)
    }
}

type ResolverListener = () => void

let currentResolver: ServiceRegistry = new DependencyResolver()
const resolverListeners: ResolverListener[] = []

export const Locator = {
    get current(): ServiceRegistry {
        return currentResolver
    },

    setResolver(resolver: ServiceRegistry): void {
        currentResolver = resolver

        for (const listener of [...resolverListeners]) {
            listener()
        }
    },

    /**
     * Runs `listener` now and after every resolver swap.
     */
    onResolverChanged(listener: ResolverListener): Subscription {
        resolverListeners.push(listener)
        listener()

        return new Subscription(() => removeItem(resolverListeners, listener))
    },
}

/**
 * Installs `resolver` (a fresh one by default) as the current locator until
 * the returned subscription is closed.
 */
export function withResolver(resolver: ServiceRegistry = new DependencyResolver()): Subscription {
    const previous = Locator.current

    Locator.setResolver(resolver)

    return new Subscription(() => Locator.setResolver(previous))
}
