import { ActivationForViewFetcherKey, CanActivateViewFetcher } from './activation'
import { Logger, LoggerKey } from './logging'
import { defaultPropertyObservers, ObservableForPropertyKey } from './observe'
import { DependencyResolver, Locator, ServiceRegistry } from './registry'
import { DefaultViewLocator, ViewLocatorKey } from './view-locator'

/**
 * Adds a package's services to a registry.
 */
export type RegistrationModule = (registry: ServiceRegistry) => void

export const coreModule: RegistrationModule = (registry) => {
    for (const observer of defaultPropertyObservers()) {
        registry.registerConstant(observer, ObservableForPropertyKey)
    }

    registry.registerConstant(new CanActivateViewFetcher(), ActivationForViewFetcherKey)
    registry.registerLazySingleton(() => new DefaultViewLocator(), ViewLocatorKey)
}

/**
 * Collects registrations and applies them in order:
 *
 * ```ts
 * new RxvmBuilder().withCoreServices().withModule(bindingModule).withLogger(new NullLogger()).build()
 * ```
 */
export class RxvmBuilder {
    private readonly modules: RegistrationModule[] = []
    private coreServices = false

    withCoreServices(): this {
        if (!this.coreServices) {
            this.coreServices = true
            this.modules.push(coreModule)
        }

        return this
    }

    withModule(module: RegistrationModule): this {
        this.modules.push(module)
        return this
    }

    withRegistration(register: (registry: ServiceRegistry) => void): this {
        return this.withModule(register)
    }

    withLogger(logger: Logger): this {
        return this.withModule((registry) => registry.registerConstant(logger, LoggerKey))
    }

    /** Applies every registration to `resolver` without installing it. */
    buildInto<Registry extends ServiceRegistry>(resolver: Registry): Registry {
        for (const module of this.modules) {
            module(resolver)
        }

        return resolver
    }

    /** Applies every registration to a fresh registry and makes it current. */
    build(): ServiceRegistry {
        const resolver = this.buildInto(new DependencyResolver())

        Locator.setResolver(resolver)

        return resolver
    }
}
