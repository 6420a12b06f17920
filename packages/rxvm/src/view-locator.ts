import { TypeKey, typeKeyOf, typeName } from './affinity'
import { ViewLocationError } from './errors'
import { logFor } from './logging'
import { Locator, ServiceKey, serviceKey, ServiceRegistry } from './registry'
import { ViewFor } from './view-for'

export interface ViewLocator {
    resolveView(viewModel: unknown, contract?: string): ViewFor | undefined
}

export const ViewLocatorKey = serviceKey<ViewLocator>('ViewLocator')

export type ViewFactory = () => ViewFor

const keysByType = new WeakMap<TypeKey, ServiceKey<ViewFor>>()
const keysByName = new Map<string, ServiceKey<ViewFor>>()

const viewKeyForType = (type: TypeKey): ServiceKey<ViewFor> => {
    let key = keysByType.get(type)

    if (!key) {
        key = serviceKey<ViewFor>(`ViewFor<${typeName(type)}>`)
        keysByType.set(type, key)
    }

    return key
}

const viewKeyForName = (viewName: string): ServiceKey<ViewFor> => {
    let key = keysByName.get(viewName)

    if (!key) {
        key = serviceKey<ViewFor>(viewName)
        keysByName.set(viewName, key)
    }

    return key
}

/**
 * Registers the view shown for instances of `viewModelType` (and its subclasses).
 */
export function registerViewFor(
    viewModelType: TypeKey,
    factory: ViewFactory,
    contract?: string,
    resolver: ServiceRegistry = Locator.current,
): void {
    resolver.register(factory, viewKeyForType(viewModelType), contract)
}

/**
 * Registers a view by name, found through the view model naming convention.
 */
export function registerView(
    viewName: string,
    factory: ViewFactory,
    contract?: string,
    resolver: ServiceRegistry = Locator.current,
): void {
    resolver.register(factory, viewKeyForName(viewName), contract)
}

export const defaultViewModelToViewName = (viewModelName: string): string => {
    return viewModelName.replace(/ViewModel$/, 'View')
}

function* typeHierarchy(type: TypeKey): Generator<TypeKey> {
    let current: unknown = type

    while (typeof current === 'function' && current !== Function.prototype) {
        yield current
        current = Reflect.getPrototypeOf(current)
    }
}

/**
 * Looks for a view registered for the view model's type or one of its base
 * types, then for a view named after the view model (`LoginViewModel` →
 * `LoginView`).
 */
export class DefaultViewLocator implements ViewLocator {
    private readonly log = logFor(this)

    constructor(readonly viewModelToViewName: (viewModelName: string) => string = defaultViewModelToViewName) {}

    resolveView(viewModel: unknown, contract?: string): ViewFor | undefined {
        const type = typeKeyOf(viewModel)
        const resolver = Locator.current

        for (const candidate of typeHierarchy(type)) {
            const view = resolver.getService(viewKeyForType(candidate), contract)

            if (view) {
                this.log.debug(`Resolved view for ${typeName(candidate)}`)
                return view
            }
        }

        const viewName = this.viewModelToViewName(typeName(type))
        const named = resolver.getService(viewKeyForName(viewName), contract)

        if (named) {
            this.log.debug(`Resolved view ${viewName} by name`)
            return named
        }

        this.log.warn(`Couldn't find a view for ${typeName(type)}${contract ? ` (contract: ${contract})` : ''}`)

        return undefined
    }
}

export function currentViewLocator(): ViewLocator {
    return Locator.current.getService(ViewLocatorKey) ?? new DefaultViewLocator()
}

/**
 * Like `resolveView` on the current locator, but throws when no view is found.
 */
export function requireView(viewModel: unknown, contract?: string): ViewFor {
    const view = currentViewLocator().resolveView(viewModel, contract)

    if (!view) {
        throw new ViewLocationError(`No view registered for ${typeName(typeKeyOf(viewModel))}`)
    }

    return view
}
