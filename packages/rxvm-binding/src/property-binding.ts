import {
    combineLatest,
    EMPTY,
    filter,
    map,
    merge,
    mergeMap,
    Observable,
    of,
    share,
    Subject,
    Subscription,
    take,
    Unsubscribable,
} from 'rxjs'
import {
    chainToString,
    getChainValue,
    getChainValues,
    isBindableCommand,
    Locator,
    logFor,
    PropertyExpression,
    propertyChain,
    serviceKey,
    setChainValue,
    settings,
    subscribeToPropertyChain,
    typeKeyOf,
    typeName,
    ViewFor,
    ViewModelOf,
} from 'rxvm'
import { Conversion, ConverterService, currentConverterService, ok, Ok } from './converters'

export type BindingDirection = 'oneWay' | 'twoWay'

/**
 * A live binding. Closing it stops every update it drives.
 */
export class ReactiveBinding<View, Value> implements Unsubscribable {
    constructor(
        readonly view: View,
        readonly viewPath: readonly string[],
        readonly viewModelPath: readonly string[],
        /** Values written to the target, in the direction of the binding. */
        readonly changed: Observable<Value>,
        readonly direction: BindingDirection,
        private readonly subscription: Subscription,
    ) {}

    get closed(): boolean {
        return this.subscription.closed
    }

    dispose(): void {
        this.subscription.unsubscribe()
    }

    unsubscribe(): void {
        this.dispose()
    }
}

export type ChainLink = ReturnType<typeof getChainValues>[number]

export type BindingHookContext = {
    viewModel: unknown
    view: object
    /** Values along the view model side of the binding, read at call time. */
    viewModelValues: () => ChainLink[]
    viewValues: () => ChainLink[]
    direction: BindingDirection
}

/**
 * Consulted before a binding is created; returning false cancels it.
 */
export interface PropertyBindingHook {
    executeHook(context: BindingHookContext): boolean
}

export const PropertyBindingHookKey = serviceKey<PropertyBindingHook>('PropertyBindingHook')

const log = logFor('PropertyBinder')

const describeSide = (owner: unknown, chain: readonly string[]) => {
    return `${typeName(typeKeyOf(owner))}.${chainToString(chain)}`
}

function evalBindingHooks(context: BindingHookContext, viewModelPath: readonly string[], viewPath: readonly string[]): boolean {
    const hooks = Locator.current.getServices(PropertyBindingHookKey)
    const shouldBind = hooks.every((hook) => hook.executeHook(context))

    if (!shouldBind) {
        log.warn(
            `Binding hook asked to disable binding ${describeSide(context.viewModel, viewModelPath)} => ${describeSide(context.view, viewPath)}`,
        )
    }

    return shouldBind
}

const isObjectLike = (value: unknown): value is object => {
    return (typeof value === 'object' && value !== null) || typeof value === 'function'
}

function convertFor(service: ConverterService, value: unknown, current: unknown, conversionHint: unknown): Conversion<unknown> {
    return service.convert(value, typeKeyOf(current), conversionHint)
}

// values read off a chain are typed by the expression that named the chain
const asDeclared = <T>(value: unknown): T => value as T

function accepted(conversion: Conversion<unknown>, path: readonly string[]): conversion is Ok<unknown> {
    if (conversion.type === 'err') {
        log.debug(`Skipped a value for ${chainToString(path)}: ${conversion.error}`)
        return false
    }

    return true
}

/**
 * Values of the view model property reached through `view.viewModel`,
 * following view model swaps. Emits the current value first.
 */
function viewModelValues(view: object, viewModelPath: readonly string[]): Observable<unknown> {
    return subscribeToPropertyChain<object, unknown>(view, ['viewModel', ...viewModelPath], { skipInitial: false }).pipe(
        map((change) => change.value),
    )
}

function setThenGet(service: ConverterService, host: object, name: string, value: unknown): unknown {
    const current: unknown = Reflect.get(host, name)
    const fromType = value === undefined || value === null ? undefined : typeKeyOf(value)
    const setter = service.resolveSetMethodConverter(fromType, current === undefined || current === null ? undefined : typeKeyOf(current))

    if (setter) {
        return setter.performSet(current, value)
    }

    Reflect.set(host, name, value)

    return Reflect.get(host, name)
}

/**
 * Writes every value of `source` to `chain` on `target`. When the chain has
 * more than one link, writes follow replacements of the parent object.
 */
function bindToDirect(
    source: Observable<unknown>,
    target: object,
    chain: readonly string[],
): { subscription: Subscription; changed: Observable<unknown> } {
    const service = currentConverterService()
    const parentPath = chain.slice(0, -1)
    const name = chain[chain.length - 1]

    const hosts: Observable<unknown> =
        parentPath.length === 0
            ? of(target)
            : subscribeToPropertyChain<object, unknown>(target, parentPath, { skipInitial: false }).pipe(map((change) => change.value))

    const changed = combineLatest([source, hosts]).pipe(
        filter((pair): pair is [unknown, object] => isObjectLike(pair[1])),
        map(([value, host]) => setThenGet(service, host, name, value)),
        share(),
    )

    const subscription = changed.subscribe({
        error: (error: unknown) => log.error(`${chainToString(chain)} binding received an error`, error),
    })

    return { subscription, changed }
}

const warnIfCommand = (value: unknown, viewModelPath: readonly string[]) => {
    if (isBindableCommand(value) && !settings.suppressViewCommandBindingMessage) {
        log.warn(`${chainToString(viewModelPath)} is a command, bindCommand is usually what you want`)
    }
}

export type BindingChange = {
    value: unknown
    /** True when the view model side changed and the view was updated. */
    isViewModel: boolean
}

export type BindOptions<VMValue, ViewValue> = {
    /** Handed to the converters, e.g. the number of fraction digits. */
    conversionHint?: unknown
    vmToViewConverter?: (value: VMValue) => ViewValue
    viewToVmConverter?: (value: ViewValue) => VMValue
    /** When given, the view is refreshed from the view model only when this emits. */
    signalViewUpdate?: Observable<unknown>
}

/**
 * Two-way binding between a view model property and a view property. The
 * view model's value is written to the view first.
 */
export function bind<View extends ViewFor, VMValue, ViewValue>(
    view: View,
    vmProperty: PropertyExpression<ViewModelOf<View>, VMValue>,
    viewProperty: PropertyExpression<View, ViewValue>,
    options: BindOptions<VMValue, ViewValue> = {},
): ReactiveBinding<View, BindingChange> {
    const { conversionHint, vmToViewConverter, viewToVmConverter, signalViewUpdate } = options
    const viewModelPath = propertyChain(vmProperty)
    const viewPath = propertyChain(viewProperty)
    const fullViewModelPath = ['viewModel', ...viewModelPath]
    const service = currentConverterService()

    const shouldBind = evalBindingHooks(
        {
            viewModel: view.viewModel,
            view,
            viewModelValues: () => getChainValues(view.viewModel, viewModelPath),
            viewValues: () => getChainValues(view, viewPath),
            direction: 'twoWay',
        },
        viewModelPath,
        viewPath,
    )

    if (!shouldBind) {
        return new ReactiveBinding<View, BindingChange>(view, viewPath, viewModelPath, EMPTY, 'twoWay', new Subscription())
    }

    const toView = (value: unknown, current: unknown): Conversion<unknown> => {
        if (vmToViewConverter) {
            return ok(vmToViewConverter(asDeclared<VMValue>(value)))
        }

        return convertFor(service, value, current, conversionHint)
    }

    const toViewModel = (value: unknown, current: unknown): Conversion<unknown> => {
        if (viewToVmConverter) {
            return ok(viewToVmConverter(asDeclared<ViewValue>(value)))
        }

        return convertFor(service, value, current, conversionHint)
    }

    const initialUpdate = new Subject<boolean>()
    const vmChanged = viewModelValues(view, viewModelPath).pipe(map(() => true))
    const viewChanged = subscribeToPropertyChain<View, unknown>(view, viewPath, { skipInitial: false }).pipe(map(() => false))

    const somethingChanged = merge(
        signalViewUpdate ? merge(signalViewUpdate.pipe(map(() => true)), vmChanged.pipe(take(1))) : vmChanged,
        initialUpdate,
        viewChanged,
    )

    const changes = somethingChanged.pipe(
        mergeMap((isViewModel): Observable<BindingChange> => {
            const vmValue = getChainValue(view, fullViewModelPath)
            const viewValue = getChainValue(view, viewPath)

            if (!vmValue.found || !viewValue.found) {
                return EMPTY
            }

            const conversion = isViewModel ? toView(vmValue.value, viewValue.value) : toViewModel(viewValue.value, vmValue.value)

            if (!accepted(conversion, isViewModel ? viewPath : viewModelPath)) {
                return EMPTY
            }

            const unchanged = Object.is(conversion.value, isViewModel ? viewValue.value : vmValue.value)

            return unchanged ? EMPTY : of({ value: conversion.value, isViewModel })
        }),
        share(),
    )

    const subscription = changes.subscribe({
        next: (change) => {
            if (change.isViewModel) {
                setChainValue(view, viewPath, change.value)
            } else {
                setChainValue(view, fullViewModelPath, change.value)
            }
        },
        error: (error: unknown) => log.error(`${describeSide(view, viewPath)} binding received an error`, error),
    })

    initialUpdate.next(true)

    return new ReactiveBinding(view, viewPath, viewModelPath, changes, 'twoWay', subscription)
}

export type OneWayBindOptions = {
    conversionHint?: unknown
}

/**
 * Keeps a view property in sync with a view model property. A selector
 * function replaces the converters.
 */
export function oneWayBind<View extends ViewFor, VMValue, ViewValue>(
    view: View,
    vmProperty: PropertyExpression<ViewModelOf<View>, VMValue>,
    viewProperty: PropertyExpression<View, ViewValue>,
    selectorOrOptions?: ((value: VMValue) => ViewValue) | OneWayBindOptions,
): ReactiveBinding<View, unknown> {
    const viewModelPath = propertyChain(vmProperty)
    const viewPath = propertyChain(viewProperty)

    const shouldBind = evalBindingHooks(
        {
            viewModel: view.viewModel,
            view,
            viewModelValues: () => getChainValues(view.viewModel, viewModelPath),
            viewValues: () => getChainValues(view, viewPath),
            direction: 'oneWay',
        },
        viewModelPath,
        viewPath,
    )

    if (!shouldBind) {
        return new ReactiveBinding<View, unknown>(view, viewPath, viewModelPath, EMPTY, 'oneWay', new Subscription())
    }

    const values = viewModelValues(view, viewModelPath)
    let source: Observable<unknown>

    if (typeof selectorOrOptions === 'function') {
        source = values.pipe(map((value) => selectorOrOptions(asDeclared<VMValue>(value))))
    } else {
        const service = currentConverterService()
        const conversionHint = selectorOrOptions?.conversionHint

        source = values.pipe(
            mergeMap((value) => {
                warnIfCommand(value, viewModelPath)

                const conversion = convertFor(service, value, getCurrent(view, viewPath), conversionHint)

                return accepted(conversion, viewPath) ? of(conversion.value) : EMPTY
            }),
        )
    }

    const { subscription, changed } = bindToDirect(source, view, viewPath)

    return new ReactiveBinding(view, viewPath, viewModelPath, changed, 'oneWay', subscription)
}

const getCurrent = (target: unknown, path: readonly string[]): unknown => {
    const current = getChainValue(target, path)

    return current.found ? current.value : undefined
}

export type BindToOptions = {
    conversionHint?: unknown
}

/**
 * Writes every value of `source` to the property of `target` reached by
 * `property`, converting it to the type the property currently holds.
 */
export function bindTo<Value, Target extends object, TargetValue>(
    source: Observable<Value>,
    target: Target,
    property: PropertyExpression<Target, TargetValue>,
    options: BindToOptions = {},
): Subscription {
    const path = propertyChain(property)

    const shouldBind = evalBindingHooks(
        {
            viewModel: source,
            view: target,
            viewModelValues: () => [],
            viewValues: () => getChainValues(target, path),
            direction: 'oneWay',
        },
        [],
        path,
    )

    if (!shouldBind) {
        return new Subscription()
    }

    const service = currentConverterService()

    const converted = source.pipe(
        mergeMap((value) => {
            const conversion = convertFor(service, value, getCurrent(target, path), options.conversionHint)

            return accepted(conversion, path) ? of(conversion.value) : EMPTY
        }),
    )

    return bindToDirect(converted, target, path).subscription
}
