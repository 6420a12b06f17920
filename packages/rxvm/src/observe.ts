import { EventEmitter } from 'node:events'
import {
    combineLatest,
    distinctUntilChanged,
    filter,
    fromEvent,
    map,
    NEVER,
    Observable,
    of,
    skip,
    startWith,
    switchMap,
} from 'rxjs'
import { isAssignableTo, pickByAffinity, TypeKey, typeId, typeKeyOf, typeName } from './affinity'
import { RxvmError } from './errors'
import { chainToString, PropertyExpression, propertyChain } from './expression'
import { logFor } from './logging'
import { MemoCache } from './memo-cache'
import { isReactiveObject, ReactiveObject } from './reactive-object'
import { Locator, serviceKey } from './registry'
import { settings } from './settings'

export type ObservedChange<Sender, Value> = {
    sender: Sender
    path: readonly string[]
    value: Value
}

/**
 * Turns changes of one property on one kind of object into a signal stream.
 * The stream's values are ignored; the property is read after each signal.
 */
export interface ObservableForPropertyProvider {
    getAffinityForObject(type: TypeKey, propertyName: string, beforeChange: boolean): number
    getNotificationForProperty(
        sender: object,
        propertyName: string,
        beforeChange: boolean,
        suppressWarnings: boolean,
    ): Observable<unknown>
}

export const ObservableForPropertyKey = serviceKey<ObservableForPropertyProvider>('ObservableForPropertyProvider')

export class ReactiveObjectObservableForProperty implements ObservableForPropertyProvider {
    getAffinityForObject(type: TypeKey): number {
        return type !== Object && isAssignableTo(type, ReactiveObject) ? 10 : 0
    }

    getNotificationForProperty(sender: object, propertyName: string, beforeChange: boolean): Observable<unknown> {
        if (!isReactiveObject(sender)) {
            throw new RxvmError(`${typeName(typeKeyOf(sender))} is not a ReactiveObject`)
        }

        const events = beforeChange ? sender.changing : sender.changed

        return events.pipe(filter((event) => event.propertyName === propertyName))
    }
}

export const PROPERTY_CHANGED_EVENT = 'propertyChanged'
export const PROPERTY_CHANGING_EVENT = 'propertyChanging'

/**
 * Observes Node event emitters that announce changes by emitting
 * `propertyChanged` / `propertyChanging` with the property name.
 */
export class EventEmitterObservableForProperty implements ObservableForPropertyProvider {
    getAffinityForObject(type: TypeKey): number {
        return type !== Object && isAssignableTo(type, EventEmitter) ? 5 : 0
    }

    getNotificationForProperty(sender: object, propertyName: string, beforeChange: boolean): Observable<unknown> {
        if (!(sender instanceof EventEmitter)) {
            throw new RxvmError(`${typeName(typeKeyOf(sender))} is not an EventEmitter`)
        }

        const eventName = beforeChange ? PROPERTY_CHANGING_EVENT : PROPERTY_CHANGED_EVENT

        return fromEvent(sender, eventName).pipe(filter((name) => name === propertyName))
    }
}

/**
 * Last resort for objects that never announce changes: reports the current
 * value once and warns, once per type and property, that later changes are
 * invisible.
 */
export class PlainObjectObservableForProperty implements ObservableForPropertyProvider {
    private readonly warned = new Set<string>()
    private readonly log = logFor(this)

    getAffinityForObject(): number {
        return 1
    }

    getNotificationForProperty(
        sender: object,
        propertyName: string,
        _beforeChange: boolean,
        suppressWarnings: boolean,
    ): Observable<unknown> {
        const type = typeName(typeKeyOf(sender))
        const key = `${type}.${propertyName}`

        if (!suppressWarnings && !this.warned.has(key)) {
            this.warned.add(key)
            this.log.warn(`${key} is a plain property; changes to it will not be observed`)
        }

        return NEVER.pipe(startWith(propertyName))
    }
}

export const defaultPropertyObservers = (): ObservableForPropertyProvider[] => [
    new ReactiveObjectObservableForProperty(),
    new EventEmitterObservableForProperty(),
    new PlainObjectObservableForProperty(),
]

let builtInObservers: ObservableForPropertyProvider[] | undefined

const registeredObservers = (): ObservableForPropertyProvider[] => {
    const registered = Locator.current.getServices(ObservableForPropertyKey)

    if (registered.length > 0) {
        return registered
    }

    if (!builtInObservers) {
        builtInObservers = defaultPropertyObservers()
    }

    return builtInObservers
}

type ObserverRequest = {
    type: TypeKey
    propertyName: string
    beforeChange: boolean
}

const createObserverCache = () => {
    return new MemoCache<string, ObservableForPropertyProvider | undefined, ObserverRequest>(
        (_key, request) => {
            if (!request) {
                return undefined
            }

            return pickByAffinity(registeredObservers(), (provider) =>
                provider.getAffinityForObject(request.type, request.propertyName, request.beforeChange),
            )
        },
        { maxSize: settings.bigCacheLimit },
    )
}

let observerCache = createObserverCache()

Locator.onResolverChanged(() => {
    observerCache = createObserverCache()
})

export function getObserverForProperty(
    sender: object,
    propertyName: string,
    beforeChange: boolean,
): ObservableForPropertyProvider | undefined {
    const type = typeKeyOf(sender)
    const key = `${typeId(type)}|${propertyName}|${beforeChange}`

    return observerCache.get(key, { type, propertyName, beforeChange })
}

function notifyForProperty(
    sender: object,
    propertyName: string,
    beforeChange: boolean,
    suppressWarnings: boolean,
): Observable<unknown> {
    const provider = getObserverForProperty(sender, propertyName, beforeChange)

    if (!provider) {
        throw new RxvmError(
            `Could not find an ObservableForPropertyProvider for ${typeName(typeKeyOf(sender))}.${propertyName}; the service registry is probably misconfigured`,
        )
    }

    return provider.getNotificationForProperty(sender, propertyName, beforeChange, suppressWarnings)
}

type Link = {
    /** The object the property was read from, undefined while a link is missing. */
    sender: object | undefined
    value: unknown
}

const isObjectLike = (value: unknown): value is object => {
    return (typeof value === 'object' && value !== null) || typeof value === 'function'
}

function nestedChanges(propertyName: string, parent: Link, beforeChange: boolean, suppressWarnings: boolean): Observable<Link> {
    const sender = parent.value

    if (!isObjectLike(sender)) {
        return of({ sender: undefined, value: undefined })
    }

    const read = (): Link => ({ sender, value: Reflect.get(sender, propertyName) })

    return notifyForProperty(sender, propertyName, beforeChange, suppressWarnings).pipe(
        map(() => read()),
        startWith(read()),
    )
}

export type ObserveOptions = {
    /** Signal before the value changes instead of after. */
    beforeChange?: boolean
    /** Skip the current value and only report changes. */
    skipInitial?: boolean
    /** Drop consecutive identical values. */
    distinct?: boolean
    suppressWarnings?: boolean
}

// values read off the chain are typed by the expression that named the chain
const asValue = <Value>(value: unknown): Value => value as Value

/**
 * Follows `chain` from `source`, re-subscribing whenever an intermediate
 * link is replaced. Nothing is emitted while a link before the last is missing.
 */
export function subscribeToPropertyChain<Sender, Value>(
    source: Sender,
    chain: readonly string[],
    options: ObserveOptions = {},
): Observable<ObservedChange<Sender, Value>> {
    const { beforeChange = false, skipInitial = true, distinct = true, suppressWarnings = false } = options

    let notifier: Observable<Link> = of({ sender: undefined, value: source })

    for (const propertyName of chain) {
        notifier = notifier.pipe(switchMap((link) => nestedChanges(propertyName, link, beforeChange, suppressWarnings)))
    }

    if (skipInitial) {
        notifier = notifier.pipe(skip(1))
    }

    const changes = notifier.pipe(
        filter((link) => link.sender !== undefined),
        map((link) => ({ sender: source, path: chain, value: asValue<Value>(link.value) })),
    )

    return distinct ? changes.pipe(distinctUntilChanged((a, b) => Object.is(a.value, b.value))) : changes
}

/**
 * Changes of the property reached by `expression`; by default only future
 * changes, without the current value.
 */
export function observableForProperty<Sender, Value>(
    source: Sender,
    expression: PropertyExpression<Sender, Value>,
    options: ObserveOptions = {},
): Observable<ObservedChange<Sender, Value>> {
    return subscribeToPropertyChain<Sender, Value>(source, propertyChain(expression), options)
}

const valuesOf = <Sender, Value>(source: Sender, expression: PropertyExpression<Sender, Value>): Observable<Value> => {
    return observableForProperty(source, expression, { skipInitial: false }).pipe(map((change) => change.value))
}

export function whenAnyValue<S, V1>(source: S, p1: PropertyExpression<S, V1>): Observable<V1>
export function whenAnyValue<S, V1, V2>(
    source: S,
    p1: PropertyExpression<S, V1>,
    p2: PropertyExpression<S, V2>,
): Observable<[V1, V2]>
export function whenAnyValue<S, V1, V2, V3>(
    source: S,
    p1: PropertyExpression<S, V1>,
    p2: PropertyExpression<S, V2>,
    p3: PropertyExpression<S, V3>,
): Observable<[V1, V2, V3]>
export function whenAnyValue<S, V1, V2, V3, V4>(
    source: S,
    p1: PropertyExpression<S, V1>,
    p2: PropertyExpression<S, V2>,
    p3: PropertyExpression<S, V3>,
    p4: PropertyExpression<S, V4>,
): Observable<[V1, V2, V3, V4]>
export function whenAnyValue<S>(source: S, ...expressions: Array<PropertyExpression<S, unknown>>): Observable<unknown> {
    if (expressions.length === 1) {
        return valuesOf(source, expressions[0])
    }

    return combineLatest(expressions.map((expression) => valuesOf(source, expression)))
}

export function whenAny<S, V1, R>(
    source: S,
    properties: [PropertyExpression<S, V1>],
    selector: (c1: ObservedChange<S, V1>) => R,
): Observable<R>
export function whenAny<S, V1, V2, R>(
    source: S,
    properties: [PropertyExpression<S, V1>, PropertyExpression<S, V2>],
    selector: (c1: ObservedChange<S, V1>, c2: ObservedChange<S, V2>) => R,
): Observable<R>
export function whenAny<S, V1, V2, V3, R>(
    source: S,
    properties: [PropertyExpression<S, V1>, PropertyExpression<S, V2>, PropertyExpression<S, V3>],
    selector: (c1: ObservedChange<S, V1>, c2: ObservedChange<S, V2>, c3: ObservedChange<S, V3>) => R,
): Observable<R>
export function whenAny<S, R>(
    source: S,
    properties: Array<PropertyExpression<S, unknown>>,
    selector: (...changes: Array<ObservedChange<S, never>>) => R,
): Observable<R> {
    const changes = properties.map((expression) => observableForProperty(source, expression, { skipInitial: false }))

    return combineLatest(changes).pipe(map((latest) => Reflect.apply(selector, undefined, latest)))
}

/**
 * Emits from whichever observable the property currently holds.
 */
export function whenAnyObservable<S, T>(
    source: S,
    expression: PropertyExpression<S, Observable<T> | null | undefined>,
): Observable<T> {
    return valuesOf(source, expression).pipe(switchMap((inner) => inner ?? NEVER))
}

export const describeChain = chainToString
