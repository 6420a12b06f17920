import { isAssignableTo, Locator, MemoCache, pickByAffinity, serviceKey, settings, TypeKey, typeId, typeKeyOf, typeName } from 'rxvm'

export type Ok<T> = {
    type: 'ok'
    value: T
}

export type ConversionErr = {
    type: 'err'
    name: 'ConversionErr'
    error: string
}

/**
 * Outcome of a binding conversion. Converters report failure with an `err`
 * value and never throw; the binding then skips the value.
 */
export type Conversion<T> = Ok<T> | ConversionErr

export const ok = <T>(value: T): Ok<T> => {
    return {
        type: 'ok',
        value,
    }
}

export const conversionErr = (error: string): ConversionErr => {
    return {
        type: 'err',
        name: 'ConversionErr',
        error,
    }
}

/**
 * Converts between one exact pair of types.
 */
export interface BindingTypeConverter {
    readonly fromType: TypeKey
    readonly toType: TypeKey
    getAffinityForObjects(): number
    tryConvert(from: unknown, conversionHint?: unknown): Conversion<unknown>
}

/**
 * Decides at run time whether it can handle a pair of types. Consulted when
 * no typed converter matches.
 */
export interface BindingFallbackConverter {
    getAffinityForObjects(fromType: TypeKey, toType: TypeKey): number
    tryConvert(from: unknown, toType: TypeKey, conversionHint?: unknown): Conversion<unknown>
}

/**
 * Replaces the plain property assignment at the end of a binding, e.g. to
 * refill a collection in place instead of swapping it.
 */
export interface SetMethodBindingConverter {
    getAffinityForObjects(fromType: TypeKey | undefined, toType: TypeKey | undefined): number
    /** Applies `newValue` to `current` and returns what the target holds afterwards. */
    performSet(current: unknown, newValue: unknown): unknown
}

type TypedConverterOptions<From, To> = {
    fromType: TypeKey
    toType: TypeKey
    affinity?: number
    accepts: (value: unknown) => value is From
    convert: (from: From, conversionHint: unknown) => Conversion<To>
}

/**
 * Builds a typed converter out of a guard and a conversion function.
 */
export function typedConverter<From, To>(options: TypedConverterOptions<From, To>): BindingTypeConverter {
    const { fromType, toType, affinity = 2, accepts, convert } = options

    return {
        fromType,
        toType,
        getAffinityForObjects: () => affinity,
        tryConvert(from, conversionHint) {
            if (!accepts(from)) {
                return conversionErr(`Expected a ${typeName(fromType)}, got ${typeName(typeKeyOf(from))}`)
            }

            return convert(from, conversionHint)
        },
    }
}

const isString = (value: unknown): value is string => typeof value === 'string'
const isNumber = (value: unknown): value is number => typeof value === 'number'
const isBoolean = (value: unknown): value is boolean => typeof value === 'boolean'
const isBigInt = (value: unknown): value is bigint => typeof value === 'bigint'
const isDate = (value: unknown): value is Date => value instanceof Date

export const numberToStringConverter = typedConverter({
    fromType: Number,
    toType: String,
    accepts: isNumber,
    convert: (from, hint) => {
        // a numeric hint is the number of fraction digits
        if (typeof hint === 'number' && Number.isInteger(hint) && hint >= 0 && hint <= 100) {
            return ok(from.toFixed(hint))
        }

        return ok(String(from))
    },
})

export const stringToNumberConverter = typedConverter({
    fromType: String,
    toType: Number,
    accepts: isString,
    convert: (from) => {
        const text = from.trim()
        const value = Number(text)

        if (text === '' || Number.isNaN(value)) {
            return conversionErr(`"${from}" is not a number`)
        }

        return ok(value)
    },
})

export const booleanToStringConverter = typedConverter({
    fromType: Boolean,
    toType: String,
    accepts: isBoolean,
    convert: (from) => ok(String(from)),
})

export const stringToBooleanConverter = typedConverter({
    fromType: String,
    toType: Boolean,
    accepts: isString,
    convert: (from) => {
        switch (from.trim().toLowerCase()) {
            case 'true':
                return ok(true)
            case 'false':
                return ok(false)
            default:
                return conversionErr(`"${from}" is not a boolean`)
        }
    },
})

export const bigintToStringConverter = typedConverter({
    fromType: BigInt,
    toType: String,
    accepts: isBigInt,
    convert: (from) => ok(from.toString()),
})

export const stringToBigintConverter = typedConverter({
    fromType: String,
    toType: BigInt,
    accepts: isString,
    convert: (from) => {
        const text = from.trim()

        if (!/^[-+]?\d+$/.test(text)) {
            return conversionErr(`"${from}" is not an integer`)
        }

        return ok(BigInt(text))
    },
})

export const dateToStringConverter = typedConverter({
    fromType: Date,
    toType: String,
    accepts: isDate,
    convert: (from) => {
        if (Number.isNaN(from.getTime())) {
            return conversionErr('Invalid date')
        }

        return ok(from.toISOString())
    },
})

export const stringToDateConverter = typedConverter({
    fromType: String,
    toType: Date,
    accepts: isString,
    convert: (from) => {
        const time = Date.parse(from)

        if (Number.isNaN(time)) {
            return conversionErr(`"${from}" is not a date`)
        }

        return ok(new Date(time))
    },
})

export const defaultTypedConverters = (): BindingTypeConverter[] => [
    numberToStringConverter,
    stringToNumberConverter,
    booleanToStringConverter,
    stringToBooleanConverter,
    bigintToStringConverter,
    stringToBigintConverter,
    dateToStringConverter,
    stringToDateConverter,
]

/**
 * Passes values through unchanged when the source type is assignable to the
 * target type. `Object` as source means "type unknown" and is always accepted.
 */
export class EqualityConverter implements BindingFallbackConverter {
    getAffinityForObjects(fromType: TypeKey, toType: TypeKey): number {
        return fromType === Object || isAssignableTo(fromType, toType) ? 100 : 0
    }

    tryConvert(from: unknown, toType: TypeKey): Conversion<unknown> {
        if (from === undefined || from === null || isAssignableTo(typeKeyOf(from), toType)) {
            return ok(from)
        }

        return conversionErr(`Can't use a ${typeName(typeKeyOf(from))} as a ${typeName(toType)}`)
    }
}

/**
 * Turns anything into its string form.
 */
export class StringConverter implements BindingFallbackConverter {
    getAffinityForObjects(_fromType: TypeKey, toType: TypeKey): number {
        return toType === String ? 2 : 0
    }

    tryConvert(from: unknown): Conversion<unknown> {
        return ok(from === undefined || from === null ? '' : String(from))
    }
}

/**
 * Refills the target array with the new items, keeping the array instance.
 */
export class ArraySetMethodConverter implements SetMethodBindingConverter {
    getAffinityForObjects(fromType: TypeKey | undefined, toType: TypeKey | undefined): number {
        return fromType !== undefined && toType !== undefined && isAssignableTo(fromType, Array) && isAssignableTo(toType, Array)
            ? 5
            : 0
    }

    performSet(current: unknown, newValue: unknown): unknown {
        if (!Array.isArray(current) || !Array.isArray(newValue)) {
            return newValue
        }

        current.splice(0, current.length, ...newValue)

        return current
    }
}

export class BindingTypeConverterRegistry {
    private readonly byPair = new Map<string, BindingTypeConverter[]>()

    register(converter: BindingTypeConverter): void {
        const key = pairKey(converter.fromType, converter.toType)
        const list = this.byPair.get(key) ?? []

        this.byPair.set(key, [...list, converter])
    }

    tryGetConverter(fromType: TypeKey, toType: TypeKey): BindingTypeConverter | undefined {
        const list = this.byPair.get(pairKey(fromType, toType)) ?? []

        return pickByAffinity(list, (converter) => converter.getAffinityForObjects())
    }

    getAllConverters(): BindingTypeConverter[] {
        return [...this.byPair.values()].flat()
    }
}

export class BindingFallbackConverterRegistry {
    private readonly converters: BindingFallbackConverter[] = []

    register(converter: BindingFallbackConverter): void {
        this.converters.push(converter)
    }

    tryGetConverter(fromType: TypeKey, toType: TypeKey): BindingFallbackConverter | undefined {
        return pickByAffinity(this.converters, (converter) => converter.getAffinityForObjects(fromType, toType))
    }

    getAllConverters(): BindingFallbackConverter[] {
        return [...this.converters]
    }
}

export class SetMethodBindingConverterRegistry {
    private readonly converters: SetMethodBindingConverter[] = []

    register(converter: SetMethodBindingConverter): void {
        this.converters.push(converter)
    }

    tryGetConverter(fromType: TypeKey | undefined, toType: TypeKey | undefined): SetMethodBindingConverter | undefined {
        return pickByAffinity(this.converters, (converter) => converter.getAffinityForObjects(fromType, toType))
    }

    getAllConverters(): SetMethodBindingConverter[] {
        return [...this.converters]
    }
}

const pairKey = (fromType: TypeKey, toType: TypeKey) => `${typeId(fromType)}|${typeId(toType)}`

export type ResolvedConverter =
    | { type: 'typed'; converter: BindingTypeConverter }
    | { type: 'fallback'; converter: BindingFallbackConverter }

/**
 * Picks converters for bindings: an exact typed converter first, then the
 * best fallback. Lookups are cached until the next registration.
 */
export class ConverterService {
    readonly typedConverters = new BindingTypeConverterRegistry()
    readonly fallbackConverters = new BindingFallbackConverterRegistry()
    readonly setMethodConverters = new SetMethodBindingConverterRegistry()

    private readonly resolved = new MemoCache<string, ResolvedConverter | undefined, [TypeKey, TypeKey]>(
        (_key, types) => (types ? this.lookup(types[0], types[1]) : undefined),
        { maxSize: settings.smallCacheLimit },
    )

    registerTyped(converter: BindingTypeConverter): this {
        this.typedConverters.register(converter)
        this.resolved.invalidateAll()
        return this
    }

    registerFallback(converter: BindingFallbackConverter): this {
        this.fallbackConverters.register(converter)
        this.resolved.invalidateAll()
        return this
    }

    registerSetMethod(converter: SetMethodBindingConverter): this {
        this.setMethodConverters.register(converter)
        return this
    }

    resolveConverter(fromType: TypeKey, toType: TypeKey): ResolvedConverter | undefined {
        return this.resolved.get(pairKey(fromType, toType), [fromType, toType])
    }

    resolveSetMethodConverter(fromType: TypeKey | undefined, toType: TypeKey | undefined): SetMethodBindingConverter | undefined {
        return this.setMethodConverters.tryGetConverter(fromType, toType)
    }

    /**
     * Converts `value` into `toType` with whichever converter fits best.
     */
    convert(value: unknown, toType: TypeKey, conversionHint?: unknown): Conversion<unknown> {
        const fromType = typeKeyOf(value)
        const resolved = this.resolveConverter(fromType, toType)

        if (!resolved) {
            return conversionErr(
                `Can't convert ${typeName(fromType)} to ${typeName(toType)}, register a binding type converter for it`,
            )
        }

        return resolved.type === 'typed'
            ? resolved.converter.tryConvert(value, conversionHint)
            : resolved.converter.tryConvert(value, toType, conversionHint)
    }

    private lookup(fromType: TypeKey, toType: TypeKey): ResolvedConverter | undefined {
        const typed = this.typedConverters.tryGetConverter(fromType, toType)

        if (typed) {
            return { type: 'typed', converter: typed }
        }

        const fallback = this.fallbackConverters.tryGetConverter(fromType, toType)

        return fallback ? { type: 'fallback', converter: fallback } : undefined
    }
}

export const ConverterServiceKey = serviceKey<ConverterService>('ConverterService')

export function createDefaultConverterService(): ConverterService {
    const service = new ConverterService()

    for (const converter of defaultTypedConverters()) {
        service.registerTyped(converter)
    }

    return service
        .registerFallback(new EqualityConverter())
        .registerFallback(new StringConverter())
        .registerSetMethod(new ArraySetMethodConverter())
}

let builtInService: ConverterService | undefined

/**
 * The registered converter service, or a shared one holding the built-in
 * converters when none is registered.
 */
export function currentConverterService(): ConverterService {
    const registered = Locator.current.getService(ConverterServiceKey)

    if (registered) {
        return registered
    }

    if (!builtInService) {
        builtInService = createDefaultConverterService()
    }

    return builtInService
}
