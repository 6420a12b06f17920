import { PropertyExpressionError } from './errors'

/**
 * A property chain written as an arrow function, e.g. `(vm) => vm.address.city`.
 * Only plain member access is allowed: the function must return the
 * value reached by walking its parameter's properties.
 */
export type PropertyExpression<Source, Value> = (source: Source) => Value

const chains = new WeakMap<object, string[]>()

const createRecorder = (chain: string[]): object => {
    const target = function () {}

    const recorder: object = new Proxy(target, {
        get(_target, property) {
            if (typeof property === 'symbol') {
                throw new PropertyExpressionError(
                    `Symbol property ${String(property)} cannot be observed, use a string property name`,
                )
            }

            return createRecorder([...chain, property])
        },
        apply() {
            throw new PropertyExpressionError(`Method call on ${chain.join('.') || 'source'} is not a property chain`)
        },
        set() {
            throw new PropertyExpressionError('Property expressions must not assign')
        },
    })

    chains.set(recorder, chain)

    return recorder
}

const chainCache = new WeakMap<Function, readonly string[]>()

/**
 * Reads the member names an expression walks through, by running it once
 * against a recording proxy.
 */
export function propertyChain<Source, Value>(expression: PropertyExpression<Source, Value>): readonly string[] {
    const cached = chainCache.get(expression)

    if (cached) {
        return cached
    }

    const leaf: unknown = Reflect.apply(expression, undefined, [createRecorder([])])
    const chain = typeof leaf === 'function' || (typeof leaf === 'object' && leaf !== null) ? chains.get(leaf) : undefined

    if (!chain) {
        throw new PropertyExpressionError(`Expression ${expression.toString()} does not return a property chain`)
    }

    if (chain.length === 0) {
        throw new PropertyExpressionError(`Expression ${expression.toString()} must access at least one property`)
    }

    const frozen = Object.freeze([...chain])
    chainCache.set(expression, frozen)

    return frozen
}

export const chainToString = (chain: readonly string[]): string => chain.join('.')

const isIndexable = (value: unknown): value is object => {
    return (typeof value === 'object' && value !== null) || typeof value === 'function'
}

export type ChainValue = { found: true; value: unknown } | { found: false }

/**
 * Follows `chain` from `source`. Stops with `found: false` at the first link
 * that is `null` or `undefined`.
 */
export function getChainValue(source: unknown, chain: readonly string[]): ChainValue {
    let current: unknown = source

    for (const name of chain) {
        if (!isIndexable(current)) {
            return { found: false }
        }

        current = Reflect.get(current, name)
    }

    return { found: true, value: current }
}

/**
 * Every value along the chain, starting with the first member. Links after a
 * missing one are not included.
 */
export function getChainValues(source: unknown, chain: readonly string[]): Array<{ sender: object; name: string; value: unknown }> {
    const values: Array<{ sender: object; name: string; value: unknown }> = []
    let current: unknown = source

    for (const name of chain) {
        if (!isIndexable(current)) {
            break
        }

        const value: unknown = Reflect.get(current, name)
        values.push({ sender: current, name, value })
        current = value
    }

    return values
}

/**
 * Assigns `value` to the last member of `chain`. Returns false when a link
 * before it is missing.
 */
export function setChainValue(source: unknown, chain: readonly string[], value: unknown): boolean {
    const parent = getChainValue(source, chain.slice(0, -1))

    if (!parent.found || !isIndexable(parent.value)) {
        return false
    }

    return Reflect.set(parent.value, chain[chain.length - 1], value)
}
