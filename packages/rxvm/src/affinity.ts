/**
 * Run-time stand-in for a type: the constructor of a value. Primitives map to
 * their wrapper constructors (`String`, `Number`, ...), `null` and `undefined`
 * map to `Object`, which every other type is assignable to.
 */
export type TypeKey = {
    readonly name: string
    readonly prototype: unknown
}

export function typeKeyOf(value: unknown): TypeKey {
    switch (typeof value) {
        case 'string':
            return String
        case 'number':
            return Number
        case 'boolean':
            return Boolean
        case 'bigint':
            return BigInt
        case 'symbol':
            return Symbol
        case 'function':
            return Function
        case 'undefined':
            return Object
    }

    if (value === null) {
        return Object
    }

    const proto: unknown = Object.getPrototypeOf(value)

    if (typeof proto !== 'object' || proto === null) {
        return Object
    }

    const ctor: unknown = Reflect.get(proto, 'constructor')

    return typeof ctor === 'function' ? ctor : Object
}

export function isAssignableTo(from: TypeKey, to: TypeKey): boolean {
    if (from === to || to === Object) {
        return true
    }

    const toProto = to.prototype
    const fromProto = from.prototype

    if (typeof toProto !== 'object' || toProto === null || typeof fromProto !== 'object' || fromProto === null) {
        return false
    }

    return toProto.isPrototypeOf(fromProto)
}

const typeIds = new WeakMap<TypeKey, number>()
let nextTypeId = 1

/**
 * Stable numeric id per type, used to build cache keys from type tuples.
 */
export function typeId(type: TypeKey): number {
    let id = typeIds.get(type)

    if (id === undefined) {
        id = nextTypeId++
        typeIds.set(type, id)
    }

    return id
}

export const typeName = (type: TypeKey): string => type.name || 'anonymous'

/**
 * Returns the candidate with the highest strictly positive score; ties keep
 * the earliest candidate.
 */
export function pickByAffinity<T>(candidates: Iterable<T>, score: (candidate: T) => number): T | undefined {
    let best: T | undefined
    let bestScore = 0

    for (const candidate of candidates) {
        const value = score(candidate)

        if (value > bestScore) {
            best = candidate
            bestScore = value
        }
    }

    return best
}
