export type MemoCacheOptions<Value> = {
    maxSize: number
    onRelease?: (value: Value) => void
}

/**
 * Memoizes `calculate` per key and keeps at most `maxSize` entries, evicting
 * the least recently used one. `onRelease` sees every value that leaves the
 * cache through eviction or invalidation.
 */
export class MemoCache<Key, Value, Context = undefined> {
    private readonly entries = new Map<Key, { value: Value }>()
    private readonly calculate: (key: Key, context: Context | undefined) => Value
    private readonly maxSize: number
    private readonly onRelease?: (value: Value) => void

    constructor(calculate: (key: Key, context: Context | undefined) => Value, options: MemoCacheOptions<Value>) {
        if (options.maxSize <= 0) {
            throw new RangeError('[rxvm] MemoCache maxSize must be positive')
        }

        this.calculate = calculate
        this.maxSize = options.maxSize
        this.onRelease = options.onRelease
    }

    get size(): number {
        return this.entries.size
    }

    get(key: Key, context?: Context): Value {
        const hit = this.entries.get(key)

        if (hit) {
            // re-insert to mark as most recently used
            this.entries.delete(key)
            this.entries.set(key, hit)
            return hit.value
        }

        const value = this.calculate(key, context)

        this.entries.set(key, { value })

        if (this.entries.size > this.maxSize) {
            const oldest = this.entries.keys().next()

            if (!oldest.done) {
                this.release(oldest.value)
            }
        }

        return value
    }

    tryGet(key: Key): { found: true; value: Value } | { found: false } {
        if (!this.entries.has(key)) {
            return { found: false }
        }

        return { found: true, value: this.get(key) }
    }

    invalidate(key: Key): void {
        if (this.entries.has(key)) {
            this.release(key)
        }
    }

    invalidateAll(): void {
        for (const key of [...this.entries.keys()]) {
            this.release(key)
        }
    }

    cachedValues(): Value[] {
        return [...this.entries.values()].map((entry) => entry.value)
    }

    private release(key: Key): void {
        const entry = this.entries.get(key)

        if (entry) {
            this.entries.delete(key)
            this.onRelease?.(entry.value)
        }
    }
}
