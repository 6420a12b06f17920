import { defer, mergeMap, Observable, ObservableInput, OperatorFunction, ReplaySubject } from 'rxjs'
import { logFor } from './logging'
import { MemoCache } from './memo-cache'

export type AsyncMemoCacheOptions<Value> = {
    maxSize: number
    /** Fetches past this many wait for a running one to finish. Defaults to 5. */
    maxConcurrent?: number
    onRelease?: (value: Value) => void
}

type Entry<Value> = {
    result: ReplaySubject<Value>
    values: Value[]
}

/**
 * Memoizes an asynchronous fetch per key. Callers asking for a key that is
 * being fetched share the running request, and at most `maxConcurrent`
 * fetches run at once. A failed fetch is forgotten so the next `get` tries
 * again.
 */
export class AsyncMemoCache<Key, Value> {
    private readonly cache: MemoCache<Key, Entry<Value>>
    private readonly fetch: (key: Key) => ObservableInput<Value>
    private readonly maxConcurrent: number
    private readonly waiting: Array<() => void> = []
    private running = 0
    private readonly log = logFor(this)

    constructor(fetch: (key: Key) => ObservableInput<Value>, options: AsyncMemoCacheOptions<Value>) {
        const maxConcurrent = options.maxConcurrent ?? 5

        if (maxConcurrent < 1) {
            throw new RangeError('[rxvm] AsyncMemoCache maxConcurrent must be at least 1')
        }

        const onRelease = options.onRelease

        this.fetch = fetch
        this.maxConcurrent = maxConcurrent
        this.cache = new MemoCache<Key, Entry<Value>>(() => ({ result: new ReplaySubject<Value>(), values: [] }), {
            maxSize: options.maxSize,
            onRelease: onRelease && ((entry: Entry<Value>) => entry.values.forEach((value) => onRelease(value))),
        })
    }

    get size(): number {
        return this.cache.size
    }

    /** Replays everything the fetch for `key` emits. */
    get(key: Key): Observable<Value> {
        const hit = this.cache.tryGet(key)

        if (hit.found) {
            this.log.debug(`Cache hit: ${String(key)}`)
            return hit.value.result.asObservable()
        }

        const entry = this.cache.get(key)

        this.waiting.push(() => this.start(key, entry))
        this.drain()

        return entry.result.asObservable()
    }

    invalidate(key: Key): void {
        this.cache.invalidate(key)
    }

    private start(key: Key, entry: Entry<Value>): void {
        this.log.debug(`Fetching ${String(key)}`)

        defer(() => this.fetch(key)).subscribe({
            next: (value) => {
                entry.values.push(value)
                entry.result.next(value)
            },
            error: (error: unknown) => {
                this.forget(key, entry)
                this.settle()
                entry.result.error(error)
            },
            complete: () => {
                this.settle()
                entry.result.complete()
            },
        })
    }

    private settle(): void {
        this.running--
        this.drain()
    }

    private drain(): void {
        while (this.running < this.maxConcurrent) {
            const next = this.waiting.shift()

            if (!next) {
                return
            }

            this.running++
            next()
        }
    }

    private forget(key: Key, entry: Entry<Value>): void {
        const current = this.cache.tryGet(key)

        // the key may have been evicted and fetched again meanwhile
        if (current.found && current.value === entry) {
            this.cache.invalidate(key)
        }
    }
}

/**
 * `mergeMap` through an `AsyncMemoCache`, so repeated inputs reuse earlier
 * results. A selector gets a fresh cache per subscription.
 */
export function cachedSelectMany<Key, Value>(
    selector: ((key: Key) => ObservableInput<Value>) | AsyncMemoCache<Key, Value>,
    options: Partial<AsyncMemoCacheOptions<Value>> = {},
): OperatorFunction<Key, Value> {
    return (source) =>
        defer(() => {
            const cache =
                selector instanceof AsyncMemoCache
                    ? selector
                    : new AsyncMemoCache(selector, { ...options, maxSize: options.maxSize ?? 50 })

            return source.pipe(mergeMap((key) => cache.get(key)))
        })
}
