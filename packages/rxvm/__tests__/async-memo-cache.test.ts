import { from, of, Subject } from 'rxjs'
import { AsyncMemoCache, cachedSelectMany } from '../src/async-memo-cache'

describe('AsyncMemoCache', () => {
    it('should fetch a key once and replay the result', () => {
        const fetch = jest.fn((key: string) => of(key.length))
        const cache = new AsyncMemoCache(fetch, { maxSize: 4 })
        const received: number[] = []

        cache.get('abc').subscribe((value) => received.push(value))
        cache.get('abc').subscribe((value) => received.push(value))

        expect(received).toEqual([3, 3])
        expect(fetch).toHaveBeenCalledTimes(1)
    })

    it('should share a fetch that is still running', async () => {
        let resolve: (value: string) => void = () => undefined
        const fetch = jest.fn(
            () =>
                new Promise<string>((done) => {
                    resolve = done
                }),
        )
        const cache = new AsyncMemoCache(fetch, { maxSize: 4 })
        const received: string[] = []
        const first = cache.get('user')
        const second = cache.get('user')

        first.subscribe((value) => received.push(`first:${value}`))
        second.subscribe((value) => received.push(`second:${value}`))
        resolve('ada')
        await Promise.resolve()
        await Promise.resolve()

        expect(fetch).toHaveBeenCalledTimes(1)
        expect(received).toEqual(['first:ada', 'second:ada'])
    })

    it('should hold fetches past maxConcurrent until one finishes', () => {
        const pending = new Map<string, Subject<string>>()
        const started: string[] = []
        const cache = new AsyncMemoCache(
            (key: string) => {
                const result = new Subject<string>()
                started.push(key)
                pending.set(key, result)
                return result
            },
            { maxSize: 10, maxConcurrent: 2 },
        )
        const received: string[] = []

        for (const key of ['a', 'b', 'c']) {
            cache.get(key).subscribe((value) => received.push(value))
        }

        expect(started).toEqual(['a', 'b'])

        pending.get('a')?.next('A')
        pending.get('a')?.complete()

        expect(started).toEqual(['a', 'b', 'c'])
        expect(received).toEqual(['A'])
    })

    it('should release the values of evicted keys', () => {
        const released: string[] = []
        const cache = new AsyncMemoCache((key: string) => of(key.toUpperCase()), {
            maxSize: 1,
            onRelease: (value) => released.push(value),
        })

        cache.get('a').subscribe()
        cache.get('b').subscribe()

        expect(released).toEqual(['A'])
        expect(cache.size).toBe(1)
    })

    it('should fetch again after a failure', () => {
        let calls = 0
        const cache = new AsyncMemoCache(
            (key: string) => {
                calls++

                if (calls === 1) {
                    throw new Error('offline')
                }

                return of(key)
            },
            { maxSize: 4 },
        )
        const errors: unknown[] = []
        const received: string[] = []

        cache.get('a').subscribe({ error: (error: unknown) => errors.push(error) })
        cache.get('a').subscribe((value) => received.push(value))

        expect(errors).toEqual([new Error('offline')])
        expect(received).toEqual(['a'])
        expect(calls).toBe(2)
    })

    it('should reject a maxConcurrent below one', () => {
        expect(() => new AsyncMemoCache((key: string) => of(key), { maxSize: 1, maxConcurrent: 0 })).toThrow(
            '[rxvm] AsyncMemoCache maxConcurrent must be at least 1',
        )
    })
})

describe('cachedSelectMany', () => {
    it('should reuse results for repeated inputs', () => {
        const fetch = jest.fn((key: string) => of(key.toUpperCase()))
        const received: string[] = []

        from(['a', 'b', 'a'])
            .pipe(cachedSelectMany(fetch))
            .subscribe((value) => received.push(value))

        expect(received).toEqual(['A', 'B', 'A'])
        expect(fetch).toHaveBeenCalledTimes(2)
    })

    it('should use a cache it is given', () => {
        const cache = new AsyncMemoCache((key: number) => of(key * 2), { maxSize: 4 })
        const received: number[] = []

        cache.get(3).subscribe()
        of(3, 4)
            .pipe(cachedSelectMany(cache))
            .subscribe((value) => received.push(value))

        expect(received).toEqual([6, 8])
        expect(cache.size).toBe(2)
    })
})
