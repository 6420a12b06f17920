import { MemoCache } from '../src/memo-cache'

describe('MemoCache', () => {
    it('should compute a value once per key', () => {
        const calculate = jest.fn((key: string) => key.length)
        const cache = new MemoCache(calculate, { maxSize: 4 })

        expect(cache.get('abc')).toBe(3)
        expect(cache.get('abc')).toBe(3)
        expect(calculate).toHaveBeenCalledTimes(1)
    })

    it('should pass the context to the calculation', () => {
        const cache = new MemoCache<string, string, { suffix: string }>((key, context) => key + (context?.suffix ?? ''), {
            maxSize: 4,
        })

        expect(cache.get('a', { suffix: '!' })).toBe('a!')
        // cached values ignore later contexts
        expect(cache.get('a', { suffix: '?' })).toBe('a!')
    })

    it('should evict the least recently used entry', () => {
        const released: number[] = []
        const cache = new MemoCache((key: number) => key * 10, {
            maxSize: 2,
            onRelease: (value) => released.push(value),
        })

        cache.get(1)
        cache.get(2)
        cache.get(1)
        cache.get(3)

        expect(released).toEqual([20])
        expect(cache.tryGet(2)).toEqual({ found: false })
        expect(cache.tryGet(1)).toEqual({ found: true, value: 10 })
        expect(cache.size).toBe(2)
    })

    it('should release invalidated entries', () => {
        const released: string[] = []
        const cache = new MemoCache((key: string) => key.toUpperCase(), {
            maxSize: 8,
            onRelease: (value) => released.push(value),
        })

        cache.get('a')
        cache.get('b')
        cache.get('c')
        cache.invalidate('b')
        cache.invalidate('missing')

        expect(released).toEqual(['B'])
        expect(cache.cachedValues()).toEqual(['A', 'C'])

        cache.invalidateAll()

        expect(released).toEqual(['B', 'A', 'C'])
        expect(cache.size).toBe(0)
    })

    it('should cache undefined results', () => {
        const calculate = jest.fn((): string | undefined => undefined)
        const cache = new MemoCache(calculate, { maxSize: 2 })

        cache.get('x')
        cache.get('x')

        expect(calculate).toHaveBeenCalledTimes(1)
        expect(cache.tryGet('x')).toEqual({ found: true, value: undefined })
    })

    it('should reject a non-positive size', () => {
        expect(() => new MemoCache((key: string) => key, { maxSize: 0 })).toThrow(RangeError)
    })
})
